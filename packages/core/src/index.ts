/**
 * Core domain logic for the commute dashboard.
 * This package contains the data pipeline (parse → bucket → aggregate) and
 * the itinerary catalog, with no HTTP or UI framework dependencies.
 */

/**
 * Time-of-day and weekday bucketing, timestamp parsing and zone handling.
 */
export * from './time/index.js';

/**
 * CSV sample loading and its failure contract.
 */
export * from './samples/index.js';

/**
 * Per-bucket statistics.
 */
export * from './aggregate/index.js';

/**
 * Itinerary config and tab catalog.
 */
export * from './itineraries/index.js';

/**
 * Shapes exchanged between the server and the web app.
 */
export * from './dashboard/index.js';
