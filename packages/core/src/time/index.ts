/**
 * Time bucketing utilities.
 *
 * - Constants for clock and weekday handling
 * - "HH:MM" time-of-day keys and schedule clock times
 * - Weekday numbers (1 = Monday) and labels
 * - Timestamp parsing and naive/zoned clock readers
 */

export * from './constants.js';
export * from './timeOfDay.js';
export * from './weekday.js';
export * from './timestamp.js';
export * from './clock.js';
