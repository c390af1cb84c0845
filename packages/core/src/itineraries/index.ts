/**
 * Itinerary config (config.yaml) and the tab catalog built from data files.
 */

export type { DashboardConfig, ItineraryMetadata, ScheduleWindow } from './types.js';
export {
  MAX_INTERVAL_MINUTES,
  clockTimeSchema,
  dashboardConfigSchema,
  dayNameSchema,
  itinerarySchema,
  scheduleSchema,
} from './schema.js';
export { ConfigError, loadDashboardConfig, parseDashboardConfig } from './config.js';
export { describeSchedule } from './schedule.js';
export type {
  DataFileName,
  Direction,
  Itinerary,
  ItineraryFile,
  ItinerarySortKey,
  MetadataIndex,
} from './catalog.js';
export {
  DEFAULT_ITINERARY_ID,
  EMPTY_METADATA_INDEX,
  buildItineraries,
  compareSortKeys,
  declaredFileNames,
  indexMetadata,
  itinerarySortKey,
  parseDataFileName,
} from './catalog.js';
