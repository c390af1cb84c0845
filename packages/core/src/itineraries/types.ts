/**
 * Itinerary metadata types, as read from the collector's config.yaml.
 */

import type { WeekdayNumber } from '../time/weekday.js';
import type { ClockTime } from '../time/timeOfDay.js';

/**
 * When the collector samples an itinerary.
 */
export interface ScheduleWindow {
  readonly name: string;
  readonly days: readonly WeekdayNumber[];
  readonly start: ClockTime;
  readonly end: ClockTime;
  readonly intervalMinutes: number;
}

/**
 * A monitored route and the CSV file its samples are appended to.
 */
export interface ItineraryMetadata {
  readonly id: string;
  readonly name: string;
  readonly from: string;
  readonly to: string;
  /** CSV file name relative to the data directory */
  readonly outputFile: string;
  readonly schedules: readonly ScheduleWindow[];
}

export interface DashboardConfig {
  readonly itineraries: readonly ItineraryMetadata[];
}
