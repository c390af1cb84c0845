/**
 * Time-of-day bucket constants.
 *
 * Samples are bucketed by their clock time, truncated to the minute and
 * rendered as "HH:MM", and by weekday numbered 1 (Monday) to 7 (Sunday).
 */

/**
 * Number of minutes per hour.
 */
export const MINUTES_PER_HOUR = 60;

/**
 * Number of hours per day.
 */
export const HOURS_PER_DAY = 24;

/**
 * Minute marks kept when downsampling to scheduled half-hour measurements.
 */
export const HALF_HOUR_MINUTES: readonly number[] = [0, 30];

/**
 * Weekday names indexed by weekday number minus one (Monday first).
 */
export const WEEKDAY_NAMES = [
  'Monday',
  'Tuesday',
  'Wednesday',
  'Thursday',
  'Friday',
  'Saturday',
  'Sunday',
] as const;

/**
 * Target zone for zone-aware loading (US/Eastern).
 */
export const DEFAULT_TIME_ZONE = 'America/New_York';
