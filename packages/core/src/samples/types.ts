/**
 * Commute sample types.
 */

import type { WeekdayNumber } from '../time/weekday.js';

/**
 * One recorded commute-duration measurement.
 */
export interface CommuteSample {
  /** Timestamp text as written by the collector */
  readonly timestamp: string;
  /** Epoch milliseconds of the timestamp (text without an offset is read as UTC) */
  readonly instantMs: number;
  /** Commute duration in minutes */
  readonly commuteTime: number;
}

/**
 * Sample extended with its derived bucket keys. Never persisted.
 */
export interface BucketedSample extends CommuteSample {
  /** Clock time truncated to the minute, "HH:MM" */
  readonly timeOfDay: string;
  /** 1 = Monday, 7 = Sunday */
  readonly weekday: WeekdayNumber;
  /** "{weekday} - {WeekdayName}", e.g. "3 - Wednesday" */
  readonly weekdayLabel: string;
}

/**
 * Where samples are read from: a CSV file on disk or its contents in memory.
 */
export type CommuteSource =
  | { kind: 'file'; path: string }
  | { kind: 'buffer'; data: string | Uint8Array; name?: string };
