import Papa from 'papaparse';
import {
  createClockReader,
  type ClockReader,
  type ClockReading,
  type TimeMode,
} from '../time/clock.js';
import { formatTimeOfDay, isHalfHour } from '../time/timeOfDay.js';
import { parseTimestamp, toInstantMs, TimestampParseError } from '../time/timestamp.js';
import { weekdayLabel } from '../time/weekday.js';
import { DataUnavailableError } from './errors.js';
import type { BucketedSample } from './types.js';

/**
 * Options controlling how timestamps are bucketed.
 */
export interface LoadOptions {
  timeMode: TimeMode;
  /**
   * Keep only samples taken on the hour or the half hour, matching the
   * collector's fixed-interval schedule. Defaults to true in zoned mode and
   * false in naive mode.
   */
  halfHourOnly?: boolean;
}

export const NAIVE_LOAD_OPTIONS: LoadOptions = { timeMode: { kind: 'naive' } };

function parseDuration(text: string): number | undefined {
  const trimmed = text.trim();
  if (trimmed === '') {
    return undefined;
  }
  const value = Number(trimmed);
  return Number.isFinite(value) ? value : undefined;
}

function readTimestamp(
  text: string,
  readClock: ClockReader,
  sourceName: string,
  line: number,
): { clock: ClockReading; instantMs: number } {
  try {
    const timestamp = parseTimestamp(text);
    return { clock: readClock(timestamp), instantMs: toInstantMs(timestamp) };
  } catch (error) {
    if (error instanceof TimestampParseError) {
      throw new DataUnavailableError(sourceName, `row ${line}: ${error.message}`, { cause: error });
    }
    throw error;
  }
}

/**
 * Parses headerless two-column CSV text (timestamp, commute minutes) into
 * bucketed samples.
 *
 * Rows keep their file order. Blank lines are skipped; an empty text yields
 * no samples.
 *
 * @param sourceName - Name used in error messages
 * @throws DataUnavailableError on any malformed row
 */
export function parseSamples(
  text: string,
  options: LoadOptions,
  sourceName: string,
): BucketedSample[] {
  const content = text.startsWith('\uFEFF') ? text.slice(1) : text;
  const parsed = Papa.parse<string[]>(content, {
    header: false,
    delimiter: ',',
    skipEmptyLines: 'greedy',
  });

  if (parsed.errors.length > 0) {
    const [first] = parsed.errors;
    const row = first.row === undefined ? '' : ` (row ${first.row + 1})`;
    throw new DataUnavailableError(sourceName, `CSV parse error${row}: ${first.message}`);
  }

  const readClock = createClockReader(options.timeMode);
  const halfHourOnly = options.halfHourOnly ?? options.timeMode.kind === 'zoned';
  const samples: BucketedSample[] = [];

  parsed.data.forEach((row, index) => {
    const line = index + 1;
    if (row.length !== 2) {
      throw new DataUnavailableError(
        sourceName,
        `row ${line}: expected 2 columns (datetime, commute_time), got ${row.length}`,
      );
    }

    const [timestampText, durationText] = row;
    const { clock, instantMs } = readTimestamp(timestampText, readClock, sourceName, line);

    const commuteTime = parseDuration(durationText);
    if (commuteTime === undefined) {
      throw new DataUnavailableError(
        sourceName,
        `row ${line}: commute_time '${durationText}' is not a number`,
      );
    }

    if (halfHourOnly && !isHalfHour(clock.minute)) {
      return;
    }

    samples.push({
      timestamp: timestampText.trim(),
      instantMs,
      commuteTime,
      timeOfDay: formatTimeOfDay(clock.hour, clock.minute),
      weekday: clock.weekday,
      weekdayLabel: weekdayLabel(clock.weekday),
    });
  });

  return samples;
}
