import { WEEKDAY_NAMES } from './constants.js';
import type { ParsedTimestamp } from './timestamp.js';
import { toInstantMs } from './timestamp.js';
import type { WeekdayNumber } from './weekday.js';
import { ALL_WEEKDAYS, weekdayFromJsDay } from './weekday.js';

/**
 * How timestamps are read off the clock.
 *
 * - `naive`: the wall clock written in the source text; any offset is ignored.
 * - `zoned`: the instant is converted to `timeZone` (IANA name). Text without
 *   an offset is taken as UTC.
 */
export type TimeMode =
  | { kind: 'naive' }
  | { kind: 'zoned'; timeZone: string };

/**
 * Weekday and clock time of a timestamp under a given time mode.
 */
export interface ClockReading {
  weekday: WeekdayNumber;
  hour: number;
  minute: number;
}

export type ClockReader = (timestamp: ParsedTimestamp) => ClockReading;

const WEEKDAY_BY_NAME = new Map<string, WeekdayNumber>(
  WEEKDAY_NAMES.map((name, index) => [name, ALL_WEEKDAYS[index]]),
);

/**
 * Whether the runtime knows an IANA time zone name.
 */
export function isValidTimeZone(timeZone: string): boolean {
  try {
    new Intl.DateTimeFormat('en-US', { timeZone });
    return true;
  } catch (error) {
    if (error instanceof RangeError) {
      return false;
    }
    throw error;
  }
}

function readNaive(timestamp: ParsedTimestamp): ClockReading {
  const date = new Date(Date.UTC(timestamp.year, timestamp.month - 1, timestamp.day));
  return {
    weekday: weekdayFromJsDay(date.getUTCDay()),
    hour: timestamp.hour,
    minute: timestamp.minute,
  };
}

/**
 * Creates a reader for the given time mode. The zoned reader builds its
 * `Intl.DateTimeFormat` once, so create one reader per load.
 *
 * Zone conversion handles DST: the offset in effect at the instant is used.
 *
 * @throws RangeError if the time zone is unknown
 */
export function createClockReader(mode: TimeMode): ClockReader {
  if (mode.kind === 'naive') {
    return readNaive;
  }

  const formatter = new Intl.DateTimeFormat('en-US', {
    timeZone: mode.timeZone,
    weekday: 'long',
    hour: '2-digit',
    minute: '2-digit',
    hourCycle: 'h23',
  });

  return (timestamp) => {
    const parts = formatter.formatToParts(new Date(toInstantMs(timestamp)));
    const weekdayText = parts.find((p) => p.type === 'weekday')?.value ?? '';
    const hour = parseInt(parts.find((p) => p.type === 'hour')?.value ?? '', 10);
    const minute = parseInt(parts.find((p) => p.type === 'minute')?.value ?? '', 10);

    const weekday = WEEKDAY_BY_NAME.get(weekdayText);
    if (weekday === undefined || Number.isNaN(hour) || Number.isNaN(minute)) {
      throw new Error(`Unexpected ${mode.timeZone} clock parts: ${JSON.stringify(parts)}`);
    }

    return { weekday, hour, minute };
  };
}
