import { HOURS_PER_DAY, MINUTES_PER_HOUR } from './constants.js';

/**
 * Calendar and clock fields of a timestamp exactly as written in the source,
 * plus its UTC offset when one was given.
 */
export interface ParsedTimestamp {
  year: number;
  /** 1-12 */
  month: number;
  /** 1-31 */
  day: number;
  hour: number;
  minute: number;
  second: number;
  millisecond: number;
  /** Offset east of UTC in minutes, undefined when the text carries none */
  offsetMinutes: number | undefined;
}

export class TimestampParseError extends Error {
  constructor(
    readonly text: string,
    reason: string,
  ) {
    super(`invalid timestamp '${text}': ${reason}`);
    this.name = 'TimestampParseError';
  }
}

// YYYY-MM-DD[(T| )HH:MM[:SS[.fff]]][Z|+HH:MM|+HHMM]
const TIMESTAMP_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})(?:[T ](\d{2}):(\d{2})(?::(\d{2})(?:\.(\d{1,9}))?)?)?\s*(Z|[+-]\d{2}:?\d{2})?$/i;

function parseOffset(text: string, designator: string): number {
  if (designator.toUpperCase() === 'Z') {
    return 0;
  }
  const sign = designator.startsWith('-') ? -1 : 1;
  const digits = designator.slice(1).replace(':', '');
  const hours = Number(digits.slice(0, 2));
  const minutes = Number(digits.slice(2, 4));
  if (hours > 14 || minutes >= MINUTES_PER_HOUR) {
    throw new TimestampParseError(text, `offset ${designator} out of range`);
  }
  return sign * (hours * MINUTES_PER_HOUR + minutes);
}

/**
 * Parses an ISO-8601 style timestamp such as "2025-01-08T08:00:00-05:00",
 * "2025-01-08 08:00:00" or "2025-01-08T13:00:00Z".
 *
 * @throws TimestampParseError if the text does not match or a field is out of range
 */
export function parseTimestamp(text: string): ParsedTimestamp {
  const trimmed = text.trim();
  const match = TIMESTAMP_PATTERN.exec(trimmed);
  if (!match) {
    throw new TimestampParseError(text, 'expected YYYY-MM-DDTHH:MM[:SS][offset]');
  }

  const [, yearText, monthText, dayText, hourText, minuteText, secondText, fractionText, offsetText] =
    match;

  const year = Number(yearText);
  const month = Number(monthText);
  const day = Number(dayText);
  const hour = hourText === undefined ? 0 : Number(hourText);
  const minute = minuteText === undefined ? 0 : Number(minuteText);
  const second = secondText === undefined ? 0 : Number(secondText);
  const millisecond = fractionText === undefined ? 0 : Number(fractionText.slice(0, 3).padEnd(3, '0'));

  if (month < 1 || month > 12) {
    throw new TimestampParseError(text, `month ${month} out of range`);
  }
  // Date.UTC rolls invalid days over into the next month
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (day < 1 || probe.getUTCMonth() !== month - 1) {
    throw new TimestampParseError(text, `day ${day} out of range`);
  }
  if (hour >= HOURS_PER_DAY || minute >= MINUTES_PER_HOUR || second >= 60) {
    throw new TimestampParseError(text, 'time of day out of range');
  }

  return {
    year,
    month,
    day,
    hour,
    minute,
    second,
    millisecond,
    offsetMinutes: offsetText === undefined ? undefined : parseOffset(text, offsetText),
  };
}

/**
 * Epoch milliseconds of a parsed timestamp. Text without an offset is read as UTC.
 */
export function toInstantMs(timestamp: ParsedTimestamp): number {
  const wallClockMs = Date.UTC(
    timestamp.year,
    timestamp.month - 1,
    timestamp.day,
    timestamp.hour,
    timestamp.minute,
    timestamp.second,
    timestamp.millisecond,
  );
  return wallClockMs - (timestamp.offsetMinutes ?? 0) * 60_000;
}
