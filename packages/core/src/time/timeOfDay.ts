import { HALF_HOUR_MINUTES, HOURS_PER_DAY, MINUTES_PER_HOUR } from './constants.js';

/**
 * Hour and minute of a clock time.
 */
export interface ClockTime {
  /** Hour of day, 0-23 */
  hour: number;
  /** Minute of hour, 0-59 */
  minute: number;
}

function assertClockTime(hour: number, minute: number): void {
  if (!Number.isInteger(hour) || hour < 0 || hour >= HOURS_PER_DAY) {
    throw new Error(`hour must be an integer in range [0, 23], got ${hour}`);
  }

  if (!Number.isInteger(minute) || minute < 0 || minute >= MINUTES_PER_HOUR) {
    throw new Error(`minute must be an integer in range [0, 59], got ${minute}`);
  }
}

/**
 * Formats a clock time as a zero-padded "HH:MM" bucket key.
 *
 * Lexicographic order of the result equals chronological order within a day.
 *
 * @throws Error if hour or minute is out of range
 *
 * @example
 * formatTimeOfDay(8, 0) // "08:00"
 * formatTimeOfDay(17, 30) // "17:30"
 */
export function formatTimeOfDay(hour: number, minute: number): string {
  assertClockTime(hour, minute);
  return `${String(hour).padStart(2, '0')}:${String(minute).padStart(2, '0')}`;
}

/**
 * Parses an "HH:MM" clock time as written in schedule configuration.
 * A single-digit hour ("7:05") is accepted.
 *
 * @throws Error if the text is not H:MM/HH:MM or a component is out of range
 */
export function parseClockTime(text: string): ClockTime {
  const match = /^(\d{1,2}):(\d{2})$/.exec(text.trim());
  if (!match) {
    throw new Error(`invalid time format '${text}' (expected HH:MM)`);
  }

  const hour = Number(match[1]);
  const minute = Number(match[2]);
  assertClockTime(hour, minute);

  return { hour, minute };
}

/**
 * Minutes elapsed since midnight.
 */
export function minutesIntoDay(time: ClockTime): number {
  return time.hour * MINUTES_PER_HOUR + time.minute;
}

/**
 * Whether a minute falls exactly on the hour or the half hour.
 */
export function isHalfHour(minute: number): boolean {
  return HALF_HOUR_MINUTES.includes(minute);
}
