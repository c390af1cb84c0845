import { WEEKDAY_NAMES } from './constants.js';

/**
 * Weekday number: 1 = Monday, 7 = Sunday.
 */
export type WeekdayNumber = 1 | 2 | 3 | 4 | 5 | 6 | 7;

/**
 * All weekday numbers, Monday first.
 */
export const ALL_WEEKDAYS: readonly WeekdayNumber[] = [1, 2, 3, 4, 5, 6, 7];

/**
 * Accepted spellings for day names in schedule configuration.
 */
const DAY_NAME_TO_WEEKDAY: Record<string, WeekdayNumber> = {
  monday: 1,
  mon: 1,
  tuesday: 2,
  tue: 2,
  tues: 2,
  wednesday: 3,
  wed: 3,
  thursday: 4,
  thu: 4,
  thurs: 4,
  friday: 5,
  fri: 5,
  saturday: 6,
  sat: 6,
  sunday: 7,
  sun: 7,
};

const WEEKDAY_BY_JS_DAY: readonly WeekdayNumber[] = [7, 1, 2, 3, 4, 5, 6];

export function isWeekdayNumber(value: number): value is WeekdayNumber {
  return Number.isInteger(value) && value >= 1 && value <= 7;
}

/**
 * Converts a JavaScript day index (0 = Sunday, 6 = Saturday) to a weekday number.
 */
export function weekdayFromJsDay(jsDay: number): WeekdayNumber {
  if (!Number.isInteger(jsDay) || jsDay < 0 || jsDay > 6) {
    throw new Error(`jsDay must be an integer in range [0, 6] (0=Sunday), got ${jsDay}`);
  }
  return WEEKDAY_BY_JS_DAY[jsDay];
}

/**
 * English name of a weekday.
 *
 * @throws Error if weekday is not in [1, 7]
 */
export function weekdayName(weekday: number): string {
  if (!isWeekdayNumber(weekday)) {
    throw new Error(`weekday must be an integer in range [1, 7] (1=Monday, 7=Sunday), got ${weekday}`);
  }
  return WEEKDAY_NAMES[weekday - 1];
}

/**
 * Weekday label used as a chart category, e.g. "3 - Wednesday".
 *
 * The leading ordinal keeps labels in Monday-to-Sunday order when sorted as strings.
 */
export function weekdayLabel(weekday: number): string {
  return `${weekday} - ${weekdayName(weekday)}`;
}

/**
 * Converts a configured day name ("monday", "Mon", "thurs", ...) to a weekday number.
 *
 * @throws Error if the name is not recognized
 */
export function dayNameToWeekday(day: string): WeekdayNumber {
  const weekday = DAY_NAME_TO_WEEKDAY[day.trim().toLowerCase()];
  if (weekday === undefined) {
    throw new Error(`invalid day name: ${day}`);
  }
  return weekday;
}
