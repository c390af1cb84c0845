import type { TimeOfDayAggregate, WeekdayNumber, WeekdayTimeAggregate } from '@commute-dashboard/core';
import { ALL_WEEKDAYS, weekdayName } from '@commute-dashboard/core/time';

export interface TimeOfDayPoint {
  timeOfDay: string;
  commuteTime: number;
  /** Absent for single-sample buckets, which then draw no error bar */
  stdDev?: number;
  count: number;
}

/**
 * One x-axis position of the weekday chart: a time of day with one mean per
 * weekday label that has data at that time.
 */
export type WeekdayRow = { timeOfDay: string } & Record<string, string | number>;

export interface WeekdayPivot {
  rows: WeekdayRow[];
  /** Weekday labels present in the data, Monday first */
  series: string[];
}

export function roundToTenth(value: number): number {
  return Math.round(value * 10) / 10;
}

export function toTimeOfDaySeries(rows: readonly TimeOfDayAggregate[]): TimeOfDayPoint[] {
  return rows.map(({ timeOfDay, commuteTime, stdDev, count }) => {
    const point: TimeOfDayPoint = { timeOfDay, commuteTime: roundToTenth(commuteTime), count };
    if (stdDev !== undefined) {
      point.stdDev = roundToTenth(stdDev);
    }
    return point;
  });
}

/**
 * Turns long (weekday, time) rows into one row per time of day, ordered by
 * time, for a grouped bar chart.
 */
export function pivotWeekdayRows(rows: readonly WeekdayTimeAggregate[]): WeekdayPivot {
  const byTime = new Map<string, WeekdayRow>();
  const series = new Set<string>();

  for (const { weekdayLabel, timeOfDay, commuteTime } of rows) {
    series.add(weekdayLabel);
    let row = byTime.get(timeOfDay);
    if (!row) {
      row = { timeOfDay };
      byTime.set(timeOfDay, row);
    }
    row[weekdayLabel] = roundToTenth(commuteTime);
  }

  return {
    rows: [...byTime.values()].sort((a, b) => a.timeOfDay.localeCompare(b.timeOfDay)),
    series: [...series].sort(),
  };
}

/**
 * Query value for `?days=`; empty when every day (or none) is selected.
 */
export function formatWeekdaySelection(weekdays: readonly WeekdayNumber[]): string {
  if (weekdays.length === 0 || weekdays.length === ALL_WEEKDAYS.length) {
    return '';
  }
  return [...weekdays].sort((a, b) => a - b).join(',');
}

export function describeWeekdaySelection(weekdays: readonly WeekdayNumber[]): string {
  if (formatWeekdaySelection(weekdays) === '') {
    return 'All days';
  }
  return [...weekdays]
    .sort((a, b) => a - b)
    .map((day) => weekdayName(day).slice(0, 3))
    .join(', ');
}

/**
 * Selection after clicking a weekday checkbox. An empty selection stands for
 * every day, so the last checked day cannot be unchecked.
 */
export function toggleWeekday(
  selected: readonly WeekdayNumber[],
  day: WeekdayNumber,
): WeekdayNumber[] {
  const current = selected.length === 0 ? [...ALL_WEEKDAYS] : [...selected];
  if (current.includes(day)) {
    if (current.length === 1) {
      return current;
    }
    return current.filter((d) => d !== day);
  }
  const next = [...current, day].sort((a, b) => a - b);
  return next.length === ALL_WEEKDAYS.length ? [] : next;
}

export function isOnlySelectedWeekday(
  selected: readonly WeekdayNumber[],
  day: WeekdayNumber,
): boolean {
  return selected.length === 1 && selected[0] === day;
}
