import type { WeekdayNumber } from '../time/weekday.js';
import type { BucketedSample } from '../samples/types.js';
import { mean, sampleStandardDeviation } from './stats.js';

/**
 * Per time-of-day statistics of commute duration.
 */
export interface TimeOfDayAggregate {
  /** "HH:MM" bucket */
  timeOfDay: string;
  /** Mean commute time in minutes */
  commuteTime: number;
  /** Sample standard deviation; undefined when the bucket has a single sample */
  stdDev: number | undefined;
  count: number;
}

/**
 * Per (weekday, time-of-day) mean commute duration.
 */
export interface WeekdayTimeAggregate {
  /** "{1-7} - {WeekdayName}" */
  weekdayLabel: string;
  timeOfDay: string;
  commuteTime: number;
  count: number;
}

function compareText(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

/**
 * Groups items by a string key, keeping each group's items in input order.
 *
 * @example
 * groupBy(samples, (s) => s.timeOfDay) // Map { "08:00" => [...], "08:30" => [...] }
 */
export function groupBy<T>(items: readonly T[], keyOf: (item: T) => string): Map<string, T[]> {
  const groups = new Map<string, T[]>();
  for (const item of items) {
    const key = keyOf(item);
    const group = groups.get(key);
    if (group) {
      group.push(item);
    } else {
      groups.set(key, [item]);
    }
  }
  return groups;
}

function durations(samples: readonly BucketedSample[]): number[] {
  return samples.map((s) => s.commuteTime);
}

/**
 * Mean and sample standard deviation of commute time per time-of-day bucket.
 *
 * Rows are sorted ascending by `timeOfDay` whatever the input order; "HH:MM"
 * string order is chronological order within a day.
 */
export function aggregateByTime(samples: readonly BucketedSample[]): TimeOfDayAggregate[] {
  const rows: TimeOfDayAggregate[] = [];

  for (const [timeOfDay, group] of groupBy(samples, (s) => s.timeOfDay)) {
    const values = durations(group);
    rows.push({
      timeOfDay,
      // Groups are never empty
      commuteTime: mean(values) ?? Number.NaN,
      stdDev: sampleStandardDeviation(values),
      count: values.length,
    });
  }

  return rows.sort((a, b) => compareText(a.timeOfDay, b.timeOfDay));
}

/**
 * Mean commute time per (weekday, time-of-day) bucket, sorted by weekday
 * label (Monday first) then time of day. No spread is computed for this view.
 */
export function aggregateByWeekdayAndTime(
  samples: readonly BucketedSample[],
): WeekdayTimeAggregate[] {
  const rows: WeekdayTimeAggregate[] = [];
  // Labels never contain a newline
  const groups = groupBy(samples, (s) => `${s.weekdayLabel}\n${s.timeOfDay}`);

  for (const group of groups.values()) {
    const [{ weekdayLabel, timeOfDay }] = group;
    const values = durations(group);
    rows.push({
      weekdayLabel,
      timeOfDay,
      commuteTime: mean(values) ?? Number.NaN,
      count: values.length,
    });
  }

  return rows.sort(
    (a, b) => compareText(a.weekdayLabel, b.weekdayLabel) || compareText(a.timeOfDay, b.timeOfDay),
  );
}

/**
 * Keeps samples taken on the selected weekdays. An empty or missing selection
 * keeps every sample.
 */
export function filterByWeekdays(
  samples: readonly BucketedSample[],
  weekdays: readonly WeekdayNumber[] | undefined,
): BucketedSample[] {
  if (!weekdays || weekdays.length === 0) {
    return [...samples];
  }
  const selected = new Set<number>(weekdays);
  return samples.filter((s) => selected.has(s.weekday));
}
