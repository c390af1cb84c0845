import { formatTimeOfDay } from '../time/timeOfDay.js';
import { weekdayName } from '../time/weekday.js';
import type { ScheduleWindow } from './types.js';

/**
 * One-line caption for a collector schedule.
 *
 * @example
 * describeSchedule(window) // "Mon, Tue, Wed 07:00–09:30 every 30 min"
 */
export function describeSchedule(schedule: ScheduleWindow): string {
  const days = [...schedule.days]
    .sort((a, b) => a - b)
    .map((day) => weekdayName(day).slice(0, 3))
    .join(', ');
  const start = formatTimeOfDay(schedule.start.hour, schedule.start.minute);
  const end = formatTimeOfDay(schedule.end.hour, schedule.end.minute);
  return `${days} ${start}–${end} every ${schedule.intervalMinutes} min`;
}
