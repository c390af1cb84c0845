/**
 * Zod validation schemas for config.yaml.
 *
 * Only what the dashboard uses is validated; the collector's other keys
 * (api credentials included) are stripped and never read.
 */

import { z } from 'zod';
import { dayNameToWeekday } from '../time/weekday.js';
import { minutesIntoDay, parseClockTime } from '../time/timeOfDay.js';
import type { DashboardConfig } from './types.js';

/**
 * Longest schedule interval: one day.
 */
export const MAX_INTERVAL_MINUTES = 1440;

function refineWith<T>(parse: (value: string) => T) {
  return (value: string, ctx: z.RefinementCtx): T => {
    try {
      return parse(value);
    } catch (error) {
      ctx.addIssue({
        code: z.ZodIssueCode.custom,
        message: error instanceof Error ? error.message : String(error),
      });
      return z.NEVER;
    }
  };
}

/**
 * Schema for an "HH:MM" clock time.
 */
export const clockTimeSchema = z.string().transform(refineWith(parseClockTime));

/**
 * Schema for a day name ("monday", "Mon", "thurs", ...), output as weekday number.
 */
export const dayNameSchema = z.string().transform(refineWith(dayNameToWeekday));

/**
 * Schema for a collector schedule.
 * Validates that start_time is before end_time.
 */
export const scheduleSchema = z
  .object({
    name: z.string().min(1, 'name is required'),
    days: z.array(dayNameSchema).min(1, 'at least one day is required'),
    start_time: clockTimeSchema,
    end_time: clockTimeSchema,
    interval_minutes: z
      .number()
      .int()
      .positive('interval_minutes must be positive')
      .max(MAX_INTERVAL_MINUTES, 'interval_minutes cannot exceed 1440 (1 day)'),
  })
  .refine((s) => minutesIntoDay(s.start_time) < minutesIntoDay(s.end_time), {
    message: 'start_time must be before end_time',
    path: ['start_time'],
  })
  .transform((s) => ({
    name: s.name,
    days: s.days,
    start: s.start_time,
    end: s.end_time,
    intervalMinutes: s.interval_minutes,
  }));

/**
 * Schema for an itinerary. YAML reads `id: 1` as a number, so numeric ids are
 * accepted and kept as text.
 */
export const itinerarySchema = z
  .object({
    id: z
      .union([z.string(), z.number()])
      .transform(String)
      .pipe(z.string().min(1, 'id is required')),
    name: z.string().min(1, 'name is required'),
    from: z.string().min(1, 'from address is required'),
    to: z.string().min(1, 'to address is required'),
    output_file: z.string().min(1, 'output_file is required'),
    schedules: z.array(scheduleSchema).default([]),
  })
  .transform((i) => ({
    id: i.id,
    name: i.name,
    from: i.from,
    to: i.to,
    outputFile: i.output_file,
    schedules: i.schedules,
  }));

/**
 * Schema for the whole config file.
 * Rejects duplicate itinerary ids and output files shared by several itineraries.
 */
export const dashboardConfigSchema: z.ZodType<DashboardConfig, z.ZodTypeDef, unknown> = z
  .object({
    itineraries: z.array(itinerarySchema).default([]),
  })
  .superRefine((config, ctx) => {
    const seenIds = new Set<string>();
    const seenFiles = new Set<string>();

    config.itineraries.forEach((itinerary, index) => {
      if (seenIds.has(itinerary.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate itinerary ID: ${itinerary.id}`,
          path: ['itineraries', index, 'id'],
        });
      }
      seenIds.add(itinerary.id);

      if (seenFiles.has(itinerary.outputFile)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `duplicate output_file: ${itinerary.outputFile} (used by multiple itineraries)`,
          path: ['itineraries', index, 'output_file'],
        });
      }
      seenFiles.add(itinerary.outputFile);
    });
  })
  .transform((config) => ({ itineraries: config.itineraries }));
