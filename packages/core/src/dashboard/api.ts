/**
 * Request and response shapes shared by the dashboard server and web app.
 */

import { z } from 'zod';
import type { TimeOfDayAggregate, WeekdayTimeAggregate } from '../aggregate/aggregate.js';
import type { Direction } from '../itineraries/catalog.js';
import type { WeekdayNumber } from '../time/weekday.js';
import { isWeekdayNumber } from '../time/weekday.js';

/**
 * Body of `POST /api/login`.
 */
export interface LoginRequest {
  password: string;
}

export const loginRequestSchema: z.ZodType<LoginRequest> = z.object({
  password: z.string(),
});

export interface LoginResponse {
  token: string;
}

/**
 * `GET /api/session`.
 */
export interface SessionInfo {
  passwordRequired: boolean;
  authenticated: boolean;
  refreshIntervalMs: number;
  /** "naive" or the IANA zone charts are drawn in */
  timeZone: string;
}

/**
 * Query-string weekday selection: "1,2,3" (1 = Monday). Empty means all days.
 */
export const weekdaySelectionSchema: z.ZodType<WeekdayNumber[], z.ZodTypeDef, unknown> = z
  .string()
  .optional()
  .transform((text, ctx) => {
    const weekdays: WeekdayNumber[] = [];
    if (text === undefined || text.trim() === '') {
      return weekdays;
    }
    for (const part of text.split(',')) {
      const value = Number(part.trim());
      if (!isWeekdayNumber(value)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          message: `days must be weekday numbers 1-7 (1=Monday), got '${part}'`,
        });
        return z.NEVER;
      }
      if (!weekdays.includes(value)) {
        weekdays.push(value);
      }
    }
    return weekdays.sort((a, b) => a - b);
  });

/**
 * Entry of `GET /api/itineraries`.
 */
export interface ItinerarySummary {
  id: string;
  name: string;
  description: string | undefined;
  files: Array<{ fileName: string; direction: Direction | undefined; title: string }>;
}

/**
 * Why a panel has no data.
 */
export interface PanelWarning {
  kind: 'not-found' | 'unavailable';
  message: string;
}

/**
 * One data file's charts.
 */
export interface ChartPanel {
  fileName: string;
  direction: Direction | undefined;
  title: string;
  sampleCount: number;
  byTime: TimeOfDayAggregate[];
  byWeekday: WeekdayTimeAggregate[];
  warning?: PanelWarning;
}

/**
 * `GET /api/itineraries/:id`.
 */
export interface ItineraryCharts {
  itinerary: ItinerarySummary;
  weekdays: WeekdayNumber[];
  panels: ChartPanel[];
}

export interface ErrorResponse {
  error: string;
}
