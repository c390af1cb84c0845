/**
 * Server settings read from environment variables.
 */

import { z } from 'zod';
import { DEFAULT_TIME_ZONE, isValidTimeZone, type LoadOptions } from '@commute-dashboard/core';

export interface ServerSettings {
  port: number;
  host: string;
  /** Directory holding the collector's CSV files */
  dataDir: string;
  /** Optional itinerary config (config.yaml) */
  configPath: string;
  /** Built web app to serve, if any */
  staticDir: string | undefined;
  /** Password gating the dashboard; undefined leaves it open */
  password: string | undefined;
  loadOptions: LoadOptions;
  refreshIntervalMs: number;
}

export class SettingsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SettingsError';
  }
}

/**
 * Longest refresh period whose milliseconds still fit a timer delay (2^31 - 1 ms).
 */
export const MAX_REFRESH_INTERVAL_MINUTES = Math.floor((2 ** 31 - 1) / 60_000);

const envSchema = z.object({
  PORT: z.coerce.number().int().min(0).max(65535).default(8050),
  HOST: z.string().min(1).default('0.0.0.0'),
  DATA_DIR: z.string().min(1).default('data'),
  CONFIG_PATH: z.string().min(1).default('config.yaml'),
  STATIC_DIR: z.string().min(1).optional(),
  DASHBOARD_PASSWORD: z
    .string()
    .optional()
    .transform((value) => (value === '' ? undefined : value)),
  DASHBOARD_TIME_MODE: z.enum(['zoned', 'naive']).default('zoned'),
  DASHBOARD_TIMEZONE: z
    .string()
    .default(DEFAULT_TIME_ZONE)
    .refine(isValidTimeZone, (zone) => ({ message: `unknown time zone '${zone}'` })),
  REFRESH_INTERVAL_MINUTES: z.coerce
    .number()
    .positive()
    .max(
      MAX_REFRESH_INTERVAL_MINUTES,
      `must be at most ${MAX_REFRESH_INTERVAL_MINUTES} minutes`,
    )
    .default(10),
});

/**
 * Validates the environment and maps it to settings.
 *
 * @throws SettingsError listing every invalid variable
 */
export function loadSettings(env: NodeJS.ProcessEnv): ServerSettings {
  const result = envSchema.safeParse(env);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new SettingsError(`Invalid settings: ${issues.join('; ')}`);
  }

  const vars = result.data;
  const loadOptions: LoadOptions =
    vars.DASHBOARD_TIME_MODE === 'naive'
      ? { timeMode: { kind: 'naive' } }
      : { timeMode: { kind: 'zoned', timeZone: vars.DASHBOARD_TIMEZONE } };

  return {
    port: vars.PORT,
    host: vars.HOST,
    dataDir: vars.DATA_DIR,
    configPath: vars.CONFIG_PATH,
    staticDir: vars.STATIC_DIR,
    password: vars.DASHBOARD_PASSWORD,
    loadOptions,
    refreshIntervalMs: vars.REFRESH_INTERVAL_MINUTES * 60 * 1000,
  };
}
