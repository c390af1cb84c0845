import { readFile } from 'node:fs/promises';
import { load as parseYaml } from 'js-yaml';
import type { ZodError } from 'zod';
import { isNodeError } from '../samples/errors.js';
import { dashboardConfigSchema } from './schema.js';
import type { DashboardConfig } from './types.js';

export class ConfigError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'ConfigError';
  }
}

function describeIssue(error: ZodError): string {
  const [issue] = error.issues;
  const path = issue.path.join('.');
  return path === '' ? issue.message : `${path}: ${issue.message}`;
}

/**
 * Parses and validates config.yaml text. An empty document is an empty config.
 *
 * @throws ConfigError with the first problem found
 */
export function parseDashboardConfig(text: string): DashboardConfig {
  let document: unknown;
  try {
    document = parseYaml(text);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new ConfigError(`invalid YAML: ${reason}`, { cause: error });
  }

  const result = dashboardConfigSchema.safeParse(document ?? {});
  if (!result.success) {
    throw new ConfigError(`invalid config: ${describeIssue(result.error)}`, { cause: result.error });
  }
  return result.data;
}

/**
 * Reads the optional itinerary config.
 *
 * A missing file returns undefined. So does an unreadable or invalid one,
 * after a warning: labels then fall back to file names.
 */
export async function loadDashboardConfig(path: string): Promise<DashboardConfig | undefined> {
  let text: string;
  try {
    text = await readFile(path, 'utf-8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      return undefined;
    }
    console.warn(`[loadDashboardConfig] Cannot read ${path}, ignoring it`, error);
    return undefined;
  }

  try {
    return parseDashboardConfig(text);
  } catch (error) {
    if (error instanceof ConfigError) {
      console.warn(`[loadDashboardConfig] ${path}: ${error.message}; falling back to file names`);
      return undefined;
    }
    throw error;
  }
}
