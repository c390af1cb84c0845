import { readFile } from 'node:fs/promises';
import { parseSamples, type LoadOptions } from './csv.js';
import { DataUnavailableError, FileNotFoundError, isNodeError } from './errors.js';
import type { BucketedSample, CommuteSource } from './types.js';

/**
 * Outcome of {@link loadSamplesSafely}: the samples, or none plus the reason.
 */
export interface LoadResult {
  samples: BucketedSample[];
  error?: DataUnavailableError;
}

export function describeSource(source: CommuteSource): string {
  return source.kind === 'file' ? source.path : (source.name ?? '<buffer>');
}

async function readSource(source: CommuteSource): Promise<string> {
  if (source.kind === 'buffer') {
    return typeof source.data === 'string' ? source.data : new TextDecoder('utf-8').decode(source.data);
  }

  try {
    return await readFile(source.path, 'utf-8');
  } catch (error) {
    if (isNodeError(error) && error.code === 'ENOENT') {
      throw new FileNotFoundError(source.path, { cause: error });
    }
    const reason = error instanceof Error ? error.message : String(error);
    throw new DataUnavailableError(source.path, `unreadable: ${reason}`, { cause: error });
  }
}

/**
 * Reads a commute CSV source and returns its bucketed samples.
 *
 * Pure function of the source contents: loading an unchanged file twice yields
 * equal sequences.
 *
 * @throws FileNotFoundError if the file does not exist
 * @throws DataUnavailableError if it cannot be read or parsed
 */
export async function loadSamples(
  source: CommuteSource,
  options: LoadOptions,
): Promise<BucketedSample[]> {
  const text = await readSource(source);
  return parseSamples(text, options, describeSource(source));
}

/**
 * Caller-side fallback for {@link loadSamples}: a missing or malformed source
 * becomes zero samples together with the error, so one bad file renders as an
 * empty chart instead of failing the page.
 *
 * Errors other than {@link DataUnavailableError} are rethrown.
 */
export async function loadSamplesSafely(
  source: CommuteSource,
  options: LoadOptions,
): Promise<LoadResult> {
  try {
    return { samples: await loadSamples(source, options) };
  } catch (error) {
    if (error instanceof DataUnavailableError) {
      return { samples: [], error };
    }
    throw error;
  }
}
