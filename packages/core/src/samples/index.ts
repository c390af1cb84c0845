/**
 * Commute sample loading: CSV parsing, bucketing and failure handling.
 */

export type { CommuteSample, BucketedSample, CommuteSource } from './types.js';
export { DataUnavailableError, FileNotFoundError, isNodeError } from './errors.js';
export type { LoadOptions } from './csv.js';
export { NAIVE_LOAD_OPTIONS, parseSamples } from './csv.js';
export type { LoadResult } from './load.js';
export { describeSource, loadSamples, loadSamplesSafely } from './load.js';
