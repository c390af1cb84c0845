/**
 * The commute data of a source is missing, unreadable or does not parse as
 * two-column (timestamp, duration) CSV.
 */
export class DataUnavailableError extends Error {
  constructor(
    readonly source: string,
    readonly reason: string,
    options?: { cause?: unknown },
  ) {
    super(`${source}: ${reason}`, options);
    this.name = 'DataUnavailableError';
  }
}

/**
 * A referenced data file does not exist.
 */
export class FileNotFoundError extends DataUnavailableError {
  constructor(
    readonly path: string,
    options?: { cause?: unknown },
  ) {
    super(path, 'file not found', options);
    this.name = 'FileNotFoundError';
  }
}

export function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}
