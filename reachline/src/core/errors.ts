/**
 * Error types surfaced to callers of the loaders and calculators.
 */

/**
 * A required input file is missing or could not be parsed.
 */
export class DataLoadError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'DataLoadError';
    this.path = path;
  }
}

/**
 * A precondition on the inputs was violated (unknown attribute, bad band width...).
 */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
