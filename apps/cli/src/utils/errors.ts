/**
 * Error types for a curation run.
 *
 * Fatal errors abort the run with their exit code. Source, pair and review
 * problems are handled where they happen and never reach the top level.
 */

export class CuratorError extends Error {
  constructor(
    message: string,
    public readonly exitCode: number = 1,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'CuratorError';
    Error.captureStackTrace(this, this.constructor);
  }
}

/** Bad command line or configuration */
export class ValidationError extends CuratorError {
  constructor(message: string) {
    super(message, 2);
    this.name = 'ValidationError';
  }
}

/** Input catalog missing, unreadable or not a `<datafile>` */
export class CatalogError extends CuratorError {
  constructor(message: string, public readonly path: string, originalError?: unknown) {
    super(message, 1, originalError);
    this.name = 'CatalogError';
  }
}

/** Curated catalog could not be written */
export class OutputError extends CuratorError {
  constructor(message: string, public readonly path: string, originalError?: unknown) {
    super(message, 1, originalError);
    this.name = 'OutputError';
  }
}

export function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}

export function exitCodeFor(error: unknown): number {
  if (error instanceof CuratorError) {
    return error.exitCode;
  }
  return 1;
}
