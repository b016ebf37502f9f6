/**
 * Error taxonomy for the import pipeline.
 * Parse failures are values (see ParseFailure in types), not exceptions.
 */

export class FetchError extends Error {
  readonly url: string;
  readonly status?: number;
  readonly timedOut: boolean;

  constructor(
    message: string,
    options: { url: string; status?: number; timedOut?: boolean; cause?: unknown }
  ) {
    super(message, { cause: options.cause });
    this.name = 'FetchError';
    this.url = options.url;
    this.status = options.status;
    this.timedOut = options.timedOut ?? false;
  }
}

export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ValidationError';
  }
}

export class PersistenceError extends Error {
  readonly operation: string;

  constructor(operation: string, cause: unknown) {
    super(`${operation} failed: ${errorMessage(cause)}`, { cause });
    this.name = 'PersistenceError';
    this.operation = operation;
  }
}

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  return String(error);
}
