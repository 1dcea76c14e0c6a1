/** A failed GET: either an HTTP status or a network error code */
export class HttpError extends Error {
  constructor(
    message: string,
    public readonly url: string,
    public readonly status?: number,
    public readonly code?: string,
    public readonly originalError?: unknown
  ) {
    super(message);
    this.name = 'HttpError';
    Error.captureStackTrace(this, this.constructor);
  }

  get isNotFound(): boolean {
    return this.status === 404;
  }
}
