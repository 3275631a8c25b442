/**
 * Errors raised by the services. The error handler middleware reads `status`
 * the same way it reads it on ad-hoc `Object.assign(new Error(), { status })` errors.
 */
export class HttpError extends Error {
  readonly status: number;
  readonly details?: unknown;

  constructor(status: number, message: string, details?: unknown) {
    super(message);
    this.name = new.target.name;
    this.status = status;
    this.details = details;
  }
}

export class InvalidRequestError extends HttpError {
  constructor(message: string, details?: unknown) {
    super(400, message, details);
  }
}

export class NotFoundError extends HttpError {
  constructor(message = 'Not found') {
    super(404, message);
  }
}

export class CatalogUnavailableError extends HttpError {
  constructor(cause?: unknown) {
    super(503, 'Exercise catalog unavailable');
    this.cause = cause;
  }
}

export class LogWriteError extends HttpError {
  constructor(cause?: unknown) {
    super(500, 'Failed to log exercise');
    this.cause = cause;
  }
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
