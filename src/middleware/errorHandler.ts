import type { ErrorRequestHandler, RequestHandler } from 'express';
import multer from 'multer';

export function statusOf(err: unknown): number {
  if (err instanceof multer.MulterError) return err.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') return err.status;
  // body-parser sets statusCode on malformed JSON
  if (typeof err === 'object' && err !== null && 'statusCode' in err && typeof err.statusCode === 'number') {
    return err.statusCode;
  }
  return 500;
}

export type ErrorBody = {
  error: string;
  details?: unknown;
  stack?: string;
};

export function errorResponse(err: unknown, development: boolean): { status: number; message: string; body: ErrorBody } {
  const status = statusOf(err);
  const message = err instanceof Error && err.message ? err.message : 'Internal server error';
  const details = typeof err === 'object' && err !== null && 'details' in err ? err.details : undefined;

  // 500 messages can carry driver internals
  const errorMessage = status >= 500 && !development ? 'Internal server error' : message;

  return {
    status,
    message,
    body: {
      error: errorMessage,
      ...(details !== undefined && status < 500 && { details }),
      ...(development && err instanceof Error && { stack: err.stack }),
    },
  };
}

export const notFoundHandler: RequestHandler = (req, _res, next) => {
  next(Object.assign(new Error(`Route ${req.method} ${req.path} not found`), { status: 404 }));
};

export function createErrorHandler(nodeEnv: string): ErrorRequestHandler {
  const development = nodeEnv === 'development';

  return (err, req, res, _next) => {
    const { status, message, body } = errorResponse(err, development);

    console.error(`[${status}] ${req.method} ${req.path}`, {
      message,
      stack: development && err instanceof Error ? err.stack : undefined,
    });

    res.status(status).json(body);
  };
}
