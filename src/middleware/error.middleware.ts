import type { Request, Response, NextFunction } from 'express';
import { PipelineError, httpStatusFor } from '../core/errors.js';
import { createLogger } from '../core/logger.js';

const logger = createLogger('HTTP');

function statusFromError(err: unknown): number {
  if (err instanceof PipelineError) return httpStatusFor(err.code);
  // body-parser and friends set `status` on client errors such as malformed JSON
  if (typeof err === 'object' && err !== null && 'status' in err && typeof err.status === 'number') {
    return err.status;
  }
  return 500;
}

export const errorMiddleware = (err: unknown, req: Request, res: Response, _next: NextFunction) => {
  const statusCode = statusFromError(err);
  const message = err instanceof Error ? err.message : 'An unexpected error occurred';

  logger.error(`${req.method} ${req.path}`, String(statusCode), message);

  res.status(statusCode).json({
    success: false,
    error: statusCode >= 500 && !(err instanceof PipelineError) ? 'An unexpected error occurred' : message,
    ...(err instanceof PipelineError && { code: err.code }),
    // In development, send the stack trace to help debug
    ...(process.env.NODE_ENV === 'development' && err instanceof Error && { stack: err.stack })
  });
};
