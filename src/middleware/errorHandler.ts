import { Request, Response, NextFunction } from 'express';
import { RankingError } from '../utils/errors';
import { logger } from '../utils/logger';

interface HttpLikeError {
  status?: unknown;
  statusCode?: unknown;
  message?: unknown;
  stack?: unknown;
}

const isHttpLikeError = (error: unknown): error is HttpLikeError =>
  typeof error === 'object' && error !== null;

const statusOf = (error: unknown): number => {
  if (error instanceof RankingError) {
    return error.statusCode;
  }
  if (isHttpLikeError(error)) {
    // body-parser sets `status` on malformed JSON
    if (typeof error.statusCode === 'number') return error.statusCode;
    if (typeof error.status === 'number') return error.status;
  }
  return 500;
};

// Global error handler
export const errorHandler = (
  error: unknown,
  req: Request,
  res: Response,
  // Express recognises error middleware by its four parameters
  _next: NextFunction
) => {
  const statusCode = statusOf(error);
  if (statusCode < 500) {
    logger.warn(`Request rejected with ${statusCode}:`, error);
  } else {
    logger.error('Unhandled error:', error);
  }

  const message = statusCode < 500 && isHttpLikeError(error) && typeof error.message === 'string'
    ? error.message
    : 'Internal server error';
  const stack = isHttpLikeError(error) && typeof error.stack === 'string' ? error.stack : undefined;

  res.status(statusCode).json({
    success: false,
    error: message,
    ...(process.env.NODE_ENV === 'development' && stack ? { stack } : {}),
  });
};

// 404 handler middleware
export const notFoundHandler = (req: Request, res: Response) => {
  res.status(404).json({
    success: false,
    error: `Route ${req.method} ${req.originalUrl} not found`,
  });
};
