import type { Request, Response, NextFunction, RequestHandler } from 'express';
import multer from 'multer';
import { logger } from '../../utils/logger.js';

/**
 * Base class for errors that map directly onto an HTTP status
 */
export class ApiError extends Error {
  constructor(message: string, public readonly statusCode: number) {
    super(message);
    this.name = 'ApiError';
  }
}

export class NotFoundError extends ApiError {
  constructor(message: string) {
    super(message, 404);
    this.name = 'NotFoundError';
  }
}

export class PayloadTooLargeError extends ApiError {
  constructor(message: string) {
    super(message, 413);
    this.name = 'PayloadTooLargeError';
  }
}

/**
 * Forward rejections from async route handlers to the error middleware
 */
export function asyncHandler(
  handler: (req: Request, res: Response, next: NextFunction) => Promise<void>
): RequestHandler {
  return (req, res, next) => {
    handler(req, res, next).catch(next);
  };
}

/**
 * Error handling middleware. Every error response has the shape `{ error: string }`.
 */
export function errorHandler(
  error: unknown,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    // Too late for a JSON body; let Express close the connection
    next(error);
    return;
  }

  if (error instanceof ApiError) {
    if (error.statusCode >= 500) {
      logger.error(`${req.method} ${req.originalUrl} failed`, error);
    }
    res.status(error.statusCode).json({ error: error.message });
    return;
  }

  if (error instanceof multer.MulterError) {
    const status = error.code === 'LIMIT_FILE_SIZE' ? 413 : 400;
    res.status(status).json({ error: error.message });
    return;
  }

  logger.error(`Unhandled error on ${req.method} ${req.originalUrl}`, error);
  res.status(500).json({ error: 'Internal server error' });
}
