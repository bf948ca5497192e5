import type { Request, Response, NextFunction } from 'express';
import { logger } from '../../utils/logger.js';

/**
 * Request logging middleware
 * Skips the health check to reduce log noise
 */
export function requestLogger(req: Request, res: Response, next: NextFunction): void {
  if (req.url === '/health' || req.url.startsWith('/health?')) {
    return next();
  }

  const startTime = Date.now();

  logger.info('API Request', {
    method: req.method,
    url: req.originalUrl,
    userAgent: req.get('User-Agent'),
    ip: req.ip
  });

  res.on('finish', () => {
    logger.info('API Response', {
      method: req.method,
      url: req.originalUrl,
      statusCode: res.statusCode,
      duration: `${Date.now() - startTime}ms`,
      contentLength: res.get('Content-Length') || 0
    });
  });

  next();
}
