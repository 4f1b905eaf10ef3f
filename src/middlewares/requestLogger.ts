import { Request, Response, NextFunction } from 'express';
import logger from '../utils/logging';

/**
 * One log line per request, written when the response finishes
 */
export function requestLogger(req: Request, res: Response, next: NextFunction) {
  const startTime = Date.now();

  res.on('finish', () => {
    logger.request(`${req.method} ${req.originalUrl} ${res.statusCode}`, {
      trace_id: req.trace_id,
      method: req.method,
      path: req.originalUrl,
      status_code: res.statusCode,
      duration_ms: Date.now() - startTime,
    });
  });

  next();
}
