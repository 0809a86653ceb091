import type { NextFunction, Request, Response } from 'express';
import { logger } from '../utils/logger';
import { getTraceId } from './trace-id.middleware';

export function requestLoggingMiddleware(req: Request, res: Response, next: NextFunction) {
  const start = process.hrtime.bigint();
  const requestId = getTraceId(res);

  logger.info('http:start', {
    requestId,
    method: req.method,
    route: req.path,
  });

  res.on('finish', () => {
    const durationMs = Number(process.hrtime.bigint() - start) / 1_000_000;
    // auth is attached after this middleware runs, so read it at finish time
    logger.info('http:finish', {
      requestId,
      method: req.method,
      route: req.path,
      statusCode: res.statusCode,
      durationMs: Math.round(durationMs),
      instructorId: req.auth?.instructorId,
    });
  });

  next();
}
