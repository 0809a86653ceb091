import type { NextFunction, Request, Response } from 'express';
import { getOrCreateCounter, getOrCreateHistogram } from '../metrics/registry';

const httpRequestCounter = getOrCreateCounter('http_requests_total', 'Total number of HTTP requests', [
  'method',
  'route',
  'status',
]);

const httpRequestDuration = getOrCreateHistogram(
  'http_request_duration_seconds',
  'Duration of HTTP requests in seconds',
  ['method', 'route', 'status'],
  [0.005, 0.01, 0.025, 0.05, 0.1, 0.2, 0.4, 0.8, 1.6, 3.2]
);

// Matched route pattern keeps label cardinality bounded (no raw codes or ids)
export function routeLabel(req: Request): string {
  const matched: unknown = req.route?.path;
  if (typeof matched === 'string') return `${req.baseUrl}${matched}`;
  return 'unmatched';
}

export function httpMetricsMiddleware(req: Request, res: Response, next: NextFunction) {
  const endTimer = httpRequestDuration.startTimer();

  res.on('finish', () => {
    const labels = { method: req.method, route: routeLabel(req), status: String(res.statusCode) };
    httpRequestCounter.inc(labels);
    endTimer(labels);
  });

  next();
}
