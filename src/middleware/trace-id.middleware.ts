import type { NextFunction, Request, Response } from 'express';
import { randomUUID } from 'crypto';

const HEADER_NAME = 'X-Trace-Id';
const MAX_TRACE_ID_LENGTH = 128;

function incomingTraceId(req: Request): string | undefined {
  const raw = req.headers['x-trace-id'] ?? req.headers['x-request-id'];
  const value = (Array.isArray(raw) ? raw[0] : raw)?.trim();
  if (!value || value.length > MAX_TRACE_ID_LENGTH) return undefined;
  return value;
}

export function traceIdMiddleware(req: Request, res: Response, next: NextFunction) {
  const traceId = incomingTraceId(req) ?? randomUUID();
  res.locals.traceId = traceId;
  res.setHeader(HEADER_NAME, traceId);
  next();
}

export function getTraceId(res: Response): string | undefined {
  const value: unknown = res.locals.traceId;
  return typeof value === 'string' ? value : undefined;
}
