import type { Response } from 'express';
import { ZodError } from 'zod';
import { ErrorCodes, type ApiError, type ApiResponse, type ErrorCode } from '../types/api.types';

function requestIdOf(res: Response): string | undefined {
  const traceId: unknown = res.locals.traceId;
  return typeof traceId === 'string' ? traceId : undefined;
}

// Build a standard ApiResponse without sending
export function buildOk<T>(data: T, requestId?: string): ApiResponse<T> {
  return {
    success: true,
    data,
    timestamp: new Date().toISOString(),
    ...(requestId ? { requestId } : {}),
  };
}

export function buildError(
  code: ErrorCode,
  message: string,
  details?: Record<string, unknown>,
  requestId?: string
): ApiResponse<null> {
  const err: ApiError = { code, message, ...(details ? { details } : {}) };
  return {
    success: false,
    error: err,
    timestamp: new Date().toISOString(),
    ...(requestId ? { requestId } : {}),
  };
}

// Express helpers
export function ok<T>(res: Response, data: T, status = 200): Response<ApiResponse<T>> {
  return res.status(status).json(buildOk(data, requestIdOf(res)));
}

export function fail(
  res: Response,
  code: ErrorCode,
  message: string,
  status = 400,
  details?: Record<string, unknown>
): Response<ApiResponse<null>> {
  return res.status(status).json(buildError(code, message, details, requestIdOf(res)));
}

export function mapZodIssues(error: ZodError): { issues: Array<{ path: string; message: string; code: string }> } {
  return {
    issues: error.issues.map((i) => ({
      path: i.path.join('.'),
      message: i.message,
      code: i.code,
    })),
  };
}

export function failFromZod(
  res: Response,
  error: ZodError,
  source: 'body' | 'params' | 'query' = 'body'
): Response<ApiResponse<null>> {
  const details = { source, ...mapZodIssues(error) };
  return fail(res, ErrorCodes.VALIDATION_ERROR, 'Invalid request data', 400, details);
}

export { ErrorCodes };
