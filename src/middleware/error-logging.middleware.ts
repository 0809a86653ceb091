import type { Request, Response, NextFunction } from 'express';
import { AppError } from '../utils/errors';
import { fail, ErrorCodes } from '../utils/api-response';
import { isUniqueViolation } from '../adapters/db/postgres.adapter';
import { logger } from '../utils/logger';
import { getTraceId } from './trace-id.middleware';

function bodyParserErrorType(error: unknown): string | undefined {
  if (typeof error !== 'object' || error === null || !('type' in error)) return undefined;
  return typeof error.type === 'string' ? error.type : undefined;
}

export function notFoundHandler(req: Request, res: Response): void {
  fail(res, ErrorCodes.NOT_FOUND, `Route ${req.method} ${req.path} not found`, 404);
}

/**
 * Final error handler: AppError keeps its status and code, unique violations
 * become 409, malformed JSON becomes 400 and everything else is a 500 without
 * internals in the body.
 */
export function errorLoggingHandler(error: unknown, req: Request, res: Response, next: NextFunction): void {
  if (res.headersSent) {
    return next(error);
  }
  const requestId = getTraceId(res);

  if (error instanceof AppError) {
    const log = error.statusCode >= 500 ? logger.error : logger.debug;
    log('http:app_error', {
      requestId,
      method: req.method,
      route: req.path,
      statusCode: error.statusCode,
      code: error.code,
      message: error.message,
    });
    fail(res, error.code, error.message, error.statusCode, error.details);
    return;
  }

  if (isUniqueViolation(error)) {
    logger.warn('http:unique_violation', { requestId, route: req.path, constraint: error.constraint });
    fail(res, ErrorCodes.CONFLICT, 'Resource already exists', 409);
    return;
  }

  const parserError = bodyParserErrorType(error);
  if (parserError === 'entity.parse.failed') {
    fail(res, ErrorCodes.VALIDATION_ERROR, 'Malformed JSON body', 400);
    return;
  }
  if (parserError === 'entity.too.large') {
    fail(res, ErrorCodes.VALIDATION_ERROR, 'Request body too large', 413);
    return;
  }

  logger.error('http:unhandled_error', {
    requestId,
    method: req.method,
    route: req.path,
    error: error instanceof Error ? error.message : String(error),
    stack: error instanceof Error ? error.stack : undefined,
  });
  fail(res, ErrorCodes.INTERNAL_ERROR, 'An unexpected error occurred', 500);
}
