import type { Request, Response, NextFunction } from 'express';
import { ZodError, type ZodTypeAny } from 'zod';
import { fail, failFromZod, ErrorCodes } from '../utils/api-response';
import { logger } from '../utils/logger';

type Source = 'body' | 'query' | 'params';

function handleValidationError(res: Response, error: unknown, source: Source): Response {
  if (error instanceof ZodError) {
    return failFromZod(res, error, source);
  }
  logger.error('validation:unexpected_error', {
    source,
    error: error instanceof Error ? error.message : String(error),
  });
  return fail(res, ErrorCodes.INTERNAL_ERROR, 'An unexpected error occurred', 500);
}

/** Replaces `req.body` with the parsed (trimmed, defaulted) value. */
export function validate(schema: ZodTypeAny) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      req.body = await schema.parseAsync(req.body);
      next();
    } catch (error) {
      handleValidationError(res, error, 'body');
    }
  };
}

/** Parsed query is exposed as `res.locals.query`; `req.query` stays untouched. */
export function validateQuery(schema: ZodTypeAny) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.locals.query = await schema.parseAsync(req.query);
      next();
    } catch (error) {
      handleValidationError(res, error, 'query');
    }
  };
}

/** Parsed params are exposed as `res.locals.params` (ids coerced to numbers). */
export function validateParams(schema: ZodTypeAny) {
  return async (req: Request, res: Response, next: NextFunction) => {
    try {
      res.locals.params = await schema.parseAsync(req.params);
      next();
    } catch (error) {
      handleValidationError(res, error, 'params');
    }
  };
}
