import type { Request, Response, NextFunction, RequestHandler } from 'express';
import rateLimit from 'express-rate-limit';
import { fail, ErrorCodes } from '../utils/api-response';
import { logger } from '../utils/logger';

export interface RateLimitOptions {
  disabled: boolean;
}

interface LimiterSpec {
  name: string;
  windowMs: number;
  limit: number;
  message: string;
}

const FIFTEEN_MINUTES = 15 * 60 * 1000;

const LIMITERS = {
  global: {
    name: 'global',
    windowMs: FIFTEEN_MINUTES,
    limit: 1000,
    message: 'Too many requests from this IP, please try again later.',
  },
  login: {
    name: 'login',
    windowMs: FIFTEEN_MINUTES,
    limit: 10,
    message: 'Too many login attempts, please try again later.',
  },
  register: {
    name: 'register',
    windowMs: 60 * 60 * 1000,
    limit: 5,
    message: 'Too many registrations from this IP, please try again later.',
  },
  questionSubmit: {
    name: 'question_submit',
    windowMs: 60 * 1000,
    limit: 10,
    message: 'You are submitting questions too quickly, please slow down.',
  },
  meetingPassword: {
    name: 'meeting_password',
    windowMs: FIFTEEN_MINUTES,
    limit: 20,
    message: 'Too many password attempts, please try again later.',
  },
  lifecycle: {
    name: 'lifecycle',
    windowMs: 60 * 1000,
    limit: 30,
    message: 'Too many meeting actions, please slow down.',
  },
} satisfies Record<string, LimiterSpec>;

export type LimiterName = keyof typeof LIMITERS;

const passThrough: RequestHandler = (_req, _res, next) => next();

function isInfraPath(req: Request): boolean {
  return req.path === '/api/v1/health' || req.path === '/api/v1/ready' || req.path === '/metrics';
}

function buildLimiter(spec: LimiterSpec): RequestHandler {
  return rateLimit({
    windowMs: spec.windowMs,
    limit: spec.limit,
    standardHeaders: true,
    legacyHeaders: false,
    skip: (req) => req.method === 'OPTIONS' || isInfraPath(req),
    handler: (req: Request, res: Response, _next: NextFunction) => {
      logger.warn('rate-limit:exceeded', { limiter: spec.name, path: req.path });
      fail(res, ErrorCodes.RATE_LIMITED, spec.message, 429, {
        retryAfterSeconds: Math.ceil(spec.windowMs / 1000),
      });
    },
  });
}

export type RateLimiters = Record<LimiterName, RequestHandler>;

/**
 * Builds every limiter once per app. Each `createApp` call gets fresh
 * in-memory stores.
 */
export function createRateLimiters(options: RateLimitOptions): RateLimiters {
  if (options.disabled) {
    logger.info('rate-limit:disabled');
  }
  const make = (spec: LimiterSpec): RequestHandler => (options.disabled ? passThrough : buildLimiter(spec));
  return {
    global: make(LIMITERS.global),
    login: make(LIMITERS.login),
    register: make(LIMITERS.register),
    questionSubmit: make(LIMITERS.questionSubmit),
    meetingPassword: make(LIMITERS.meetingPassword),
    lifecycle: make(LIMITERS.lifecycle),
  };
}
