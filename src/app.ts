import dotenv from 'dotenv';

if (process.env.NODE_ENV === 'test') {
  dotenv.config({ path: '.env.test' });
} else {
  dotenv.config();
}

import express, { type Express } from 'express';
import cors, { type CorsOptions } from 'cors';
import helmet from 'helmet';
import { createInstructorRoutes } from './routes/instructor.routes';
import { createClassRoutes } from './routes/class.routes';
import { createMeetingRoutes } from './routes/meeting.routes';
import { createInstructorMeetingRoutes } from './routes/instructor-meeting.routes';
import { createQuestionRoutes } from './routes/question.routes';
import { createAdminRoutes } from './routes/admin.routes';
import { createHealthRoutes } from './routes/health.routes';
import { createRateLimiters } from './middleware/rate-limit.middleware';
import { traceIdMiddleware } from './middleware/trace-id.middleware';
import { requestLoggingMiddleware } from './middleware/request-logging.middleware';
import { httpMetricsMiddleware } from './middleware/metrics.middleware';
import { errorLoggingHandler, notFoundHandler } from './middleware/error-logging.middleware';
import { getCompositionRoot } from './app/composition-root';
import { promClient } from './metrics/registry';
import { logger } from './utils/logger';

let defaultMetricsStarted = false;

function startDefaultMetrics(env: string): void {
  if (defaultMetricsStarted || env === 'test') return;
  promClient.collectDefaultMetrics();
  defaultMetricsStarted = true;
}

function buildCorsOptions(allowed: readonly string[]): CorsOptions {
  return {
    origin: (origin, callback) => {
      // Same-origin and non-browser clients send no Origin header
      if (!origin || allowed.includes(origin)) return callback(null, true);
      logger.warn('cors:origin_rejected', { origin });
      return callback(null, false);
    },
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'PATCH', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type', 'Authorization', 'X-API-Key', 'X-Meeting-Token', 'X-Trace-Id'],
    exposedHeaders: ['X-Trace-Id', 'Content-Disposition'],
  };
}

/**
 * Builds the Express app on top of the current composition root. Every call
 * gets its own rate limiter stores.
 */
export function createApp(): Express {
  const config = getCompositionRoot().getConfig();
  const limiters = createRateLimiters({ disabled: config.rateLimitDisabled });
  const app = express();

  if (config.env === 'test') {
    app.set('trust proxy', 'loopback');
  }

  app.use(traceIdMiddleware);
  app.use(requestLoggingMiddleware);
  app.use(cors(buildCorsOptions(config.corsOrigins)));
  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'none'"],
          frameAncestors: ["'none'"],
        },
      },
      crossOriginResourcePolicy: { policy: 'same-site' },
      referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
    })
  );
  app.use('/api/', limiters.global);
  app.use(express.json({ limit: '100kb' }));
  app.use(httpMetricsMiddleware);

  app.use('/api/v1', createHealthRoutes());

  startDefaultMetrics(config.env);
  app.get('/metrics', async (_req, res, next) => {
    try {
      res.set('Content-Type', promClient.register.contentType);
      res.end(await promClient.register.metrics());
    } catch (error) {
      next(error);
    }
  });

  app.use('/api/v1/instructors', createInstructorRoutes(limiters));
  app.use('/api/v1/classes', createClassRoutes(limiters));
  app.use('/api/v1/meetings', createMeetingRoutes(limiters));
  app.use('/api/v1/instructor/meetings', createInstructorMeetingRoutes(limiters));
  app.use('/api/v1/questions', createQuestionRoutes());
  app.use('/api/v1/admin', createAdminRoutes());

  app.use(notFoundHandler);
  app.use(errorLoggingHandler);

  return app;
}
