import { Router } from 'express';
import {
  getInstructorMeeting,
  startMeeting,
  endMeeting,
  restartMeeting,
  reconcileVotes,
  getMeetingReport,
} from '../controllers/instructor-meeting.controller';
import { authenticate } from '../middleware/auth.middleware';
import { validateParams, validateQuery } from '../middleware/validation.middleware';
import type { RateLimiters } from '../middleware/rate-limit.middleware';
import { instructorCodeParamsSchema, reportQuerySchema } from '../utils/validation.schemas';

export function createInstructorMeetingRoutes(limiters: RateLimiters): Router {
  const router = Router();
  router.use(authenticate);

  router.get('/:instructorCode', validateParams(instructorCodeParamsSchema), getInstructorMeeting);

  // Lifecycle
  router.post('/:instructorCode/start', limiters.lifecycle, validateParams(instructorCodeParamsSchema), startMeeting);
  router.post('/:instructorCode/end', limiters.lifecycle, validateParams(instructorCodeParamsSchema), endMeeting);
  router.post('/:instructorCode/restart', limiters.lifecycle, validateParams(instructorCodeParamsSchema), restartMeeting);

  router.post('/:instructorCode/reconcile-votes', validateParams(instructorCodeParamsSchema), reconcileVotes);
  router.get(
    '/:instructorCode/report',
    validateParams(instructorCodeParamsSchema),
    validateQuery(reportQuerySchema),
    getMeetingReport
  );

  return router;
}
