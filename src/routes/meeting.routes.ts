import { Router } from 'express';
import { getMeeting, verifyMeetingPassword, submitQuestion } from '../controllers/meeting.controller';
import { resolveMeetingAccess } from '../middleware/auth.middleware';
import { validate, validateParams, validateQuery } from '../middleware/validation.middleware';
import type { RateLimiters } from '../middleware/rate-limit.middleware';
import {
  meetingCodeParamsSchema,
  studentViewQuerySchema,
  submitQuestionSchema,
  verifyMeetingPasswordSchema,
} from '../utils/validation.schemas';

/**
 * Student-facing routes, addressed by meeting code. No instructor auth;
 * password-protected meetings need an `X-Meeting-Token`.
 */
export function createMeetingRoutes(limiters: RateLimiters): Router {
  const router = Router();

  router.get(
    '/:meetingCode',
    validateParams(meetingCodeParamsSchema),
    validateQuery(studentViewQuerySchema),
    resolveMeetingAccess,
    getMeeting
  );
  router.post(
    '/:meetingCode/verify-password',
    limiters.meetingPassword,
    validateParams(meetingCodeParamsSchema),
    validate(verifyMeetingPasswordSchema),
    verifyMeetingPassword
  );
  router.post(
    '/:meetingCode/questions',
    limiters.questionSubmit,
    validateParams(meetingCodeParamsSchema),
    validate(submitQuestionSchema),
    resolveMeetingAccess,
    submitQuestion
  );

  return router;
}
