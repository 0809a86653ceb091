import { Router } from 'express';
import {
  listClasses,
  createClass,
  getClass,
  updateClass,
  archiveClass,
  createMeeting,
  listMeetings,
} from '../controllers/class.controller';
import { authenticate } from '../middleware/auth.middleware';
import { validate, validateParams, validateQuery } from '../middleware/validation.middleware';
import type { RateLimiters } from '../middleware/rate-limit.middleware';
import {
  classIdParamsSchema,
  createClassSchema,
  createMeetingSchema,
  listClassesQuerySchema,
  updateClassSchema,
} from '../utils/validation.schemas';

export function createClassRoutes(limiters: RateLimiters): Router {
  const router = Router();
  router.use(authenticate);

  // Class CRUD (DELETE archives)
  router.get('/', validateQuery(listClassesQuerySchema), listClasses);
  router.post('/', validate(createClassSchema), createClass);
  router.get('/:classId', validateParams(classIdParamsSchema), getClass);
  router.put('/:classId', validateParams(classIdParamsSchema), validate(updateClassSchema), updateClass);
  router.delete('/:classId', validateParams(classIdParamsSchema), archiveClass);

  // Meetings within a class
  router.post(
    '/:classId/meetings',
    limiters.lifecycle,
    validateParams(classIdParamsSchema),
    validate(createMeetingSchema),
    createMeeting
  );
  router.get('/:classId/meetings', validateParams(classIdParamsSchema), listMeetings);

  return router;
}
