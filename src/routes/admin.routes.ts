import { Router } from 'express';
import {
  listInstructors,
  activateInstructor,
  deactivateInstructor,
  getAuditLog,
} from '../controllers/admin.controller';
import { authenticate, requireRole } from '../middleware/auth.middleware';
import { validateParams, validateQuery } from '../middleware/validation.middleware';
import { auditLogQuerySchema, instructorIdParamsSchema } from '../utils/validation.schemas';

export function createAdminRoutes(): Router {
  const router = Router();
  router.use(authenticate, requireRole('admin'));

  router.get('/instructors', listInstructors);
  router.patch('/instructors/:id/activate', validateParams(instructorIdParamsSchema), activateInstructor);
  router.patch('/instructors/:id/deactivate', validateParams(instructorIdParamsSchema), deactivateInstructor);
  router.get('/audit-log', validateQuery(auditLogQuerySchema), getAuditLog);

  return router;
}
