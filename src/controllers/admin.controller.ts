import type { Request, Response, NextFunction } from 'express';
import { getCompositionRoot } from '../app/composition-root';
import { requireAuth } from '../middleware/auth.middleware';
import { ok } from '../utils/api-response';
import { toIso } from '../utils/question-views';
import type { AuditLogQueryInput } from '../utils/validation.schemas';

/**
 * GET /api/v1/admin/instructors
 */
export async function listInstructors(_req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const instructors = await getCompositionRoot().getInstructorService().listInstructors();
    ok(res, { instructors });
  } catch (error) {
    next(error);
  }
}

async function setInstructorActive(req: Request, res: Response, next: NextFunction, isActive: boolean): Promise<void> {
  try {
    const { id }: { id: number } = res.locals.params;
    const instructor = await getCompositionRoot().getInstructorService().setActive(id, isActive, requireAuth(req));
    ok(res, { instructor });
  } catch (error) {
    next(error);
  }
}

export function activateInstructor(req: Request, res: Response, next: NextFunction): Promise<void> {
  return setInstructorActive(req, res, next, true);
}

/**
 * PATCH /api/v1/admin/instructors/:id/deactivate
 * Admins cannot deactivate themselves or anyone ranked above them.
 */
export function deactivateInstructor(req: Request, res: Response, next: NextFunction): Promise<void> {
  return setInstructorActive(req, res, next, false);
}

export async function getAuditLog(_req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const query: AuditLogQueryInput = res.locals.query;
    const entries = await getCompositionRoot().getAuditLogService().list(query);
    ok(res, {
      entries: entries.map((entry) => ({ ...entry, created_at: toIso(entry.created_at) })),
      pagination: { limit: query.limit, offset: query.offset, count: entries.length },
    });
  } catch (error) {
    next(error);
  }
}
