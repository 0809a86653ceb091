import type { Request, Response, NextFunction } from 'express';
import { getCompositionRoot } from '../app/composition-root';
import { requireAuth } from '../middleware/auth.middleware';
import { ok } from '../utils/api-response';
import type { CreateClassBody, CreateMeetingBody, UpdateClassBody } from '../utils/validation.schemas';

export async function listClasses(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { includeArchived }: { includeArchived: boolean } = res.locals.query;
    const classes = await getCompositionRoot().getClassService().listClasses(requireAuth(req), includeArchived);
    ok(res, { classes });
  } catch (error) {
    next(error);
  }
}

export async function createClass(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const body: CreateClassBody = req.body;
    const created = await getCompositionRoot()
      .getClassService()
      .createClass(requireAuth(req), { name: body.name, description: body.description ?? null });
    ok(res, { class: created }, 201);
  } catch (error) {
    next(error);
  }
}

export async function getClass(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { classId }: { classId: number } = res.locals.params;
    const record = await getCompositionRoot().getClassService().getClass(classId, requireAuth(req));
    ok(res, { class: record });
  } catch (error) {
    next(error);
  }
}

export async function updateClass(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { classId }: { classId: number } = res.locals.params;
    const body: UpdateClassBody = req.body;
    const updated = await getCompositionRoot().getClassService().updateClass(classId, requireAuth(req), body);
    ok(res, { class: updated });
  } catch (error) {
    next(error);
  }
}

/**
 * DELETE /api/v1/classes/:classId
 * Archives the class; its meetings and questions are kept.
 */
export async function archiveClass(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { classId }: { classId: number } = res.locals.params;
    const archived = await getCompositionRoot().getClassService().archiveClass(classId, requireAuth(req));
    ok(res, { class: archived });
  } catch (error) {
    next(error);
  }
}

/**
 * POST /api/v1/classes/:classId/meetings
 */
export async function createMeeting(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { classId }: { classId: number } = res.locals.params;
    const body: CreateMeetingBody = req.body;
    const meeting = await getCompositionRoot()
      .getMeetingLifecycleService()
      .createMeeting(
        classId,
        { title: body.title, password: body.password ?? null, startImmediately: body.startImmediately },
        requireAuth(req)
      );
    ok(res, { meeting }, 201);
  } catch (error) {
    next(error);
  }
}

export async function listMeetings(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { classId }: { classId: number } = res.locals.params;
    const meetings = await getCompositionRoot().getMeetingLifecycleService().listMeetings(classId, requireAuth(req));
    ok(res, { meetings });
  } catch (error) {
    next(error);
  }
}
