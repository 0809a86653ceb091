import type { Request, Response, NextFunction } from 'express';
import { getCompositionRoot } from '../app/composition-root';
import { requireAuth } from '../middleware/auth.middleware';
import { ok } from '../utils/api-response';
import type { SaveAnswerBody } from '../utils/validation.schemas';

/**
 * POST /api/v1/questions/:questionId/vote
 * Toggles the student's vote and returns the new count.
 */
export async function toggleVote(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { questionId }: { questionId: number } = res.locals.params;
    const { studentId }: { studentId: string } = req.body;
    const outcome = await getCompositionRoot()
      .getVoteAggregatorService()
      .toggleVote(questionId, studentId, req.meetingAccess);
    ok(res, outcome);
  } catch (error) {
    next(error);
  }
}

export async function approveQuestion(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { questionId }: { questionId: number } = res.locals.params;
    const question = await getCompositionRoot().getModerationService().approveQuestion(questionId, requireAuth(req));
    ok(res, { question });
  } catch (error) {
    next(error);
  }
}

export async function rejectQuestion(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { questionId }: { questionId: number } = res.locals.params;
    const question = await getCompositionRoot().getModerationService().rejectQuestion(questionId, requireAuth(req));
    ok(res, { question });
  } catch (error) {
    next(error);
  }
}

export async function toggleAnsweredInClass(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { questionId }: { questionId: number } = res.locals.params;
    const question = await getCompositionRoot().getQuestionService().toggleAnsweredInClass(questionId, requireAuth(req));
    ok(res, { question });
  } catch (error) {
    next(error);
  }
}

export async function getAnswer(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { questionId }: { questionId: number } = res.locals.params;
    const answer = await getCompositionRoot().getAnswerService().getAnswer(questionId, requireAuth(req));
    ok(res, { answer });
  } catch (error) {
    next(error);
  }
}

/**
 * PUT /api/v1/questions/:questionId/answer
 * Creates or replaces the written answer; `isApproved` publishes it.
 */
export async function saveAnswer(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { questionId }: { questionId: number } = res.locals.params;
    const body: SaveAnswerBody = req.body;
    const answer = await getCompositionRoot()
      .getAnswerService()
      .saveAnswer(questionId, { answerText: body.answerText, isApproved: body.isApproved }, requireAuth(req));
    ok(res, { answer });
  } catch (error) {
    next(error);
  }
}

export async function publishAnswer(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { questionId }: { questionId: number } = res.locals.params;
    const answer = await getCompositionRoot().getAnswerService().publishAnswer(questionId, requireAuth(req));
    ok(res, { answer });
  } catch (error) {
    next(error);
  }
}

export async function deleteAnswer(req: Request, res: Response, next: NextFunction): Promise<void> {
  try {
    const { questionId }: { questionId: number } = res.locals.params;
    await getCompositionRoot().getAnswerService().deleteAnswer(questionId, requireAuth(req));
    ok(res, { deleted: true, questionId });
  } catch (error) {
    next(error);
  }
}
