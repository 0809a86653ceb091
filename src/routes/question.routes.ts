import { Router } from 'express';
import {
  toggleVote,
  approveQuestion,
  rejectQuestion,
  toggleAnsweredInClass,
  getAnswer,
  saveAnswer,
  publishAnswer,
  deleteAnswer,
} from '../controllers/question.controller';
import { authenticate, resolveMeetingAccess } from '../middleware/auth.middleware';
import { validate, validateParams } from '../middleware/validation.middleware';
import { questionIdParamsSchema, saveAnswerSchema, voteSchema } from '../utils/validation.schemas';

export function createQuestionRoutes(): Router {
  const router = Router();
  const byId = validateParams(questionIdParamsSchema);

  // Student
  router.post('/:questionId/vote', byId, validate(voteSchema), resolveMeetingAccess, toggleVote);

  // Moderation
  router.post('/:questionId/approve', authenticate, byId, approveQuestion);
  router.post('/:questionId/reject', authenticate, byId, rejectQuestion);
  router.post('/:questionId/answered-in-class', authenticate, byId, toggleAnsweredInClass);

  // Written answers
  router.get('/:questionId/answer', authenticate, byId, getAnswer);
  router.put('/:questionId/answer', authenticate, byId, validate(saveAnswerSchema), saveAnswer);
  router.delete('/:questionId/answer', authenticate, byId, deleteAnswer);
  router.post('/:questionId/answer/publish', authenticate, byId, publishAnswer);

  return router;
}
