import type { AnswerRecord, AnswerRepositoryPort } from './ports/answer.repository.port';
import type { QuestionWithMeeting } from './ports/question.repository.port';
import type { MeetingAccessService } from './meeting-access.service';
import type { MeetingBroadcaster } from './meeting-broadcaster.service';
import type { AuthContext } from '../types/auth.types';
import type { InstructorAnswerView, MeetingEvent } from '../types/meeting.types';
import { toInstructorAnswerView, toPublishedAnswerView } from '../utils/question-views';
import { NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';

export const MAX_ANSWER_LENGTH = 10000;

export interface SaveAnswerInput {
  answerText: string;
  isApproved: boolean;
}

/**
 * At most one written answer per question, stored as markdown source.
 * Students only ever see published answers.
 */
export class AnswerService {
  constructor(
    private readonly answers: AnswerRepositoryPort,
    private readonly access: MeetingAccessService,
    private readonly broadcaster: MeetingBroadcaster
  ) {}

  async getAnswer(questionId: number, auth: AuthContext): Promise<InstructorAnswerView> {
    await this.access.getOwnedQuestion(questionId, auth);
    const answer = await this.answers.getByQuestionId(questionId);
    if (!answer) throw new NotFoundError('Answer not found');
    return toInstructorAnswerView(answer);
  }

  async saveAnswer(questionId: number, input: SaveAnswerInput, auth: AuthContext): Promise<InstructorAnswerView> {
    const question = await this.access.getOwnedQuestion(questionId, auth);
    const previous = await this.answers.getByQuestionId(questionId);
    const saved = await this.answers.upsertAnswer({
      question_id: questionId,
      instructor_id: auth.instructorId,
      answer_text: input.answerText,
      is_approved: input.isApproved,
    });
    logger.info('answer:saved', { questionId, published: saved.is_approved, created: previous === null });
    await this.announceChange(question, previous, saved);
    return toInstructorAnswerView(saved);
  }

  async publishAnswer(questionId: number, auth: AuthContext): Promise<InstructorAnswerView> {
    const question = await this.access.getOwnedQuestion(questionId, auth);
    const previous = await this.answers.getByQuestionId(questionId);
    if (!previous) throw new NotFoundError('Answer not found');
    const published = await this.answers.setApproved(questionId, true);
    if (!published) throw new NotFoundError('Answer not found');
    await this.announceChange(question, previous, published);
    return toInstructorAnswerView(published);
  }

  async deleteAnswer(questionId: number, auth: AuthContext): Promise<void> {
    const question = await this.access.getOwnedQuestion(questionId, auth);
    const deleted = await this.answers.deleteByQuestionId(questionId);
    if (!deleted) throw new NotFoundError('Answer not found');
    logger.info('answer:deleted', { questionId });
    await this.announceChange(question, deleted, null);
  }

  private async announceChange(
    question: QuestionWithMeeting,
    before: AnswerRecord | null,
    after: AnswerRecord | null
  ): Promise<void> {
    const wasPublished = before?.is_approved === true;
    let event: MeetingEvent | null = null;
    if (after?.is_approved) {
      event = { type: 'answer_published', question_id: question.id, answer: toPublishedAnswerView(after) };
    } else if (wasPublished) {
      event = { type: 'answer_retracted', question_id: question.id };
    }
    if (!event) return;
    if (question.status === 'approved') {
      await this.broadcaster.toAll(question, event);
    } else {
      await this.broadcaster.toInstructors(question, event);
    }
  }
}
