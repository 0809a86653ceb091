import type { VoteRepositoryPort, VoteToggleResult } from './ports/vote.repository.port';
import type { QuestionRepositoryPort } from './ports/question.repository.port';
import type { MeetingAccessService } from './meeting-access.service';
import type { MeetingBroadcaster } from './meeting-broadcaster.service';
import type { AuditLogService } from './audit-log.service';
import type { AuthContext, MeetingAccess } from '../types/auth.types';
import { ConflictError, NotFoundError } from '../utils/errors';
import { ErrorCodes } from '../types/api.types';
import { voteTogglesTotal } from '../metrics/qa.metrics';
import { logger } from '../utils/logger';

export interface VoteToggleOutcome {
  questionId: number;
  upvotes: number;
  voted: boolean;
}

const MAX_ATTEMPTS = 2;

/**
 * One vote per (question, student). `upvotes` is rewritten from the vote rows
 * inside the toggle transaction, so it always equals the vote count.
 */
export class VoteAggregatorService {
  constructor(
    private readonly votes: VoteRepositoryPort,
    private readonly questions: QuestionRepositoryPort,
    private readonly access: MeetingAccessService,
    private readonly broadcaster: MeetingBroadcaster,
    private readonly audit: AuditLogService
  ) {}

  async toggleVote(questionId: number, studentId: string, access?: MeetingAccess): Promise<VoteToggleOutcome> {
    const question = await this.questions.getWithMeeting(questionId);
    // Non-approved questions do not exist as far as students are concerned
    if (!question || question.status !== 'approved') {
      voteTogglesTotal.inc({ result: 'not_found' });
      throw new NotFoundError('Question not found');
    }
    this.access.assertStudentAccess(
      { meeting_code: question.meeting_code, has_password: question.meeting_has_password },
      access
    );

    let result: VoteToggleResult = { outcome: 'contended' };
    for (let attempt = 1; attempt <= MAX_ATTEMPTS; attempt += 1) {
      result = await this.votes.toggleVote(questionId, studentId);
      if (result.outcome !== 'contended') break;
      logger.debug('vote:contended', { questionId, attempt });
    }

    voteTogglesTotal.inc({ result: result.outcome });
    switch (result.outcome) {
      case 'toggled':
        await this.broadcaster.toAll(question, {
          type: 'vote_update',
          question_id: questionId,
          upvotes: result.upvotes,
        });
        return { questionId, upvotes: result.upvotes, voted: result.voted };
      case 'not_found':
      case 'not_visible':
        throw new NotFoundError('Question not found');
      case 'meeting_ended':
        throw new ConflictError('Meeting has ended', ErrorCodes.MEETING_NOT_ACTIVE);
      case 'contended':
        throw new ConflictError('Vote is being updated concurrently, please retry');
    }
  }

  listVotedQuestionIds(meetingId: number, studentId: string): Promise<number[]> {
    return this.votes.listVotedQuestionIds(meetingId, studentId);
  }

  async reconcileVoteCounts(instructorCode: string, auth: AuthContext): Promise<{ corrected: number }> {
    const meeting = await this.access.getOwnedMeeting(instructorCode, auth);
    const corrected = await this.votes.reconcileMeeting(meeting.id);
    if (corrected > 0) {
      logger.warn('vote:reconciled', { meetingId: meeting.id, corrected });
    }
    await this.audit.record(auth, 'meeting.reconcile_votes', 'meeting', meeting.id, { corrected });
    return { corrected };
  }
}
