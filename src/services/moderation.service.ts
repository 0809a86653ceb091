import type { ProfanityClassifierPort } from './ports/profanity-classifier.port';
import type { QuestionRepositoryPort, QuestionStatus } from './ports/question.repository.port';
import type { MeetingBroadcaster } from './meeting-broadcaster.service';
import type { MeetingAccessService } from './meeting-access.service';
import type { AuditLogService } from './audit-log.service';
import type { AuthContext } from '../types/auth.types';
import type { InstructorQuestionView } from '../types/meeting.types';
import { toInstructorQuestionView, toStudentQuestionView } from '../utils/question-views';
import { moderationDecisionsTotal } from '../metrics/qa.metrics';
import { ConflictError } from '../utils/errors';
import { logger } from '../utils/logger';

export type FlagReason = 'profanity';

export interface Classification {
  status: Extract<QuestionStatus, 'approved' | 'pending' | 'flagged'>;
  reason?: FlagReason;
  censoredText: string;
}

export interface ModerationOptions {
  profanityFilterEnabled: boolean;
  /** Hold clean questions as `pending` until an instructor approves them. */
  requireApproval: boolean;
}

type ModerationDecision = 'approved' | 'rejected';

// Rejection is final; approved questions can still be taken down
const DECIDABLE_FROM: Record<ModerationDecision, readonly QuestionStatus[]> = {
  approved: ['pending', 'flagged'],
  rejected: ['pending', 'flagged', 'approved'],
};

export class ModerationService {
  constructor(
    private readonly classifier: ProfanityClassifierPort,
    private readonly options: ModerationOptions,
    private readonly questions: QuestionRepositoryPort,
    private readonly access: MeetingAccessService,
    private readonly broadcaster: MeetingBroadcaster,
    private readonly audit: AuditLogService
  ) {}

  classify(text: string): Classification {
    if (this.options.profanityFilterEnabled && this.classifier.containsProfanity(text)) {
      return { status: 'flagged', reason: 'profanity', censoredText: this.classifier.censor(text) };
    }
    return { status: this.options.requireApproval ? 'pending' : 'approved', censoredText: text };
  }

  approveQuestion(questionId: number, auth: AuthContext): Promise<InstructorQuestionView> {
    return this.decide(questionId, 'approved', auth);
  }

  rejectQuestion(questionId: number, auth: AuthContext): Promise<InstructorQuestionView> {
    return this.decide(questionId, 'rejected', auth);
  }

  private async decide(
    questionId: number,
    status: ModerationDecision,
    auth: AuthContext
  ): Promise<InstructorQuestionView> {
    const existing = await this.access.getOwnedQuestion(questionId, auth);
    const updated = await this.questions.updateStatus(questionId, status, DECIDABLE_FROM[status], new Date());
    if (!updated) {
      throw new ConflictError(`Question is already ${existing.status}`);
    }

    moderationDecisionsTotal.inc({ decision: status });
    await this.audit.record(auth, status === 'approved' ? 'question.approve' : 'question.reject', 'question', questionId, {
      previousStatus: existing.status,
      meetingId: existing.meeting_id,
    });
    logger.info('moderation:decision', { questionId, status, previousStatus: existing.status });

    if (status === 'approved') {
      await this.broadcaster.toAll(existing, {
        type: 'question_status_changed',
        question_id: questionId,
        status,
        question: toStudentQuestionView(updated),
      });
    } else {
      await this.broadcaster.toAll(existing, { type: 'question_status_changed', question_id: questionId, status });
    }
    return toInstructorQuestionView(updated);
  }
}
