import { v4 as uuidv4 } from 'uuid';
import type { QuestionRecord, QuestionRepositoryPort } from './ports/question.repository.port';
import type { MeetingWithOwner } from './ports/meeting.repository.port';
import type { ModerationService } from './moderation.service';
import type { MeetingAccessService } from './meeting-access.service';
import type { MeetingBroadcaster } from './meeting-broadcaster.service';
import type { VoteAggregatorService } from './vote-aggregator.service';
import type { MeetingLifecycleService } from './meeting-lifecycle.service';
import type { AuthContext, MeetingAccess } from '../types/auth.types';
import type {
  InstructorMeetingView,
  InstructorQuestionView,
  StudentMeetingView,
  StudentQuestionView,
  SubmittedQuestionReceipt,
} from '../types/meeting.types';
import { deriveMeetingState, toInstructorQuestionView, toIso, toStudentQuestionView } from '../utils/question-views';
import { ConflictError, NotFoundError, ValidationError } from '../utils/errors';
import { ErrorCodes } from '../types/api.types';
import { questionsSubmittedTotal } from '../metrics/qa.metrics';
import { logger } from '../utils/logger';

export const MAX_QUESTION_LENGTH = 500;

export interface SubmitQuestionInput {
  text: string;
  studentId?: string;
}

export class QuestionService {
  constructor(
    private readonly questions: QuestionRepositoryPort,
    private readonly moderation: ModerationService,
    private readonly access: MeetingAccessService,
    private readonly broadcaster: MeetingBroadcaster,
    private readonly votes: VoteAggregatorService,
    private readonly lifecycle: MeetingLifecycleService
  ) {}

  async submitQuestion(
    meetingCode: string,
    input: SubmitQuestionInput,
    access?: MeetingAccess
  ): Promise<SubmittedQuestionReceipt> {
    const text = input.text.trim();
    if (text.length === 0 || text.length > MAX_QUESTION_LENGTH) {
      throw new ValidationError(`Question must be between 1 and ${MAX_QUESTION_LENGTH} characters`);
    }
    const meeting = await this.access.getMeetingForStudent(meetingCode, access);
    if (!meeting.is_active) {
      throw new ConflictError('Meeting is not active', ErrorCodes.MEETING_NOT_ACTIVE);
    }

    const studentId = input.studentId ?? uuidv4();
    const classification = this.moderation.classify(text);
    const result = await this.questions.insertQuestion(meeting.id, {
      student_id: studentId,
      text,
      sanitized_text: classification.censoredText,
      status: classification.status,
      flagged_reason: classification.reason ?? null,
    });

    switch (result.outcome) {
      case 'not_found':
        throw new NotFoundError('Meeting not found');
      case 'meeting_ended':
        throw new ConflictError('Meeting is not active', ErrorCodes.MEETING_NOT_ACTIVE);
      case 'inserted':
        break;
    }

    const question = result.question;
    questionsSubmittedTotal.inc({ status: question.status });
    logger.info('question:submitted', {
      meetingId: meeting.id,
      questionId: question.id,
      questionNumber: question.question_number,
      status: question.status,
    });
    await this.announce(meeting, question);

    const visible = question.status === 'approved';
    return {
      id: question.id,
      question_number: question.question_number,
      status: question.status,
      student_id: studentId,
      question: visible ? toStudentQuestionView(question) : null,
    };
  }

  async getStudentMeetingView(
    meetingCode: string,
    access?: MeetingAccess,
    studentId?: string
  ): Promise<StudentMeetingView> {
    const meeting = await this.access.getMeetingForStudent(meetingCode, access);
    const questions = await this.listQuestionsForStudents(meeting, studentId);
    return {
      title: meeting.title,
      meeting_code: meeting.meeting_code,
      class_name: meeting.class_name,
      is_active: meeting.is_active,
      state: deriveMeetingState(meeting),
      has_password: meeting.password_hash !== null,
      started_at: toIso(meeting.started_at),
      ended_at: toIso(meeting.ended_at),
      questions,
    };
  }

  async listQuestionsForStudents(meeting: MeetingWithOwner, studentId?: string): Promise<StudentQuestionView[]> {
    const rows = await this.questions.listForMeeting(meeting.id, ['approved']);
    const voted = studentId ? new Set(await this.votes.listVotedQuestionIds(meeting.id, studentId)) : undefined;
    return rows.map((row) => toStudentQuestionView(row, voted));
  }

  async getInstructorMeetingView(instructorCode: string, auth: AuthContext): Promise<InstructorMeetingView> {
    const meeting = await this.access.getOwnedMeeting(instructorCode, auth);
    const rows = await this.questions.listForMeeting(meeting.id);
    return {
      id: meeting.id,
      title: meeting.title,
      class_id: meeting.class_id,
      class_name: meeting.class_name,
      meeting_code: meeting.meeting_code,
      instructor_code: meeting.instructor_code,
      is_active: meeting.is_active,
      state: deriveMeetingState(meeting),
      has_password: meeting.password_hash !== null,
      created_at: toIso(meeting.created_at),
      started_at: toIso(meeting.started_at),
      ended_at: toIso(meeting.ended_at),
      ...this.lifecycle.urlsFor(meeting),
      questions: rows.map((row) => toInstructorQuestionView(row)),
    };
  }

  /**
   * Independent of any written answer: a question can be answered aloud, in writing, or both.
   */
  async toggleAnsweredInClass(questionId: number, auth: AuthContext): Promise<InstructorQuestionView> {
    const existing = await this.access.getOwnedQuestion(questionId, auth);
    const updated = await this.questions.toggleAnsweredInClass(questionId);
    if (!updated) throw new NotFoundError('Question not found');

    const event = {
      type: 'question_answered',
      question_id: questionId,
      is_answered: updated.is_answered_in_class,
    } as const;
    if (updated.status === 'approved') {
      await this.broadcaster.toAll(existing, event);
    } else {
      await this.broadcaster.toInstructors(existing, event);
    }
    return toInstructorQuestionView(updated);
  }

  private async announce(meeting: MeetingWithOwner, question: QuestionRecord): Promise<void> {
    if (question.status === 'approved') {
      await this.broadcaster.toStudents(meeting, { type: 'new_question', question: toStudentQuestionView(question) });
    }
    await this.broadcaster.toInstructors(meeting, { type: 'new_question', question: toInstructorQuestionView(question) });
  }
}
