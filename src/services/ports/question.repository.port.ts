export type QuestionStatus = 'pending' | 'approved' | 'flagged' | 'rejected';

export interface QuestionRecord {
  id: number;
  meeting_id: number;
  student_id: string;
  question_number: number;
  text: string;
  sanitized_text: string;
  status: QuestionStatus;
  flagged_reason: string | null;
  upvotes: number;
  is_answered_in_class: boolean;
  created_at: Date;
  reviewed_at: Date | null;
}

/** Question row with its written answer, if any. */
export interface QuestionWithAnswer extends QuestionRecord {
  answer_id: number | null;
  answer_text: string | null;
  answer_is_approved: boolean | null;
  answer_created_at: Date | null;
  answer_updated_at: Date | null;
}

/** Question row with the meeting fields needed for access checks and broadcasting. */
export interface QuestionWithMeeting extends QuestionRecord {
  meeting_code: string;
  instructor_code: string;
  meeting_is_active: boolean;
  meeting_has_password: boolean;
  instructor_id: number;
}

export interface NewQuestion {
  student_id: string;
  text: string;
  sanitized_text: string;
  status: QuestionStatus;
  flagged_reason: string | null;
}

export type InsertQuestionResult =
  | { outcome: 'inserted'; question: QuestionRecord }
  | { outcome: 'not_found' }
  | { outcome: 'meeting_ended' };

export interface QuestionRepositoryPort {
  /**
   * Numbers and inserts the question in one transaction, only while the meeting is active.
   */
  insertQuestion(meetingId: number, data: NewQuestion): Promise<InsertQuestionResult>;
  getWithMeeting(questionId: number): Promise<QuestionWithMeeting | null>;
  /** Ordered by upvotes desc, then oldest first. */
  listForMeeting(meetingId: number, statuses?: QuestionStatus[]): Promise<QuestionWithAnswer[]>;
  /** Null when the question is missing or its current status is not one of `from`. */
  updateStatus(
    questionId: number,
    status: QuestionStatus,
    from: readonly QuestionStatus[],
    reviewedAt: Date
  ): Promise<QuestionRecord | null>;
  toggleAnsweredInClass(questionId: number): Promise<QuestionRecord | null>;
}
