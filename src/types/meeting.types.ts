import type { QuestionStatus } from '../services/ports/question.repository.port';

export type MeetingState = 'created' | 'active' | 'ended';

export type MeetingAudience = 'students' | 'instructors';

/** Published answer as students see it. */
export interface PublishedAnswerView {
  id: number;
  answer_text: string;
  updated_at: string;
}

export interface InstructorAnswerView extends PublishedAnswerView {
  is_approved: boolean;
  created_at: string;
}

/** Approved question rendered with its censored text. */
export interface StudentQuestionView {
  id: number;
  question_number: number;
  text: string;
  status: QuestionStatus;
  upvotes: number;
  is_answered_in_class: boolean;
  has_written_answer: boolean;
  answer: PublishedAnswerView | null;
  created_at: string;
  voted?: boolean;
}

export interface InstructorQuestionView {
  id: number;
  question_number: number;
  text: string;
  sanitized_text: string;
  status: QuestionStatus;
  flagged_reason: string | null;
  upvotes: number;
  is_answered_in_class: boolean;
  answer: InstructorAnswerView | null;
  created_at: string;
  reviewed_at: string | null;
}

/** Returned to a student whose question is held for review. */
export interface SubmittedQuestionReceipt {
  id: number;
  question_number: number;
  status: QuestionStatus;
  student_id: string;
  question: StudentQuestionView | null;
}

export interface StudentMeetingView {
  title: string;
  meeting_code: string;
  class_name: string;
  is_active: boolean;
  state: MeetingState;
  has_password: boolean;
  started_at: string | null;
  ended_at: string | null;
  questions: StudentQuestionView[];
}

export interface InstructorMeetingView {
  id: number;
  title: string;
  class_id: number;
  class_name: string;
  meeting_code: string;
  instructor_code: string;
  is_active: boolean;
  state: MeetingState;
  has_password: boolean;
  created_at: string;
  started_at: string | null;
  ended_at: string | null;
  student_url: string;
  instructor_url: string;
  questions: InstructorQuestionView[];
}

/**
 * Live messages pushed to meeting subscribers. Hints only: clients refetch to reconcile.
 */
export type MeetingEvent =
  | { type: 'new_question'; question: StudentQuestionView | InstructorQuestionView }
  | { type: 'vote_update'; question_id: number; upvotes: number }
  | { type: 'question_answered'; question_id: number; is_answered: boolean }
  | {
      type: 'question_status_changed';
      question_id: number;
      status: QuestionStatus;
      question?: StudentQuestionView;
    }
  | { type: 'answer_published'; question_id: number; answer: PublishedAnswerView }
  | { type: 'answer_retracted'; question_id: number }
  | { type: 'session_ended' }
  | { type: 'session_restarted' };

export type MeetingEventType = MeetingEvent['type'];
