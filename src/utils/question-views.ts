import type { AnswerRecord } from '../services/ports/answer.repository.port';
import type { QuestionRecord, QuestionWithAnswer } from '../services/ports/question.repository.port';
import type {
  InstructorAnswerView,
  InstructorQuestionView,
  MeetingState,
  PublishedAnswerView,
  StudentQuestionView,
} from '../types/meeting.types';

export function toIso(value: Date | string): string;
export function toIso(value: Date | string | null): string | null;
export function toIso(value: Date | string | null): string | null {
  if (value === null) return null;
  return value instanceof Date ? value.toISOString() : new Date(value).toISOString();
}

export function deriveMeetingState(meeting: { is_active: boolean; started_at: Date | string | null; ended_at: Date | string | null }): MeetingState {
  if (meeting.is_active) return 'active';
  if (meeting.started_at !== null || meeting.ended_at !== null) return 'ended';
  return 'created';
}

export function toPublishedAnswerView(answer: Pick<AnswerRecord, 'id' | 'answer_text' | 'updated_at'>): PublishedAnswerView {
  return {
    id: answer.id,
    answer_text: answer.answer_text,
    updated_at: toIso(answer.updated_at),
  };
}

export function toInstructorAnswerView(answer: AnswerRecord): InstructorAnswerView {
  return {
    ...toPublishedAnswerView(answer),
    is_approved: answer.is_approved,
    created_at: toIso(answer.created_at),
  };
}

function publishedAnswerOf(question: QuestionRecord | QuestionWithAnswer): PublishedAnswerView | null {
  if (!('answer_id' in question) || question.answer_id === null || question.answer_text === null) return null;
  if (question.answer_is_approved !== true || question.answer_updated_at === null) return null;
  return {
    id: question.answer_id,
    answer_text: question.answer_text,
    updated_at: toIso(question.answer_updated_at),
  };
}

/**
 * Student rendering: censored text, and the answer only once published.
 */
export function toStudentQuestionView(
  question: QuestionRecord | QuestionWithAnswer,
  votedIds?: ReadonlySet<number>
): StudentQuestionView {
  const answer = publishedAnswerOf(question);
  return {
    id: question.id,
    question_number: question.question_number,
    text: question.sanitized_text,
    status: question.status,
    upvotes: question.upvotes,
    is_answered_in_class: question.is_answered_in_class,
    has_written_answer: answer !== null,
    answer,
    created_at: toIso(question.created_at),
    ...(votedIds ? { voted: votedIds.has(question.id) } : {}),
  };
}

export function toInstructorQuestionView(
  question: QuestionRecord | QuestionWithAnswer,
  answerRecord?: AnswerRecord | null
): InstructorQuestionView {
  let answer: InstructorAnswerView | null = null;
  if (answerRecord) {
    answer = toInstructorAnswerView(answerRecord);
  } else if (
    'answer_id' in question &&
    question.answer_id !== null &&
    question.answer_text !== null &&
    question.answer_created_at !== null &&
    question.answer_updated_at !== null
  ) {
    answer = {
      id: question.answer_id,
      answer_text: question.answer_text,
      is_approved: question.answer_is_approved === true,
      updated_at: toIso(question.answer_updated_at),
      created_at: toIso(question.answer_created_at),
    };
  }
  return {
    id: question.id,
    question_number: question.question_number,
    text: question.text,
    sanitized_text: question.sanitized_text,
    status: question.status,
    flagged_reason: question.flagged_reason,
    upvotes: question.upvotes,
    is_answered_in_class: question.is_answered_in_class,
    answer,
    created_at: toIso(question.created_at),
    reviewed_at: toIso(question.reviewed_at),
  };
}
