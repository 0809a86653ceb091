export interface AnswerRecord {
  id: number;
  question_id: number;
  instructor_id: number;
  answer_text: string;
  is_approved: boolean;
  created_at: Date;
  updated_at: Date;
}

export interface AnswerRepositoryPort {
  getByQuestionId(questionId: number): Promise<AnswerRecord | null>;
  /** Creates or replaces the single answer of a question. */
  upsertAnswer(data: {
    question_id: number;
    instructor_id: number;
    answer_text: string;
    is_approved: boolean;
  }): Promise<AnswerRecord>;
  setApproved(questionId: number, isApproved: boolean): Promise<AnswerRecord | null>;
  deleteByQuestionId(questionId: number): Promise<AnswerRecord | null>;
}
