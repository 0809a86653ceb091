import type { AnswerRecord, AnswerRepositoryPort } from '../../services/ports/answer.repository.port';
import type { DbPort } from '../../services/ports/db.port';
import { qaTable } from '../db/fqn.utils';

const ANSWER_TABLE = qaTable('answers');

const ANSWER_COLUMNS = 'id, question_id, instructor_id, answer_text, is_approved, created_at, updated_at';

export class DbAnswerRepository implements AnswerRepositoryPort {
  constructor(private readonly db: DbPort) {}

  async getByQuestionId(questionId: number): Promise<AnswerRecord | null> {
    const sql = `SELECT ${ANSWER_COLUMNS} FROM ${ANSWER_TABLE} WHERE question_id = ?`;
    return this.db.queryOne<AnswerRecord>(sql, [questionId], { operation: 'getAnswer' });
  }

  async upsertAnswer(data: {
    question_id: number;
    instructor_id: number;
    answer_text: string;
    is_approved: boolean;
  }): Promise<AnswerRecord> {
    return this.db.upsert<AnswerRecord>(
      ANSWER_TABLE,
      ['question_id'],
      { ...data, updated_at: new Date() },
      { operation: 'upsertAnswer' }
    );
  }

  async setApproved(questionId: number, isApproved: boolean): Promise<AnswerRecord | null> {
    const sql = `
      UPDATE ${ANSWER_TABLE}
      SET is_approved = ?, updated_at = ?
      WHERE question_id = ?
      RETURNING ${ANSWER_COLUMNS}
    `;
    return this.db.queryOne<AnswerRecord>(sql, [isApproved, new Date(), questionId], {
      operation: 'setAnswerApproved',
    });
  }

  async deleteByQuestionId(questionId: number): Promise<AnswerRecord | null> {
    const sql = `DELETE FROM ${ANSWER_TABLE} WHERE question_id = ? RETURNING ${ANSWER_COLUMNS}`;
    return this.db.queryOne<AnswerRecord>(sql, [questionId], { operation: 'deleteAnswer' });
  }
}

export function createDbAnswerRepository(db: DbPort): AnswerRepositoryPort {
  return new DbAnswerRepository(db);
}
