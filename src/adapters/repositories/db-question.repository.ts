import type {
  InsertQuestionResult,
  NewQuestion,
  QuestionRecord,
  QuestionRepositoryPort,
  QuestionStatus,
  QuestionWithAnswer,
  QuestionWithMeeting,
} from '../../services/ports/question.repository.port';
import type { DbPort } from '../../services/ports/db.port';
import { qaTable } from '../db/fqn.utils';

const QUESTION_TABLE = qaTable('questions');
const MEETING_TABLE = qaTable('class_meetings');
const CLASS_TABLE = qaTable('classes');
const ANSWER_TABLE = qaTable('answers');

const QUESTION_COLUMNS = `
  q.id, q.meeting_id, q.student_id, q.question_number, q.text, q.sanitized_text, q.status,
  q.flagged_reason, q.upvotes, q.is_answered_in_class, q.created_at, q.reviewed_at
`;

const QUESTION_ORDER = 'q.upvotes DESC, q.created_at ASC, q.id ASC';

export class DbQuestionRepository implements QuestionRepositoryPort {
  constructor(private readonly db: DbPort) {}

  async insertQuestion(meetingId: number, data: NewQuestion): Promise<InsertQuestionResult> {
    return this.db.withTransaction(async (tx) => {
      // The counter row lock serializes numbering and excludes a concurrent end
      const counter = await tx.queryOne<{ question_counter: number }>(
        `
          UPDATE ${MEETING_TABLE}
          SET question_counter = question_counter + 1
          WHERE id = ? AND is_active = TRUE
          RETURNING question_counter
        `,
        [meetingId],
        { operation: 'nextQuestionNumber' }
      );
      if (!counter) {
        const exists = await tx.queryOne<{ id: number }>(`SELECT id FROM ${MEETING_TABLE} WHERE id = ?`, [meetingId], {
          operation: 'meetingExists',
        });
        return exists ? { outcome: 'meeting_ended' } : { outcome: 'not_found' };
      }
      const question = await tx.insert<QuestionRecord>(
        QUESTION_TABLE,
        {
          meeting_id: meetingId,
          student_id: data.student_id,
          question_number: counter.question_counter,
          text: data.text,
          sanitized_text: data.sanitized_text,
          status: data.status,
          flagged_reason: data.flagged_reason,
        },
        { operation: 'insertQuestion' }
      );
      return { outcome: 'inserted', question };
    });
  }

  async getWithMeeting(questionId: number): Promise<QuestionWithMeeting | null> {
    const sql = `
      SELECT ${QUESTION_COLUMNS},
        m.meeting_code,
        m.instructor_code,
        m.is_active AS meeting_is_active,
        (m.password_hash IS NOT NULL) AS meeting_has_password,
        c.instructor_id
      FROM ${QUESTION_TABLE} q
      JOIN ${MEETING_TABLE} m ON m.id = q.meeting_id
      JOIN ${CLASS_TABLE} c ON c.id = m.class_id
      WHERE q.id = ?
    `;
    return this.db.queryOne<QuestionWithMeeting>(sql, [questionId], { operation: 'getQuestionWithMeeting' });
  }

  async listForMeeting(meetingId: number, statuses?: QuestionStatus[]): Promise<QuestionWithAnswer[]> {
    const params: unknown[] = [meetingId];
    let statusFilter = '';
    if (statuses && statuses.length > 0) {
      statusFilter = 'AND q.status = ANY(?::text[])';
      params.push(statuses);
    }
    const sql = `
      SELECT ${QUESTION_COLUMNS},
        a.id AS answer_id,
        a.answer_text,
        a.is_approved AS answer_is_approved,
        a.created_at AS answer_created_at,
        a.updated_at AS answer_updated_at
      FROM ${QUESTION_TABLE} q
      LEFT JOIN ${ANSWER_TABLE} a ON a.question_id = q.id
      WHERE q.meeting_id = ? ${statusFilter}
      ORDER BY ${QUESTION_ORDER}
    `;
    return this.db.query<QuestionWithAnswer>(sql, params, { operation: 'listQuestionsForMeeting' });
  }

  async updateStatus(
    questionId: number,
    status: QuestionStatus,
    from: readonly QuestionStatus[],
    reviewedAt: Date
  ): Promise<QuestionRecord | null> {
    const sql = `
      UPDATE ${QUESTION_TABLE} q
      SET status = ?, reviewed_at = ?
      WHERE q.id = ? AND q.status = ANY(?::text[])
      RETURNING ${QUESTION_COLUMNS}
    `;
    return this.db.queryOne<QuestionRecord>(sql, [status, reviewedAt, questionId, [...from]], {
      operation: 'updateQuestionStatus',
    });
  }

  async toggleAnsweredInClass(questionId: number): Promise<QuestionRecord | null> {
    const sql = `
      UPDATE ${QUESTION_TABLE} q
      SET is_answered_in_class = NOT q.is_answered_in_class
      WHERE q.id = ?
      RETURNING ${QUESTION_COLUMNS}
    `;
    return this.db.queryOne<QuestionRecord>(sql, [questionId], { operation: 'toggleAnsweredInClass' });
  }
}

export function createDbQuestionRepository(db: DbPort): QuestionRepositoryPort {
  return new DbQuestionRepository(db);
}
