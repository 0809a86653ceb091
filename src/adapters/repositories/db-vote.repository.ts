import type { VoteRepositoryPort, VoteToggleResult } from '../../services/ports/vote.repository.port';
import type { QuestionStatus } from '../../services/ports/question.repository.port';
import type { DbPort } from '../../services/ports/db.port';
import { qaTable } from '../db/fqn.utils';

const VOTE_TABLE = qaTable('question_votes');
const QUESTION_TABLE = qaTable('questions');
const MEETING_TABLE = qaTable('class_meetings');

export class DbVoteRepository implements VoteRepositoryPort {
  constructor(private readonly db: DbPort) {}

  /**
   * Flips the (question, student) vote and rewrites `upvotes` from the vote rows,
   * all under the question's row lock. The meeting row is share-locked so an
   * end cannot commit between the activity check and the write.
   */
  async toggleVote(questionId: number, studentId: string): Promise<VoteToggleResult> {
    return this.db.withTransaction<VoteToggleResult>(async (tx) => {
      const target = await tx.queryOne<{ id: number; status: QuestionStatus; meeting_is_active: boolean }>(
        `
          SELECT q.id, q.status, m.is_active AS meeting_is_active
          FROM ${QUESTION_TABLE} q
          JOIN ${MEETING_TABLE} m ON m.id = q.meeting_id
          WHERE q.id = ?
          FOR UPDATE OF q
          FOR SHARE OF m
        `,
        [questionId],
        { operation: 'lockQuestionForVote' }
      );
      if (!target) return { outcome: 'not_found' };
      if (target.status !== 'approved') return { outcome: 'not_visible' };
      if (!target.meeting_is_active) return { outcome: 'meeting_ended' };

      const removed = await tx.queryOne<{ id: number }>(
        `DELETE FROM ${VOTE_TABLE} WHERE question_id = ? AND student_id = ? RETURNING id`,
        [questionId, studentId],
        { operation: 'deleteVote' }
      );

      let voted = false;
      if (!removed) {
        const inserted = await tx.queryOne<{ id: number }>(
          `
            INSERT INTO ${VOTE_TABLE} (question_id, student_id)
            VALUES (?, ?)
            ON CONFLICT (question_id, student_id) DO NOTHING
            RETURNING id
          `,
          [questionId, studentId],
          { operation: 'insertVote' }
        );
        if (!inserted) return { outcome: 'contended' };
        voted = true;
      }

      const counted = await tx.queryOne<{ upvotes: number }>(
        `
          UPDATE ${QUESTION_TABLE}
          SET upvotes = (SELECT COUNT(*)::int FROM ${VOTE_TABLE} WHERE question_id = ?)
          WHERE id = ?
          RETURNING upvotes
        `,
        [questionId, questionId],
        { operation: 'recountVotes' }
      );
      return { outcome: 'toggled', questionId, upvotes: counted?.upvotes ?? 0, voted };
    });
  }

  async listVotedQuestionIds(meetingId: number, studentId: string): Promise<number[]> {
    const sql = `
      SELECT v.question_id
      FROM ${VOTE_TABLE} v
      JOIN ${QUESTION_TABLE} q ON q.id = v.question_id
      WHERE q.meeting_id = ? AND v.student_id = ?
      ORDER BY v.question_id ASC
    `;
    const rows = await this.db.query<{ question_id: number }>(sql, [meetingId, studentId], {
      operation: 'listVotedQuestionIds',
    });
    return rows.map((row) => row.question_id);
  }

  async reconcileMeeting(meetingId: number): Promise<number> {
    const sql = `
      UPDATE ${QUESTION_TABLE} q
      SET upvotes = counts.actual
      FROM (
        SELECT q2.id, COUNT(v.id)::int AS actual
        FROM ${QUESTION_TABLE} q2
        LEFT JOIN ${VOTE_TABLE} v ON v.question_id = q2.id
        WHERE q2.meeting_id = ?
        GROUP BY q2.id
      ) counts
      WHERE q.id = counts.id AND q.upvotes <> counts.actual
      RETURNING q.id
    `;
    const rows = await this.db.query<{ id: number }>(sql, [meetingId], { operation: 'reconcileVoteCounts' });
    return rows.length;
  }
}

export function createDbVoteRepository(db: DbPort): VoteRepositoryPort {
  return new DbVoteRepository(db);
}
