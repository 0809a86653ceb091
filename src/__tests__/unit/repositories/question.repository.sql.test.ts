import { createDbQuestionRepository } from '../../../adapters/repositories/db-question.repository';
import { createMockDbPort, sqlOf } from '../../mocks/db-port.mock';

const newQuestion = {
  student_id: '11111111-1111-4111-8111-111111111111',
  text: 'What is entropy?',
  sanitized_text: 'What is entropy?',
  status: 'approved' as const,
  flagged_reason: null,
};

describe('DbQuestionRepository SQL', () => {
  it('numbers the question from the meeting counter inside one transaction', async () => {
    const { db, tx } = createMockDbPort();
    tx.queryOne.mockResolvedValueOnce({ question_counter: 6 });
    tx.insert.mockResolvedValueOnce({ id: 40, question_number: 6 });

    const result = await createDbQuestionRepository(db).insertQuestion(3, newQuestion);

    expect(result).toEqual({ outcome: 'inserted', question: { id: 40, question_number: 6 } });
    expect(db.withTransaction).toHaveBeenCalledTimes(1);
    expect(sqlOf(tx.queryOne)).toBe(
      'UPDATE qa.class_meetings SET question_counter = question_counter + 1 WHERE id = ? AND is_active = TRUE RETURNING question_counter'
    );
    expect(tx.insert).toHaveBeenCalledWith(
      'qa.questions',
      { meeting_id: 3, question_number: 6, ...newQuestion },
      { operation: 'insertQuestion' }
    );
  });

  it('tells an ended meeting from a missing one', async () => {
    const { db, tx } = createMockDbPort();
    const repo = createDbQuestionRepository(db);

    tx.queryOne.mockResolvedValueOnce(null).mockResolvedValueOnce({ id: 3 });
    await expect(repo.insertQuestion(3, newQuestion)).resolves.toEqual({ outcome: 'meeting_ended' });

    tx.queryOne.mockResolvedValueOnce(null).mockResolvedValueOnce(null);
    await expect(repo.insertQuestion(99, newQuestion)).resolves.toEqual({ outcome: 'not_found' });
    expect(tx.insert).not.toHaveBeenCalled();
  });

  it('filters by status only when asked and orders by votes then age', async () => {
    const { db } = createMockDbPort();
    db.query.mockResolvedValue([]);
    const repo = createDbQuestionRepository(db);

    await repo.listForMeeting(3, ['approved']);
    await repo.listForMeeting(3);

    expect(db.query.mock.calls[0]?.[1]).toEqual([3, ['approved']]);
    expect(sqlOf(db.query, 0)).toContain('WHERE q.meeting_id = ? AND q.status = ANY(?::text[])');
    expect(db.query.mock.calls[1]?.[1]).toEqual([3]);
    expect(sqlOf(db.query, 1)).not.toContain('ANY(');
    expect(sqlOf(db.query, 1)).toContain('ORDER BY q.upvotes DESC, q.created_at ASC, q.id ASC');
  });

  it('moves status only from the allowed source states', async () => {
    const { db } = createMockDbPort();
    db.queryOne.mockResolvedValueOnce(null);
    const reviewedAt = new Date('2024-03-01T10:00:00Z');

    const result = await createDbQuestionRepository(db).updateStatus(12, 'approved', ['pending', 'flagged'], reviewedAt);

    expect(result).toBeNull();
    expect(sqlOf(db.queryOne)).toContain('SET status = ?, reviewed_at = ? WHERE q.id = ? AND q.status = ANY(?::text[])');
    expect(db.queryOne.mock.calls[0]?.[1]).toEqual(['approved', reviewedAt, 12, ['pending', 'flagged']]);
  });
});
