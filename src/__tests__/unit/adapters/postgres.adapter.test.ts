import {
  createPostgresDbAdapter,
  isUniqueViolation,
  mapPgError,
  preprocessParams,
  rewriteQuestionMarkPlaceholders,
  PostgresAdapterError,
} from '../../../adapters/db/postgres.adapter';
import { normalizeTableFqn, qaTable } from '../../../adapters/db/fqn.utils';
import { NotFoundError } from '../../../utils/errors';
import { promClient } from '../../../metrics/registry';

const mockClient = {
  query: jest.fn(),
  release: jest.fn(),
};

const mockPool = {
  query: jest.fn(),
  connect: jest.fn(),
  end: jest.fn(),
  on: jest.fn(),
};

jest.mock('pg', () => ({
  Pool: jest.fn().mockImplementation(() => mockPool),
}));

function buildAdapter() {
  return createPostgresDbAdapter({ connectionString: 'postgres://test' });
}

describe('Postgres adapter helpers', () => {
  it('rewrites question mark placeholders while respecting strings and comments', () => {
    const sql = "SELECT id FROM qa.meetings WHERE id = ? AND note = '?' -- ? should be ignored";
    expect(rewriteQuestionMarkPlaceholders(sql)).toBe(
      "SELECT id FROM qa.meetings WHERE id = $1 AND note = '?' -- ? should be ignored"
    );
  });

  it('skips placeholders inside block comments and quoted identifiers', () => {
    const sql = 'SELECT "what?" FROM qa.questions /* ignore ? */ WHERE meeting_id = ? AND status = ?';
    expect(rewriteQuestionMarkPlaceholders(sql)).toBe(
      'SELECT "what?" FROM qa.questions /* ignore ? */ WHERE meeting_id = $1 AND status = $2'
    );
  });

  it('keeps escaped quotes inside string literals', () => {
    expect(rewriteQuestionMarkPlaceholders("SELECT 'it''s ?' , ?")).toBe("SELECT 'it''s ?' , $1");
  });

  it('normalizes table identifiers', () => {
    expect(normalizeTableFqn(' qa.questions ')).toEqual({ schema: 'qa', table: 'questions', identifier: 'qa.questions' });
    expect(qaTable('votes')).toBe('qa.votes');
    expect(() => normalizeTableFqn('questions')).toThrow('Invalid table FQN');
    expect(() => normalizeTableFqn('qa.Questions')).toThrow('lowercase identifiers');
  });

  it('stringifies objects and nulls out undefined params', () => {
    const when = new Date('2026-01-05T09:00:00.000Z');
    expect(preprocessParams([undefined, null, when, ['a', 1], [{ a: 1 }], { b: 2 }, 3])).toEqual([
      null,
      null,
      when,
      ['a', 1],
      '[{"a":1}]',
      '{"b":2}',
      3,
    ]);
  });

  it('maps driver errors and recognises unique violations', () => {
    const mapped = mapPgError(Object.assign(new Error('duplicate key'), { code: '23505', constraint: 'uq_meeting_code' }));
    expect(mapped).toBeInstanceOf(PostgresAdapterError);
    expect(mapped).toMatchObject({ message: 'duplicate key', code: '23505', constraint: 'uq_meeting_code' });
    expect(isUniqueViolation(mapped)).toBe(true);
    expect(isUniqueViolation(mapPgError('weird'))).toBe(false);
  });
});

describe('Postgres adapter SQL construction', () => {
  beforeEach(() => {
    mockPool.query.mockResolvedValue({ rows: [{ id: 1 }], rowCount: 1 });
  });

  it('counts each query under its provider and operation labels', async () => {
    await buildAdapter().query('SELECT 1', [], { operation: 'countedLookup' });

    const metric = await promClient.register.getSingleMetric('qa_db_query_attempts_total')?.get();
    const counted = metric?.values.find((v) => v.labels.operation === 'countedLookup');
    expect(counted).toMatchObject({ value: 1, labels: { provider: 'postgres', operation: 'countedLookup' } });
  });

  it('inserts with positional params and stringified JSON', async () => {
    const row = await buildAdapter().insert('qa.audit_log', { action: 'meeting.create', details: { meetingId: 3 } });

    expect(row).toEqual({ id: 1 });
    expect(mockPool.query).toHaveBeenCalledWith(
      'INSERT INTO qa.audit_log ("action", "details") VALUES ($1, $2) RETURNING *',
      ['meeting.create', '{"meetingId":3}']
    );
  });

  it('builds upsert statements with conflict handling', async () => {
    await buildAdapter().upsert('qa.answers', ['question_id'], {
      question_id: 7,
      answer_text: 'Yes',
      is_approved: true,
    });

    expect(mockPool.query.mock.calls[0]?.[0]).toBe(
      'INSERT INTO qa.answers ("question_id", "answer_text", "is_approved") VALUES ($1, $2, $3) ' +
        'ON CONFLICT ("question_id") DO UPDATE SET "answer_text" = EXCLUDED."answer_text", "is_approved" = EXCLUDED."is_approved" ' +
        'RETURNING *'
    );
  });

  it('returns the affected row count from update', async () => {
    const changed = await buildAdapter().update('qa.meetings', 4, { state: 'ended' });

    expect(changed).toBe(1);
    expect(mockPool.query).toHaveBeenCalledWith('UPDATE qa.meetings SET "state" = $1 WHERE "id" = $2', ['ended', 4]);
  });

  it('fails an insert that returns no row', async () => {
    mockPool.query.mockResolvedValue({ rows: [], rowCount: 0 });
    await expect(buildAdapter().insert('qa.votes', { question_id: 1 })).rejects.toMatchObject({ code: 'no_row' });
  });

  it('maps driver errors thrown by a query', async () => {
    mockPool.query.mockRejectedValue(Object.assign(new Error('duplicate key'), { code: '23505', severity: 'ERROR' }));
    await expect(buildAdapter().query('SELECT 1')).rejects.toMatchObject({ name: 'PostgresAdapterError', code: '23505' });
  });
});

describe('Postgres adapter transactions', () => {
  beforeEach(() => {
    mockPool.connect.mockResolvedValue(mockClient);
    mockClient.query.mockResolvedValue({ rows: [{ id: 9 }], rowCount: 1 });
  });

  it('commits and releases the client', async () => {
    const result = await buildAdapter().withTransaction((tx) => tx.queryOne<{ id: number }>('SELECT id FROM qa.votes'));

    expect(result).toEqual({ id: 9 });
    expect(mockClient.query.mock.calls.map((call) => call[0])).toEqual(['BEGIN', 'SELECT id FROM qa.votes', 'COMMIT']);
    expect(mockClient.release).toHaveBeenCalledTimes(1);
    expect(mockPool.query).not.toHaveBeenCalled();
  });

  it('rolls back and passes domain errors through untouched', async () => {
    const failure = new NotFoundError('Question not found');

    await expect(
      buildAdapter().withTransaction(async () => {
        throw failure;
      })
    ).rejects.toBe(failure);

    expect(mockClient.query.mock.calls.map((call) => call[0])).toEqual(['BEGIN', 'ROLLBACK']);
    expect(mockClient.release).toHaveBeenCalledTimes(1);
  });

  it('checks connectivity on connect and ends the pool on disconnect', async () => {
    const adapter = buildAdapter();
    await adapter.connect();
    await adapter.disconnect();

    expect(mockClient.release).toHaveBeenCalledTimes(1);
    expect(mockPool.end).toHaveBeenCalledTimes(1);
  });
});
