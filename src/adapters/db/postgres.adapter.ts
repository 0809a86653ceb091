import { Pool, PoolClient, PoolConfig } from 'pg';
import type { DbPort, DbQueryOptions, DbTransactionPort } from '../../services/ports/db.port';
import { normalizeTableFqn } from './fqn.utils';
import { getOrCreateCounter, getOrCreateHistogram } from '../../metrics/registry';
import { logger } from '../../utils/logger';

const PROVIDER_LABEL = 'postgres';

function getLongQueryThresholdMs(): number {
  return Number(process.env.DB_LONG_QUERY_WARN_MS ?? 500);
}

function recordLongQuery(labels: MetricLabels, startTime: number, error?: unknown): void {
  const durationMs = Date.now() - startTime;
  const threshold = getLongQueryThresholdMs();
  if (durationMs >= threshold) {
    longRunningCounter.inc(labels);
    logger.warn('db-query-long-running', {
      provider: PROVIDER_LABEL,
      operation: labels.operation,
      durationMs,
      thresholdMs: threshold,
      ...(error ? { error: error instanceof Error ? error.message : String(error) } : {}),
    });
  }
}

export interface PostgresAdapterConfig {
  connectionString: string;
  poolMin: number;
  poolMax: number;
  ssl: boolean;
  logSql: boolean;
  connectionTimeoutMs: number;
}

type MetricLabels = { provider: string; operation: string };

const attemptsCounter = getOrCreateCounter(
  'qa_db_query_attempts_total',
  'Total database query attempts by provider and operation',
  ['provider', 'operation']
);

const failureCounter = getOrCreateCounter(
  'qa_db_query_failures_total',
  'Total database query failures grouped by provider and error code',
  ['provider', 'code']
);

const durationHistogram = getOrCreateHistogram(
  'qa_db_query_duration_ms',
  'Database query duration in milliseconds',
  ['provider', 'operation'],
  [5, 10, 25, 50, 100, 250, 500, 1000, 2000]
);

const longRunningCounter = getOrCreateCounter(
  'qa_db_query_long_running_total',
  'Total number of database queries exceeding the configured warning threshold',
  ['provider', 'operation']
);

function parseBooleanEnv(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) {
    return fallback;
  }
  const normalized = value.toLowerCase();
  if (normalized === '1' || normalized === 'true' || normalized === 'yes') {
    return true;
  }
  if (normalized === '0' || normalized === 'false' || normalized === 'no') {
    return false;
  }
  return fallback;
}

function parseNumberEnv(value: string | undefined, fallback: number): number {
  if (!value) return fallback;
  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : fallback;
}

function buildConfig(overrides: Partial<PostgresAdapterConfig> = {}): PostgresAdapterConfig {
  return {
    connectionString:
      overrides.connectionString ?? process.env.DATABASE_URL ?? 'postgres://qa:qa@localhost:5432/classroom_qa',
    poolMin: overrides.poolMin ?? parseNumberEnv(process.env.DB_POOL_MIN, 1),
    poolMax: overrides.poolMax ?? parseNumberEnv(process.env.DB_POOL_MAX, 10),
    ssl: overrides.ssl ?? parseBooleanEnv(process.env.DB_SSL, false),
    logSql: overrides.logSql ?? parseBooleanEnv(process.env.DB_LOG_SQL, false),
    connectionTimeoutMs: overrides.connectionTimeoutMs ?? parseNumberEnv(process.env.DB_CONNECT_TIMEOUT_MS, 5000),
  };
}

export function rewriteQuestionMarkPlaceholders(sql: string): string {
  let result = '';
  let paramIndex = 1;
  let inSingleQuote = false;
  let inDoubleQuote = false;
  let inLineComment = false;
  let inBlockComment = false;
  for (let i = 0; i < sql.length; i += 1) {
    const char = sql[i];
    const next = sql[i + 1];

    if (inLineComment) {
      if (char === '\n') {
        inLineComment = false;
      }
      result += char;
      continue;
    }

    if (inBlockComment) {
      if (char === '*' && next === '/') {
        inBlockComment = false;
        result += '*/';
        i += 1;
        continue;
      }
      result += char;
      continue;
    }

    if (!inSingleQuote && !inDoubleQuote) {
      if (char === '-' && next === '-') {
        inLineComment = true;
        result += '--';
        i += 1;
        continue;
      }
      if (char === '/' && next === '*') {
        inBlockComment = true;
        result += '/*';
        i += 1;
        continue;
      }
    }

    if (!inDoubleQuote && char === "'") {
      if (inSingleQuote && next === "'") {
        result += "''";
        i += 1;
        continue;
      }
      inSingleQuote = !inSingleQuote;
      result += char;
      continue;
    }

    if (!inSingleQuote && char === '"') {
      if (inDoubleQuote && next === '"') {
        result += '""';
        i += 1;
        continue;
      }
      inDoubleQuote = !inDoubleQuote;
      result += char;
      continue;
    }

    if (!inSingleQuote && !inDoubleQuote && char === '?') {
      result += `$${paramIndex}`;
      paramIndex += 1;
    } else {
      result += char;
    }
  }
  return result;
}

function inferOperation(sql: string, fallback: string): string {
  const match = sql.trim().split(/\s+/)[0];
  if (!match) {
    return fallback;
  }
  return match.toLowerCase();
}

export function preprocessParams(params: unknown[] = []): unknown[] {
  return params.map((value) => {
    if (value === undefined) {
      return null;
    }
    if (value === null) {
      return value;
    }
    if (value instanceof Date) {
      return value;
    }
    if (Buffer.isBuffer(value)) {
      return value;
    }
    if (Array.isArray(value)) {
      const containsOnlyPrimitives = value.every((item) =>
        item === null || ['string', 'number', 'boolean'].includes(typeof item)
      );
      return containsOnlyPrimitives ? value : JSON.stringify(value);
    }
    if (typeof value === 'object') {
      return JSON.stringify(value);
    }
    return value;
  });
}

export class PostgresAdapterError extends Error {
  readonly code: string;
  readonly constraint?: string;

  constructor(message: string, code: string, constraint?: string) {
    super(message);
    this.name = 'PostgresAdapterError';
    this.code = code;
    this.constraint = constraint;
  }
}

export const PG_UNIQUE_VIOLATION = '23505';

export function isUniqueViolation(error: unknown): error is PostgresAdapterError {
  return error instanceof PostgresAdapterError && error.code === PG_UNIQUE_VIOLATION;
}

export function mapPgError(err: unknown): PostgresAdapterError {
  if (err instanceof PostgresAdapterError) {
    return err;
  }
  let code = 'unknown';
  let constraint: string | undefined;
  if (typeof err === 'object' && err !== null) {
    if ('code' in err && typeof err.code === 'string') code = err.code;
    if ('constraint' in err && typeof err.constraint === 'string') constraint = err.constraint;
  }
  const message = err instanceof Error ? err.message : 'Unknown Postgres error';
  return new PostgresAdapterError(message, code, constraint);
}

interface ExecuteOptions {
  params?: unknown[];
  options?: DbQueryOptions;
  client?: PoolClient;
}

class ScopedTransactionAdapter implements DbTransactionPort {
  constructor(private readonly adapter: PostgresDbAdapter, private readonly client: PoolClient) {}

  query<T = unknown>(sql: string, params?: unknown[], options?: DbQueryOptions): Promise<T[]> {
    return this.adapter.runQuery<T>(sql, { params, options, client: this.client }).then((r) => r.rows);
  }

  async queryOne<T = unknown>(sql: string, params?: unknown[], options?: DbQueryOptions): Promise<T | null> {
    const result = await this.adapter.runQuery<T>(sql, { params, options, client: this.client });
    return result.rows[0] ?? null;
  }

  insert<T = unknown>(tableFqn: string, row: Record<string, unknown>, options?: DbQueryOptions): Promise<T> {
    return this.adapter.insertInternal<T>(tableFqn, row, options, this.client);
  }

  update(
    tableFqn: string,
    id: number | string,
    patch: Record<string, unknown>,
    idColumn?: string,
    options?: DbQueryOptions
  ): Promise<number> {
    return this.adapter.updateInternal(tableFqn, id, patch, idColumn, options, this.client);
  }

  upsert<T = unknown>(
    tableFqn: string,
    keyColumns: string[],
    row: Record<string, unknown>,
    options?: DbQueryOptions
  ): Promise<T> {
    return this.adapter.upsertInternal<T>(tableFqn, keyColumns, row, options, this.client);
  }
}

export class PostgresDbAdapter implements DbPort {
  private readonly pool: Pool;

  private readonly logSql: boolean;

  constructor(private readonly config: PostgresAdapterConfig = buildConfig()) {
    const poolConfig: PoolConfig = {
      connectionString: config.connectionString,
      min: config.poolMin,
      max: config.poolMax,
      ssl: config.ssl ? { rejectUnauthorized: false } : undefined,
      idleTimeoutMillis: 30000,
      connectionTimeoutMillis: config.connectionTimeoutMs,
    };
    this.pool = new Pool(poolConfig);
    this.logSql = config.logSql;
    this.pool.on('error', (error) => {
      logger.error('db-pool-idle-client-error', { provider: PROVIDER_LABEL, error: error.message });
    });
  }

  async connect(): Promise<void> {
    try {
      const client = await this.pool.connect();
      client.release();
    } catch (error) {
      throw mapPgError(error);
    }
  }

  async disconnect(): Promise<void> {
    await this.pool.end();
  }

  async withTransaction<T>(handler: (tx: DbTransactionPort) => Promise<T>): Promise<T> {
    const client = await this.pool.connect();
    try {
      await client.query('BEGIN');
      const txAdapter = new ScopedTransactionAdapter(this, client);
      const result = await handler(txAdapter);
      await client.query('COMMIT');
      return result;
    } catch (error) {
      try {
        await client.query('ROLLBACK');
      } catch (rollbackError) {
        logger.error('db-transaction-rollback-failed', {
          provider: PROVIDER_LABEL,
          error: rollbackError instanceof Error ? rollbackError.message : String(rollbackError),
        });
      }
      if (error instanceof Error && !isDriverError(error)) {
        // Domain errors thrown by the handler pass through untouched
        throw error;
      }
      throw mapPgError(error);
    } finally {
      client.release();
    }
  }

  async query<T = unknown>(sql: string, params?: unknown[], options?: DbQueryOptions): Promise<T[]> {
    const result = await this.runQuery<T>(sql, { params, options });
    return result.rows;
  }

  async queryOne<T = unknown>(sql: string, params?: unknown[], options?: DbQueryOptions): Promise<T | null> {
    const result = await this.runQuery<T>(sql, { params, options });
    return result.rows[0] ?? null;
  }

  insert<T = unknown>(tableFqn: string, row: Record<string, unknown>, options?: DbQueryOptions): Promise<T> {
    return this.insertInternal<T>(tableFqn, row, options);
  }

  update(
    tableFqn: string,
    id: number | string,
    patch: Record<string, unknown>,
    idColumn = 'id',
    options?: DbQueryOptions
  ): Promise<number> {
    return this.updateInternal(tableFqn, id, patch, idColumn, options);
  }

  upsert<T = unknown>(
    tableFqn: string,
    keyColumns: string[],
    row: Record<string, unknown>,
    options?: DbQueryOptions
  ): Promise<T> {
    return this.upsertInternal<T>(tableFqn, keyColumns, row, options);
  }

  private buildLabels(operation: string | undefined, sql: string): MetricLabels {
    const fallback = operation ?? inferOperation(sql, 'query');
    return { provider: PROVIDER_LABEL, operation: fallback };
  }

  async runQuery<T = unknown>(
    sql: string,
    { params = [], options, client }: ExecuteOptions
  ): Promise<{ rows: T[]; rowCount: number }> {
    const values = preprocessParams(params);
    const text = sql.includes('?') ? rewriteQuestionMarkPlaceholders(sql) : sql;
    const labels = this.buildLabels(options?.operation, sql);
    attemptsCounter.inc(labels);
    const stopTimer = durationHistogram.startTimer(labels);
    const startTime = Date.now();
    try {
      if (this.logSql) {
        logger.debug('[PostgresDbAdapter] SQL', { text, values });
      }
      const result = client ? await client.query(text, values) : await this.pool.query(text, values);
      stopTimer();
      recordLongQuery(labels, startTime);
      const rows: T[] = result.rows;
      return { rows, rowCount: result.rowCount ?? rows.length };
    } catch (error) {
      stopTimer();
      const mapped = mapPgError(error);
      const failureLabels = { provider: PROVIDER_LABEL, code: mapped.code };
      failureCounter.inc(failureLabels);
      recordLongQuery(labels, startTime, mapped);
      throw mapped;
    }
  }

  async insertInternal<T = unknown>(
    tableFqn: string,
    row: Record<string, unknown>,
    options?: DbQueryOptions,
    client?: PoolClient
  ): Promise<T> {
    const entries = Object.entries(row);
    if (entries.length === 0) {
      throw new Error('insert requires at least one column');
    }
    const { identifier } = normalizeTableFqn(tableFqn);
    const columns = entries.map(([column]) => column);
    const placeholders = entries.map(() => '?').join(', ');
    const sql = `INSERT INTO ${identifier} (${columns.map((c) => `"${c}"`).join(', ')}) VALUES (${placeholders}) RETURNING *`;
    const params = entries.map(([, value]) => value);
    const result = await this.runQuery<T>(sql, {
      params,
      options: { operation: options?.operation ?? 'insert' },
      client,
    });
    return firstRow(result.rows, `insert into ${identifier}`);
  }

  async updateInternal(
    tableFqn: string,
    id: number | string,
    patch: Record<string, unknown>,
    idColumn = 'id',
    options?: DbQueryOptions,
    client?: PoolClient
  ): Promise<number> {
    const entries = Object.entries(patch);
    if (entries.length === 0) {
      return 0;
    }
    const { identifier } = normalizeTableFqn(tableFqn);
    const setClauses = entries.map(([column]) => `"${column}" = ?`).join(', ');
    const sql = `UPDATE ${identifier} SET ${setClauses} WHERE "${idColumn}" = ?`;
    const params = [...entries.map(([, value]) => value), id];
    const result = await this.runQuery(sql, {
      params,
      options: { operation: options?.operation ?? 'update' },
      client,
    });
    return result.rowCount;
  }

  async upsertInternal<T = unknown>(
    tableFqn: string,
    keyColumns: string[],
    row: Record<string, unknown>,
    options?: DbQueryOptions,
    client?: PoolClient
  ): Promise<T> {
    if (keyColumns.length === 0) {
      throw new Error('upsert requires at least one key column');
    }
    const entries = Object.entries(row);
    if (entries.length === 0) {
      throw new Error('upsert requires at least one column');
    }
    const { identifier } = normalizeTableFqn(tableFqn);
    const columns = entries.map(([column]) => column);
    const insertPlaceholders = entries.map(() => '?').join(', ');
    const updateAssignments = entries
      .filter(([column]) => !keyColumns.includes(column))
      .map(([column]) => `"${column}" = EXCLUDED."${column}"`)
      .join(', ');
    const conflictTarget = keyColumns.map((c) => `"${c}"`).join(', ');
    const sqlParts = [
      `INSERT INTO ${identifier} (${columns.map((c) => `"${c}"`).join(', ')}) VALUES (${insertPlaceholders})`,
      `ON CONFLICT (${conflictTarget})`,
    ];
    if (updateAssignments) {
      sqlParts.push(`DO UPDATE SET ${updateAssignments}`);
    } else {
      // DO NOTHING would return no row; a no-op update keeps RETURNING populated
      sqlParts.push(`DO UPDATE SET "${keyColumns[0]}" = EXCLUDED."${keyColumns[0]}"`);
    }
    sqlParts.push('RETURNING *');
    const sql = sqlParts.join(' ');
    const params = entries.map(([, value]) => value);
    const result = await this.runQuery<T>(sql, {
      params,
      options: { operation: options?.operation ?? 'upsert' },
      client,
    });
    return firstRow(result.rows, `upsert into ${identifier}`);
  }
}

function firstRow<T>(rows: T[], context: string): T {
  const [row] = rows;
  if (row === undefined) {
    throw new PostgresAdapterError(`${context} returned no row`, 'no_row');
  }
  return row;
}

function isDriverError(error: Error): boolean {
  return error instanceof PostgresAdapterError || 'severity' in error;
}

export function createPostgresDbAdapter(config?: Partial<PostgresAdapterConfig>): PostgresDbAdapter {
  return new PostgresDbAdapter(buildConfig(config));
}
