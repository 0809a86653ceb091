import type {
  AuditLogQuery,
  AuditLogRecord,
  AuditLogRepositoryPort,
  NewAuditEntry,
} from '../../services/ports/audit-log.repository.port';
import type { DbPort } from '../../services/ports/db.port';
import { qaTable } from '../db/fqn.utils';

const AUDIT_TABLE = qaTable('audit_log');

export class DbAuditLogRepository implements AuditLogRepositoryPort {
  constructor(private readonly db: DbPort) {}

  async append(entry: NewAuditEntry): Promise<AuditLogRecord> {
    return this.db.insert<AuditLogRecord>(
      AUDIT_TABLE,
      {
        actor_id: entry.actor_id,
        actor_role: entry.actor_role,
        action: entry.action,
        target_type: entry.target_type,
        target_id: entry.target_id,
        details: entry.details ?? {},
      },
      { operation: 'appendAuditLog' }
    );
  }

  async list(query: AuditLogQuery): Promise<AuditLogRecord[]> {
    const clauses: string[] = [];
    const params: unknown[] = [];
    if (query.action) {
      clauses.push('action = ?');
      params.push(query.action);
    }
    if (query.actorId !== undefined) {
      clauses.push('actor_id = ?');
      params.push(query.actorId);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';
    const sql = `
      SELECT id, actor_id, actor_role, action, target_type, target_id, details, created_at
      FROM ${AUDIT_TABLE}
      ${where}
      ORDER BY created_at DESC, id DESC
      LIMIT ? OFFSET ?
    `;
    return this.db.query<AuditLogRecord>(sql, [...params, query.limit, query.offset], { operation: 'listAuditLog' });
  }
}

export function createDbAuditLogRepository(db: DbPort): AuditLogRepositoryPort {
  return new DbAuditLogRepository(db);
}
