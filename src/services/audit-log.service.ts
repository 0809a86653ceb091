import type {
  AuditAction,
  AuditLogQuery,
  AuditLogRecord,
  AuditLogRepositoryPort,
  AuditTargetType,
} from './ports/audit-log.repository.port';
import type { AuthContext } from '../types/auth.types';
import { logger } from '../utils/logger';

export class AuditLogService {
  constructor(private readonly repository: AuditLogRepositoryPort) {}

  /**
   * Appends an entry. A failed write is logged; the audited action has already happened.
   */
  async record(
    actor: AuthContext | null,
    action: AuditAction,
    targetType: AuditTargetType,
    targetId: number | string | null,
    details: Record<string, unknown> = {}
  ): Promise<void> {
    try {
      await this.repository.append({
        actor_id: actor?.instructorId ?? null,
        actor_role: actor?.role ?? null,
        action,
        target_type: targetType,
        target_id: targetId === null ? null : String(targetId),
        details: actor?.method === 'api_key' ? { ...details, via: 'api_key', api_key_id: actor.apiKeyId } : details,
      });
    } catch (error) {
      logger.error('audit:append_failed', {
        action,
        targetType,
        targetId,
        error: error instanceof Error ? error.message : String(error),
      });
    }
  }

  list(query: AuditLogQuery): Promise<AuditLogRecord[]> {
    return this.repository.list(query);
  }
}
