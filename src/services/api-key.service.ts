import type { ApiKeyRecord, ApiKeyRepositoryPort } from './ports/api-key.repository.port';
import type { AuditLogService } from './audit-log.service';
import type { AuthContext } from '../types/auth.types';
import { generateApiKey } from '../utils/codes';
import { toIso } from '../utils/question-views';
import { NotFoundError } from '../utils/errors';
import { logger } from '../utils/logger';

export const PRIMARY_API_KEY_NAME = 'Primary API Key';

export interface ApiKeyView {
  id: number;
  name: string;
  key: string;
  is_active: boolean;
  created_at: string;
  last_used: string | null;
}

/** Keys are shown in full only when created; listings carry a masked form. */
export function maskApiKey(key: string): string {
  return key.length <= 12 ? '****' : `${key.slice(0, 8)}...${key.slice(-4)}`;
}

function toView(record: ApiKeyRecord, reveal: boolean): ApiKeyView {
  return {
    id: record.id,
    name: record.name,
    key: reveal ? record.key : maskApiKey(record.key),
    is_active: record.is_active,
    created_at: toIso(record.created_at),
    last_used: toIso(record.last_used),
  };
}

export class ApiKeyService {
  constructor(
    private readonly apiKeys: ApiKeyRepositoryPort,
    private readonly audit: AuditLogService
  ) {}

  async issuePrimaryKey(instructor: { id: number }): Promise<ApiKeyView> {
    const record = await this.apiKeys.insertKey({
      instructor_id: instructor.id,
      key: generateApiKey(),
      name: PRIMARY_API_KEY_NAME,
    });
    return toView(record, true);
  }

  async createKey(auth: AuthContext, name: string): Promise<ApiKeyView> {
    const record = await this.apiKeys.insertKey({ instructor_id: auth.instructorId, key: generateApiKey(), name });
    await this.audit.record(auth, 'api_key.create', 'api_key', record.id, { name });
    return toView(record, true);
  }

  async listKeys(auth: AuthContext): Promise<ApiKeyView[]> {
    const records = await this.apiKeys.listForInstructor(auth.instructorId);
    return records.map((record) => toView(record, false));
  }

  async revokeKey(auth: AuthContext, keyId: number): Promise<void> {
    const revoked = await this.apiKeys.revoke(keyId, auth.instructorId);
    if (!revoked) throw new NotFoundError('API key not found');
    await this.audit.record(auth, 'api_key.revoke', 'api_key', keyId);
    logger.info('api_key:revoked', { keyId, instructorId: auth.instructorId });
  }

  /** Resolves an active key and stamps its last use. */
  async resolveKey(key: string): Promise<ApiKeyRecord | null> {
    const record = await this.apiKeys.getActiveByKey(key);
    if (!record) return null;
    await this.apiKeys.touchLastUsed(record.id, new Date());
    return record;
  }
}
