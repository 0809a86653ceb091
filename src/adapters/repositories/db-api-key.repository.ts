import type { ApiKeyRecord, ApiKeyRepositoryPort } from '../../services/ports/api-key.repository.port';
import type { DbPort } from '../../services/ports/db.port';
import { qaTable } from '../db/fqn.utils';

const API_KEY_TABLE = qaTable('api_keys');

export class DbApiKeyRepository implements ApiKeyRepositoryPort {
  constructor(private readonly db: DbPort) {}

  async insertKey(data: { instructor_id: number; key: string; name: string }): Promise<ApiKeyRecord> {
    return this.db.insert<ApiKeyRecord>(API_KEY_TABLE, data, { operation: 'insertApiKey' });
  }

  async getActiveByKey(key: string): Promise<ApiKeyRecord | null> {
    const sql = `
      SELECT id, instructor_id, key, name, is_active, created_at, last_used
      FROM ${API_KEY_TABLE}
      WHERE key = ? AND is_active = TRUE
    `;
    return this.db.queryOne<ApiKeyRecord>(sql, [key], { operation: 'getActiveApiKey' });
  }

  async listForInstructor(instructorId: number): Promise<ApiKeyRecord[]> {
    const sql = `
      SELECT id, instructor_id, key, name, is_active, created_at, last_used
      FROM ${API_KEY_TABLE}
      WHERE instructor_id = ?
      ORDER BY created_at DESC, id DESC
    `;
    return this.db.query<ApiKeyRecord>(sql, [instructorId], { operation: 'listApiKeys' });
  }

  async revoke(keyId: number, instructorId: number): Promise<boolean> {
    const sql = `
      UPDATE ${API_KEY_TABLE}
      SET is_active = FALSE
      WHERE id = ? AND instructor_id = ? AND is_active = TRUE
      RETURNING id
    `;
    const row = await this.db.queryOne<{ id: number }>(sql, [keyId, instructorId], { operation: 'revokeApiKey' });
    return row !== null;
  }

  async touchLastUsed(keyId: number, at: Date): Promise<void> {
    await this.db.update(API_KEY_TABLE, keyId, { last_used: at }, 'id', { operation: 'touchApiKey' });
  }
}

export function createDbApiKeyRepository(db: DbPort): ApiKeyRepositoryPort {
  return new DbApiKeyRepository(db);
}
