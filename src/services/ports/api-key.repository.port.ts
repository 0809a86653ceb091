export interface ApiKeyRecord {
  id: number;
  instructor_id: number;
  key: string;
  name: string;
  is_active: boolean;
  created_at: Date;
  last_used: Date | null;
}

export interface ApiKeyRepositoryPort {
  insertKey(data: { instructor_id: number; key: string; name: string }): Promise<ApiKeyRecord>;
  getActiveByKey(key: string): Promise<ApiKeyRecord | null>;
  listForInstructor(instructorId: number): Promise<ApiKeyRecord[]>;
  /** Returns false when the key does not exist, belongs to someone else or is already revoked. */
  revoke(keyId: number, instructorId: number): Promise<boolean>;
  touchLastUsed(keyId: number, at: Date): Promise<void>;
}
