import type { InstructorRole } from '../../types/auth.types';

export const AUDIT_ACTIONS = [
  'meeting.create',
  'meeting.start',
  'meeting.end',
  'meeting.restart',
  'meeting.reconcile_votes',
  'question.approve',
  'question.reject',
  'api_key.create',
  'api_key.revoke',
  'instructor.activate',
  'instructor.deactivate',
] as const;

export type AuditAction = (typeof AUDIT_ACTIONS)[number];

export type AuditTargetType = 'meeting' | 'question' | 'api_key' | 'instructor';

export interface AuditLogRecord {
  id: number;
  actor_id: number | null;
  actor_role: InstructorRole | null;
  action: AuditAction;
  target_type: AuditTargetType;
  target_id: string | null;
  details: Record<string, unknown>;
  created_at: Date;
}

export interface NewAuditEntry {
  actor_id: number | null;
  actor_role: InstructorRole | null;
  action: AuditAction;
  target_type: AuditTargetType;
  target_id: string | null;
  details?: Record<string, unknown>;
}

export interface AuditLogQuery {
  limit: number;
  offset: number;
  action?: AuditAction;
  actorId?: number;
}

// Append-only
export interface AuditLogRepositoryPort {
  append(entry: NewAuditEntry): Promise<AuditLogRecord>;
  list(query: AuditLogQuery): Promise<AuditLogRecord[]>;
}
