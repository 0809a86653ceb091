import type { InstructorRole } from '../types/auth.types';

const ROLE_RANK: Record<InstructorRole, number> = {
  instructor: 1,
  admin: 2,
  super_admin: 3,
};

export const INSTRUCTOR_ROLES: readonly InstructorRole[] = ['instructor', 'admin', 'super_admin'];

export function isInstructorRole(value: unknown): value is InstructorRole {
  const known: readonly string[] = INSTRUCTOR_ROLES;
  return typeof value === 'string' && known.includes(value);
}

export function roleRank(role: InstructorRole): number {
  return ROLE_RANK[role];
}

export function roleAtLeast(actual: InstructorRole, required: InstructorRole): boolean {
  return ROLE_RANK[actual] >= ROLE_RANK[required];
}

// admin and above bypass ownership checks
export function canBypassOwnership(role: InstructorRole): boolean {
  return roleAtLeast(role, 'admin');
}
