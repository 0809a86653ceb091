import type { InstructorRole } from '../../types/auth.types';

export interface InstructorRecord {
  id: number;
  username: string;
  email: string | null;
  display_name: string | null;
  password_hash: string;
  role: InstructorRole;
  is_active: boolean;
  created_at: Date;
  last_login: Date | null;
}

export interface NewInstructor {
  username: string;
  email: string | null;
  display_name: string | null;
  password_hash: string;
  role: InstructorRole;
}

export interface InstructorProfilePatch {
  display_name?: string | null;
  email?: string | null;
  password_hash?: string;
}

export interface InstructorRepositoryPort {
  insertInstructor(data: NewInstructor): Promise<InstructorRecord>;
  getById(id: number): Promise<InstructorRecord | null>;
  /**
   * Login lookup: matches the username or the email, case-insensitively for email
   */
  getByLogin(login: string): Promise<InstructorRecord | null>;
  updateProfile(id: number, patch: InstructorProfilePatch): Promise<InstructorRecord | null>;
  touchLastLogin(id: number, at: Date): Promise<void>;
  setActive(id: number, isActive: boolean): Promise<InstructorRecord | null>;
  listAll(): Promise<InstructorRecord[]>;
  count(): Promise<number>;
}
