import bcrypt from 'bcryptjs';
import type { InstructorRecord, InstructorRepositoryPort } from './ports/instructor.repository.port';
import type { ApiKeyService, ApiKeyView } from './api-key.service';
import type { AuditLogService } from './audit-log.service';
import type { AuthContext, InstructorRole } from '../types/auth.types';
import type { TokenService } from '../utils/jwt.utils';
import { isUniqueViolation } from '../adapters/db/postgres.adapter';
import { roleRank } from '../utils/roles';
import { toIso } from '../utils/question-views';
import {
  AuthenticationError,
  AuthorizationError,
  ConflictError,
  NotFoundError,
  ValidationError,
} from '../utils/errors';
import { ErrorCodes } from '../types/api.types';
import { logger } from '../utils/logger';

export interface InstructorProfile {
  id: number;
  username: string;
  email: string | null;
  display_name: string | null;
  role: InstructorRole;
  is_active: boolean;
  created_at: string;
  last_login: string | null;
}

export interface RegisterInput {
  username: string;
  password: string;
  email?: string | null;
  displayName?: string | null;
}

export interface UpdateProfileInput {
  displayName?: string | null;
  email?: string | null;
  currentPassword?: string;
  newPassword?: string;
}

export interface LoginResult {
  accessToken: string;
  tokenType: 'Bearer';
  expiresIn: number;
  instructor: InstructorProfile;
}

export function toInstructorProfile(record: InstructorRecord): InstructorProfile {
  return {
    id: record.id,
    username: record.username,
    email: record.email,
    display_name: record.display_name,
    role: record.role,
    is_active: record.is_active,
    created_at: toIso(record.created_at),
    last_login: toIso(record.last_login),
  };
}

export class InstructorService {
  constructor(
    private readonly instructors: InstructorRepositoryPort,
    private readonly apiKeys: ApiKeyService,
    private readonly tokens: TokenService,
    private readonly audit: AuditLogService,
    private readonly options: { registrationEnabled: boolean; passwordHashRounds: number }
  ) {}

  private dummyHash: Promise<string> | null = null;

  // Unknown logins still pay for one bcrypt comparison
  private getDummyHash(): Promise<string> {
    if (!this.dummyHash) {
      this.dummyHash = bcrypt.hash('unknown-login-placeholder', this.options.passwordHashRounds);
    }
    return this.dummyHash;
  }

  /**
   * The first account on an empty installation becomes super_admin.
   */
  async register(input: RegisterInput): Promise<{ instructor: InstructorProfile; apiKey: ApiKeyView }> {
    if (!this.options.registrationEnabled) {
      throw new AuthorizationError('Registration is disabled');
    }
    const passwordHash = await bcrypt.hash(input.password, this.options.passwordHashRounds);
    const role: InstructorRole = (await this.instructors.count()) === 0 ? 'super_admin' : 'instructor';

    let created: InstructorRecord;
    try {
      created = await this.instructors.insertInstructor({
        username: input.username,
        email: input.email ?? null,
        display_name: input.displayName ?? null,
        password_hash: passwordHash,
        role,
      });
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('Username or email is already registered');
      }
      throw error;
    }

    const apiKey = await this.apiKeys.issuePrimaryKey(created);
    logger.info('instructor:registered', { instructorId: created.id, role });
    return { instructor: toInstructorProfile(created), apiKey };
  }

  async login(login: string, password: string): Promise<LoginResult> {
    const record = await this.instructors.getByLogin(login);
    const matches = await bcrypt.compare(password, record?.password_hash ?? (await this.getDummyHash()));
    if (!record || !matches) {
      logger.info('instructor:login_failed', { reason: record ? 'bad_password' : 'unknown_login' });
      throw new AuthenticationError('Invalid username or password', ErrorCodes.INVALID_CREDENTIALS);
    }
    if (!record.is_active) {
      throw new AuthenticationError('Account is deactivated', ErrorCodes.INVALID_CREDENTIALS);
    }
    const now = new Date();
    await this.instructors.touchLastLogin(record.id, now);
    const { token, expiresIn } = this.tokens.signAccessToken(record);
    logger.info('instructor:login', { instructorId: record.id });
    return {
      accessToken: token,
      tokenType: 'Bearer',
      expiresIn,
      instructor: toInstructorProfile({ ...record, last_login: now }),
    };
  }

  async getProfile(auth: AuthContext): Promise<InstructorProfile> {
    const record = await this.instructors.getById(auth.instructorId);
    if (!record) throw new NotFoundError('Instructor not found');
    return toInstructorProfile(record);
  }

  async updateProfile(auth: AuthContext, input: UpdateProfileInput): Promise<InstructorProfile> {
    const record = await this.instructors.getById(auth.instructorId);
    if (!record) throw new NotFoundError('Instructor not found');

    let passwordHash: string | undefined;
    if (input.newPassword !== undefined) {
      if (!input.currentPassword || !(await bcrypt.compare(input.currentPassword, record.password_hash))) {
        throw new ValidationError('Current password is incorrect');
      }
      passwordHash = await bcrypt.hash(input.newPassword, this.options.passwordHashRounds);
    }

    try {
      const updated = await this.instructors.updateProfile(record.id, {
        display_name: input.displayName,
        email: input.email,
        password_hash: passwordHash,
      });
      if (!updated) throw new NotFoundError('Instructor not found');
      return toInstructorProfile(updated);
    } catch (error) {
      if (isUniqueViolation(error)) {
        throw new ConflictError('Email is already registered');
      }
      throw error;
    }
  }

  async listInstructors(): Promise<InstructorProfile[]> {
    const records = await this.instructors.listAll();
    return records.map(toInstructorProfile);
  }

  async setActive(targetId: number, isActive: boolean, auth: AuthContext): Promise<InstructorProfile> {
    const target = await this.instructors.getById(targetId);
    if (!target) throw new NotFoundError('Instructor not found');
    if (!isActive && target.id === auth.instructorId) {
      throw new ConflictError('You cannot deactivate your own account');
    }
    if (roleRank(target.role) > roleRank(auth.role)) {
      throw new AuthorizationError('Cannot change an account with a higher role');
    }
    const updated = await this.instructors.setActive(targetId, isActive);
    if (!updated) throw new NotFoundError('Instructor not found');
    await this.audit.record(auth, isActive ? 'instructor.activate' : 'instructor.deactivate', 'instructor', targetId, {
      previous: target.is_active,
    });
    logger.info('instructor:active_changed', { instructorId: targetId, isActive, by: auth.instructorId });
    return toInstructorProfile(updated);
  }
}
