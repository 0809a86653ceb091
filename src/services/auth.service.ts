import type { InstructorRepositoryPort } from './ports/instructor.repository.port';
import type { ApiKeyService } from './api-key.service';
import type { AuthContext } from '../types/auth.types';
import type { TokenService, VerifiedAccessToken } from '../utils/jwt.utils';
import { TokenError } from '../utils/jwt.utils';
import { AuthenticationError } from '../utils/errors';
import { ErrorCodes } from '../types/api.types';

/**
 * Turns a bearer token or API key into an AuthContext. Deactivated accounts
 * are rejected on every request, not just at login.
 */
export class AuthService {
  constructor(
    private readonly instructors: InstructorRepositoryPort,
    private readonly apiKeys: ApiKeyService,
    private readonly tokens: TokenService
  ) {}

  async authenticateBearer(token: string): Promise<AuthContext> {
    const claims = this.verify(token);
    const instructor = await this.instructors.getById(claims.instructorId);
    if (!instructor || !instructor.is_active) {
      throw new AuthenticationError('Account is not active', ErrorCodes.INVALID_TOKEN);
    }
    return { instructorId: instructor.id, username: instructor.username, role: instructor.role, method: 'jwt' };
  }

  private verify(token: string): VerifiedAccessToken {
    try {
      return this.tokens.verifyAccessToken(token);
    } catch (error) {
      if (error instanceof TokenError) {
        throw new AuthenticationError('Invalid or expired token', ErrorCodes.INVALID_TOKEN);
      }
      throw error;
    }
  }

  async authenticateApiKey(key: string): Promise<AuthContext> {
    const record = await this.apiKeys.resolveKey(key);
    if (!record) {
      throw new AuthenticationError('Invalid API key', ErrorCodes.INVALID_TOKEN);
    }
    const instructor = await this.instructors.getById(record.instructor_id);
    if (!instructor || !instructor.is_active) {
      throw new AuthenticationError('Account is not active', ErrorCodes.INVALID_TOKEN);
    }
    return {
      instructorId: instructor.id,
      username: instructor.username,
      role: instructor.role,
      method: 'api_key',
      apiKeyId: record.id,
    };
  }
}
