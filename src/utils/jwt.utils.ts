import * as jwt from 'jsonwebtoken';
import type { AccessTokenPayload, InstructorRole, MeetingAccessTokenPayload } from '../types/auth.types';
import { isInstructorRole } from './roles';

const ALGORITHM: jwt.Algorithm = 'HS256';

export interface TokenServiceOptions {
  secret: string;
  accessTokenTtlSeconds: number;
  meetingTokenTtlSeconds: number;
}

export interface VerifiedAccessToken {
  instructorId: number;
  username: string;
  role: InstructorRole;
}

export class TokenError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'TokenError';
  }
}

function decode(token: string, secret: string): jwt.JwtPayload {
  let decoded: string | jwt.JwtPayload;
  try {
    decoded = jwt.verify(token, secret, { algorithms: [ALGORITHM] });
  } catch (error) {
    throw new TokenError(error instanceof Error ? error.message : 'invalid token');
  }
  if (typeof decoded === 'string') {
    throw new TokenError('unexpected token payload');
  }
  return decoded;
}

/**
 * Signs and verifies instructor access tokens and meeting access tokens (HS256).
 */
export class TokenService {
  constructor(private readonly options: TokenServiceOptions) {}

  signAccessToken(instructor: { id: number; username: string; role: InstructorRole }): {
    token: string;
    expiresIn: number;
  } {
    const payload: AccessTokenPayload = {
      sub: String(instructor.id),
      username: instructor.username,
      role: instructor.role,
      type: 'access',
    };
    const token = jwt.sign(payload, this.options.secret, {
      algorithm: ALGORITHM,
      expiresIn: this.options.accessTokenTtlSeconds,
    });
    return { token, expiresIn: this.options.accessTokenTtlSeconds };
  }

  verifyAccessToken(token: string): VerifiedAccessToken {
    const decoded = decode(token, this.options.secret);
    if (decoded.type !== 'access') {
      throw new TokenError('invalid token type');
    }
    const instructorId = Number(decoded.sub);
    const username: unknown = decoded.username;
    const role: unknown = decoded.role;
    if (!Number.isInteger(instructorId) || instructorId <= 0 || typeof username !== 'string' || !isInstructorRole(role)) {
      throw new TokenError('malformed access token');
    }
    return { instructorId, username, role };
  }

  signMeetingAccessToken(meetingCode: string): { token: string; expiresIn: number } {
    const payload: MeetingAccessTokenPayload = { meetingCode, type: 'meeting_access' };
    const token = jwt.sign(payload, this.options.secret, {
      algorithm: ALGORITHM,
      expiresIn: this.options.meetingTokenTtlSeconds,
    });
    return { token, expiresIn: this.options.meetingTokenTtlSeconds };
  }

  /** Returns the meeting code the token grants access to. */
  verifyMeetingAccessToken(token: string): string {
    const decoded = decode(token, this.options.secret);
    const meetingCode: unknown = decoded.meetingCode;
    if (decoded.type !== 'meeting_access' || typeof meetingCode !== 'string') {
      throw new TokenError('invalid token type');
    }
    return meetingCode;
  }
}

export function createTokenService(options: TokenServiceOptions): TokenService {
  return new TokenService(options);
}
