export type InstructorRole = 'instructor' | 'admin' | 'super_admin';

export type AuthMethod = 'jwt' | 'api_key';

/**
 * Authenticated instructor attached to the request by `authenticate`.
 */
export interface AuthContext {
  instructorId: number;
  username: string;
  role: InstructorRole;
  method: AuthMethod;
  /** Set when the request authenticated with an API key. */
  apiKeyId?: number;
}

/** Payload of instructor access tokens. */
export interface AccessTokenPayload {
  sub: string;
  username: string;
  role: InstructorRole;
  type: 'access';
}

/** Payload of the short-lived token granting access to a password-protected meeting. */
export interface MeetingAccessTokenPayload {
  meetingCode: string;
  type: 'meeting_access';
}

/**
 * What a student presents for a meeting: nothing, or a verified meeting access token.
 */
export interface MeetingAccess {
  grantedMeetingCode: string | null;
}

declare global {
  namespace Express {
    interface Request {
      auth?: AuthContext;
      meetingAccess?: MeetingAccess;
    }
  }
}
