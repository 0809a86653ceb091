import { randomBytes } from 'crypto';

export const MEETING_CODE_LENGTH = 32;

// base64url of 24 bytes is exactly 32 url-safe characters
export function generateMeetingCode(): string {
  return randomBytes(24).toString('base64url');
}

export const API_KEY_PREFIX = 'qak_';

export function generateApiKey(): string {
  return `${API_KEY_PREFIX}${randomBytes(32).toString('base64url')}`;
}
