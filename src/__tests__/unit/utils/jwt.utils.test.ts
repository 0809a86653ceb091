import * as jwt from 'jsonwebtoken';
import { TokenError, createTokenService } from '../../../utils/jwt.utils';

const tokens = createTokenService({ secret: 'test-secret', accessTokenTtlSeconds: 900, meetingTokenTtlSeconds: 3600 });

describe('TokenService', () => {
  it('round-trips an access token', () => {
    const { token, expiresIn } = tokens.signAccessToken({ id: 5, username: 'alice', role: 'admin' });
    expect(expiresIn).toBe(900);
    expect(tokens.verifyAccessToken(token)).toEqual({ instructorId: 5, username: 'alice', role: 'admin' });
  });

  it('round-trips a meeting access token', () => {
    const { token } = tokens.signMeetingAccessToken('abc123');
    expect(tokens.verifyMeetingAccessToken(token)).toBe('abc123');
  });

  it('does not accept one token type for the other', () => {
    const meeting = tokens.signMeetingAccessToken('abc123').token;
    const access = tokens.signAccessToken({ id: 5, username: 'alice', role: 'instructor' }).token;
    expect(() => tokens.verifyAccessToken(meeting)).toThrow(TokenError);
    expect(() => tokens.verifyMeetingAccessToken(access)).toThrow('invalid token type');
  });

  it('rejects a token signed with another secret', () => {
    const forged = jwt.sign({ sub: '5', username: 'alice', role: 'admin', type: 'access' }, 'other-secret');
    expect(() => tokens.verifyAccessToken(forged)).toThrow(TokenError);
  });

  it('rejects an unknown role', () => {
    const odd = jwt.sign({ sub: '5', username: 'alice', role: 'owner', type: 'access' }, 'test-secret');
    expect(() => tokens.verifyAccessToken(odd)).toThrow('malformed access token');
  });

  it('rejects an expired token', () => {
    const expired = jwt.sign(
      { sub: '5', username: 'alice', role: 'admin', type: 'access', exp: Math.floor(Date.now() / 1000) - 10 },
      'test-secret'
    );
    expect(() => tokens.verifyAccessToken(expired)).toThrow('jwt expired');
  });
});
