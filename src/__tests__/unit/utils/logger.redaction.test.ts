import { logger, redactObject, redactValue } from '../../../utils/logger';

describe('logger redaction', () => {
  it('redacts sensitive keys at any depth', () => {
    const redacted = redactObject({
      Authorization: 'Bearer abcdef123456',
      password: 'test-password',
      instructor_code: 'abc123',
      meetingToken: 'xyz',
      'X-API-Key': 'qak_placeholder',
      email: 'user@example.test',
      nested: { newPassword: 'test-password', questionId: 7 },
      list: [{ secret: 'test-secret' }, 'Bearer inline'],
    });

    expect(redacted).toEqual({
      Authorization: '[REDACTED]',
      password: '[REDACTED]',
      instructor_code: '[REDACTED]',
      meetingToken: '[REDACTED]',
      'X-API-Key': '[REDACTED]',
      email: '[REDACTED]',
      nested: { newPassword: '[REDACTED]', questionId: 7 },
      list: [{ secret: '[REDACTED]' }, 'Bearer [REDACTED]'],
    });
  });

  it('keeps allow-listed keys', () => {
    expect(redactObject({ email: 'user@example.test' }, ['email'])).toEqual({ email: '[REDACTED_EMAIL]' });
  });

  it('redacts token-shaped values under innocent keys', () => {
    expect(redactValue('Bearer token-here')).toBe('Bearer [REDACTED]');
    expect(redactValue('abc.def.ghi')).toBe('[REDACTED_JWT]');
    expect(redactValue('qak_abcdef')).toBe('[REDACTED_API_KEY]');
    expect(redactValue('someone@example.test')).toBe('[REDACTED_EMAIL]');
    expect(redactValue('not-a-token')).toBe('not-a-token');
    expect(redactValue(42)).toBe(42);
  });
});

describe('logger output', () => {
  const previous = process.env.LOG_LEVEL;

  afterEach(() => {
    if (previous === undefined) delete process.env.LOG_LEVEL;
    else process.env.LOG_LEVEL = previous;
  });

  it('writes one JSON line per entry with the context merged in', () => {
    process.env.LOG_LEVEL = 'info';
    logger.info('meeting:started', { meetingId: 3, password: 'test-password' });

    expect(console.log).toHaveBeenCalledTimes(1);
    const line = jest.mocked(console.log).mock.calls[0]?.[0];
    expect(typeof line).toBe('string');
    expect(JSON.parse(String(line))).toMatchObject({
      level: 'info',
      msg: 'meeting:started',
      meetingId: 3,
      password: '[REDACTED]',
    });
  });

  it('routes by level and honours LOG_LEVEL', () => {
    process.env.LOG_LEVEL = 'warn';
    logger.info('ignored');
    logger.warn('careful');
    logger.error('broken', new Error('boom'));

    expect(console.log).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(jest.mocked(console.error).mock.calls[0]?.[0]))).toMatchObject({ msg: 'broken', error: 'boom' });
  });

  it('writes nothing when silent', () => {
    process.env.LOG_LEVEL = 'silent';
    logger.error('hidden');
    expect(console.error).not.toHaveBeenCalled();
  });
});
