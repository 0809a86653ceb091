import { z } from 'zod';
import { buildError, buildOk, mapZodIssues } from '../../../utils/api-response';
import { ErrorCodes } from '../../../types/api.types';

describe('api-response helpers', () => {
  it('buildOk returns standard shape', () => {
    const resp = buildOk({ hello: 'world' }, 'req-1');
    expect(resp).toEqual({ success: true, data: { hello: 'world' }, timestamp: expect.any(String), requestId: 'req-1' });
  });

  it('omits requestId when there is none', () => {
    expect(buildOk(null)).not.toHaveProperty('requestId');
  });

  it('buildError returns standard error shape', () => {
    const resp = buildError(ErrorCodes.VALIDATION_ERROR, 'Bad input', { field: 'name' }, 'abc');
    expect(resp).toEqual({
      success: false,
      error: { code: 'VALIDATION_ERROR', message: 'Bad input', details: { field: 'name' } },
      timestamp: expect.any(String),
      requestId: 'abc',
    });
  });

  it('mapZodIssues flattens paths', () => {
    const result = z.object({ answer: z.object({ text: z.string().min(1) }) }).safeParse({ answer: { text: '' } });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(mapZodIssues(result.error)).toEqual({
        issues: [{ path: 'answer.text', message: expect.any(String), code: 'too_small' }],
      });
    }
  });
});
