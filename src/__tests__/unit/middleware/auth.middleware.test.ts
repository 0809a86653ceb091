import request from 'supertest';
import express from 'express';
import { authenticate, requireRole, resolveMeetingAccess } from '../../../middleware/auth.middleware';
import { errorLoggingHandler } from '../../../middleware/error-logging.middleware';
import { createTestContext, seedInstructor, type TestContext } from '../../test-utils/app-setup';

function authApp() {
  const app = express();
  app.get('/me', authenticate, (req, res) => {
    res.json({ auth: req.auth });
  });
  app.get('/admin', authenticate, requireRole('admin'), (_req, res) => {
    res.json({ ok: true });
  });
  app.get('/student', resolveMeetingAccess, (req, res) => {
    res.json({ access: req.meetingAccess });
  });
  app.use(errorLoggingHandler);
  return app;
}

describe('auth middleware', () => {
  let ctx: TestContext;

  beforeEach(() => {
    ctx = createTestContext();
  });

  it('accepts a bearer token', async () => {
    const { token } = await seedInstructor(ctx.root, 'alice');
    const res = await request(authApp()).get('/me').set('Authorization', `Bearer ${token}`);
    expect(res.status).toBe(200);
    expect(res.body.auth).toEqual({ instructorId: 1, username: 'alice', role: 'super_admin', method: 'jwt' });
  });

  it('accepts an API key header', async () => {
    const { apiKey } = await seedInstructor(ctx.root, 'alice');
    const res = await request(authApp()).get('/me').set('X-API-Key', apiKey.key);
    expect(res.status).toBe(200);
    expect(res.body.auth).toMatchObject({ method: 'api_key', apiKeyId: apiKey.id });
  });

  it('rejects a request without credentials', async () => {
    const res = await request(authApp()).get('/me');
    expect(res.status).toBe(401);
    expect(res.body.error).toEqual({ code: 'AUTH_REQUIRED', message: 'No valid authorization token provided' });
  });

  it('rejects a malformed token', async () => {
    const res = await request(authApp()).get('/me').set('Authorization', 'Bearer not-a-token');
    expect(res.status).toBe(401);
    expect(res.body.error.code).toBe('INVALID_TOKEN');
  });

  it('enforces the minimum role', async () => {
    const admin = await seedInstructor(ctx.root, 'site-admin');
    const alice = await seedInstructor(ctx.root, 'alice');

    const denied = await request(authApp()).get('/admin').set('Authorization', `Bearer ${alice.token}`);
    expect(denied.status).toBe(403);
    expect(denied.body.error).toEqual({ code: 'INSUFFICIENT_PERMISSIONS', message: 'admin access required' });

    const allowed = await request(authApp()).get('/admin').set('Authorization', `Bearer ${admin.token}`);
    expect(allowed.status).toBe(200);
  });

  it('grants nothing for a missing or invalid meeting token', async () => {
    const none = await request(authApp()).get('/student');
    const invalid = await request(authApp()).get('/student').set('X-Meeting-Token', 'garbage');
    expect(none.body.access).toEqual({ grantedMeetingCode: null });
    expect(invalid.body.access).toEqual({ grantedMeetingCode: null });
  });

  it('grants the meeting named in a valid token', async () => {
    const { token } = ctx.root.getTokenService().signMeetingAccessToken('abc123');
    const res = await request(authApp()).get('/student').set('X-Meeting-Token', token);
    expect(res.body.access).toEqual({ grantedMeetingCode: 'abc123' });
  });
});
