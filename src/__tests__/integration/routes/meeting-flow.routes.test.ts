import request from 'supertest';
import type { Express } from 'express';
import { createTestApp } from '../../test-utils/app-setup';

const STUDENT = '11111111-1111-4111-8111-111111111111';

async function registerAndLogin(app: Express, username: string): Promise<string> {
  await request(app).post('/api/v1/instructors/register').send({ username, password: 'test-password' }).expect(201);
  const login = await request(app).post('/api/v1/instructors/login').send({ login: username, password: 'test-password' });
  return login.body.data.accessToken;
}

async function openMeeting(
  app: Express,
  token: string,
  body: Record<string, unknown> = { title: 'Week 1' }
): Promise<{ meeting_code: string; instructor_code: string }> {
  const created = await request(app)
    .post('/api/v1/classes')
    .set('Authorization', `Bearer ${token}`)
    .send({ name: 'Physics 101' })
    .expect(201);
  const meeting = await request(app)
    .post(`/api/v1/classes/${created.body.data.class.id}/meetings`)
    .set('Authorization', `Bearer ${token}`)
    .send(body)
    .expect(201);
  return meeting.body.data.meeting;
}

describe('Instructor identity routes', () => {
  it('registers, reveals the API key once and logs in', async () => {
    const { app } = createTestApp();

    const registered = await request(app)
      .post('/api/v1/instructors/register')
      .send({ username: 'alice', password: 'test-password', email: 'alice@example.test' });

    expect(registered.status).toBe(201);
    expect(registered.body.data.instructor).toMatchObject({ id: 1, username: 'alice', role: 'super_admin' });
    expect(registered.body.data.instructor).not.toHaveProperty('password_hash');
    expect(registered.body.data.apiKey.key).toMatch(/^qak_/);

    const me = await request(app).get('/api/v1/instructors/me').set('X-API-Key', registered.body.data.apiKey.key);
    expect(me.body.data.instructor.email).toBe('alice@example.test');

    const keys = await request(app).get('/api/v1/instructors/me/api-keys').set('X-API-Key', registered.body.data.apiKey.key);
    expect(keys.body.data.apiKeys[0].key).toMatch(/^qak_.{4}\.\.\..{4}$/);
  });

  it('rejects a short password with field issues', async () => {
    const { app } = createTestApp();

    const res = await request(app).post('/api/v1/instructors/register').send({ username: 'alice', password: 'short' });

    expect(res.status).toBe(400);
    expect(res.body.error.details.issues).toEqual([
      { path: 'password', message: 'Password must be at least 8 characters', code: 'too_small' },
    ]);
  });

  it('answers a wrong password with 401', async () => {
    const { app } = createTestApp();
    await registerAndLogin(app, 'alice');

    const res = await request(app).post('/api/v1/instructors/login').send({ login: 'alice', password: 'wrong-password' });

    expect(res.status).toBe(401);
    expect(res.body.error).toEqual({ code: 'INVALID_CREDENTIALS', message: 'Invalid username or password' });
  });
});

describe('Meeting flow', () => {
  it('takes a question from submission through votes to the report', async () => {
    const { app } = createTestApp();
    const token = await registerAndLogin(app, 'alice');
    const meeting = await openMeeting(app, token);

    const submitted = await request(app)
      .post(`/api/v1/meetings/${meeting.meeting_code}/questions`)
      .send({ text: '  What is entropy?  ', studentId: STUDENT });
    expect(submitted.status).toBe(201);
    expect(submitted.body.data).toMatchObject({ question_number: 1, status: 'approved', student_id: STUDENT });
    const questionId: number = submitted.body.data.id;

    const vote = await request(app).post(`/api/v1/questions/${questionId}/vote`).send({ studentId: STUDENT });
    expect(vote.status).toBe(200);
    expect(vote.body.data).toEqual({ questionId, upvotes: 1, voted: true });

    const view = await request(app).get(`/api/v1/meetings/${meeting.meeting_code}?studentId=${STUDENT}`);
    expect(view.body.data.meeting).toMatchObject({ title: 'Week 1', class_name: 'Physics 101', state: 'active' });
    expect(view.body.data.meeting.questions).toEqual([
      expect.objectContaining({ id: questionId, text: 'What is entropy?', upvotes: 1, voted: true }),
    ]);

    const report = await request(app)
      .get(`/api/v1/instructor/meetings/${meeting.instructor_code}/report?format=csv`)
      .set('Authorization', `Bearer ${token}`);
    expect(report.status).toBe(200);
    expect(report.headers['content-type']).toBe('text/csv; charset=utf-8');
    expect(report.headers['content-disposition']).toBe(
      `attachment; filename="meeting_${meeting.meeting_code}_report.csv"`
    );
    expect(report.text.split('\r\n')[1]).toMatch(/^1,What is entropy\?,What is entropy\?,approved,1,No,,No,/);
  });

  it('refuses votes once the meeting has ended', async () => {
    const { app } = createTestApp();
    const token = await registerAndLogin(app, 'alice');
    const meeting = await openMeeting(app, token);
    const submitted = await request(app)
      .post(`/api/v1/meetings/${meeting.meeting_code}/questions`)
      .send({ text: 'Last question?' });

    const ended = await request(app)
      .post(`/api/v1/instructor/meetings/${meeting.instructor_code}/end`)
      .set('Authorization', `Bearer ${token}`);
    expect(ended.body.data.meeting.state).toBe('ended');

    const vote = await request(app).post(`/api/v1/questions/${submitted.body.data.id}/vote`).send({ studentId: STUDENT });
    expect(vote.status).toBe(409);
    expect(vote.body.error.code).toBe('MEETING_NOT_ACTIVE');
  });

  it('gates a password-protected meeting behind a meeting token', async () => {
    const { app } = createTestApp();
    const token = await registerAndLogin(app, 'alice');
    const meeting = await openMeeting(app, token, { title: 'Quiz review', password: 'open-sesame' });

    const locked = await request(app).get(`/api/v1/meetings/${meeting.meeting_code}`);
    expect(locked.status).toBe(401);
    expect(locked.body.error.code).toBe('MEETING_PASSWORD_REQUIRED');

    const wrong = await request(app)
      .post(`/api/v1/meetings/${meeting.meeting_code}/verify-password`)
      .send({ password: 'guess' });
    expect(wrong.status).toBe(401);
    expect(wrong.body.error.code).toBe('INVALID_CREDENTIALS');

    const granted = await request(app)
      .post(`/api/v1/meetings/${meeting.meeting_code}/verify-password`)
      .send({ password: 'open-sesame' });
    const open = await request(app)
      .get(`/api/v1/meetings/${meeting.meeting_code}`)
      .set('X-Meeting-Token', granted.body.data.meetingToken);
    expect(open.status).toBe(200);
    expect(open.body.data.meeting).toMatchObject({ title: 'Quiz review', has_password: true });
  });

  it('keeps another instructor out of the instructor view', async () => {
    const { app } = createTestApp();
    await registerAndLogin(app, 'site-admin');
    const alice = await registerAndLogin(app, 'alice');
    const bob = await registerAndLogin(app, 'bob');
    const meeting = await openMeeting(app, alice);

    const res = await request(app)
      .get(`/api/v1/instructor/meetings/${meeting.instructor_code}`)
      .set('Authorization', `Bearer ${bob}`);

    expect(res.status).toBe(403);
    expect(res.body.error.code).toBe('INSUFFICIENT_PERMISSIONS');
  });

  it('validates question text and codes', async () => {
    const { app } = createTestApp();

    const blank = await request(app).post('/api/v1/meetings/abc123/questions').send({ text: '   ' });
    expect(blank.status).toBe(400);
    expect(blank.body.error.details.issues[0]).toMatchObject({ path: 'text', message: 'Question text is required' });

    const badCode = await request(app).get('/api/v1/meetings/not%20a%20code');
    expect(badCode.status).toBe(400);
    expect(badCode.body.error.details.source).toBe('params');
  });
});

describe('Admin routes', () => {
  it('lets an admin deactivate an instructor and read the audit trail', async () => {
    const { app } = createTestApp();
    const admin = await registerAndLogin(app, 'site-admin');
    const alice = await registerAndLogin(app, 'alice');

    const forbidden = await request(app).get('/api/v1/admin/instructors').set('Authorization', `Bearer ${alice}`);
    expect(forbidden.status).toBe(403);

    const deactivated = await request(app)
      .patch('/api/v1/admin/instructors/2/deactivate')
      .set('Authorization', `Bearer ${admin}`);
    expect(deactivated.body.data.instructor).toMatchObject({ id: 2, is_active: false });

    const locked = await request(app).get('/api/v1/instructors/me').set('Authorization', `Bearer ${alice}`);
    expect(locked.status).toBe(401);

    const audit = await request(app)
      .get('/api/v1/admin/audit-log?action=instructor.deactivate')
      .set('Authorization', `Bearer ${admin}`);
    expect(audit.body.data.pagination).toEqual({ limit: 50, offset: 0, count: 1 });
    expect(audit.body.data.entries[0]).toMatchObject({
      actor_id: 1,
      action: 'instructor.deactivate',
      target_type: 'instructor',
      target_id: '2',
    });
  });
});
