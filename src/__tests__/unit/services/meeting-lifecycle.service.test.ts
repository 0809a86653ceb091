import { createTestContext, listen, seedInstructor, seedMeeting } from '../../test-utils/app-setup';
import { studentChannel } from '../../../services/meeting-broadcaster.service';
import { AuthorizationError, ConflictError } from '../../../utils/errors';
import { ErrorCodes } from '../../../types/api.types';
import { MEETING_CODE_LENGTH } from '../../../utils/codes';

describe('MeetingLifecycleService', () => {
  it('creates an active meeting with distinct codes and join urls', async () => {
    const ctx = createTestContext();
    const { auth } = await seedInstructor(ctx.root, 'owner');

    const meeting = await seedMeeting(ctx.root, auth, { title: 'Thermodynamics' });

    expect(meeting).toMatchObject({ title: 'Thermodynamics', is_active: true, state: 'active', has_password: false });
    expect(meeting.started_at).not.toBeNull();
    expect(meeting.meeting_code).toHaveLength(MEETING_CODE_LENGTH);
    expect(meeting.instructor_code).toHaveLength(MEETING_CODE_LENGTH);
    expect(meeting.meeting_code).not.toBe(meeting.instructor_code);
    expect(meeting.student_url).toBe(`http://qa.test/student?code=${meeting.meeting_code}`);
    expect(meeting.instructor_url).toBe(`http://qa.test/instructor?code=${meeting.instructor_code}`);
    expect(ctx.store.auditLog.map((e) => e.action)).toEqual(['meeting.create']);
  });

  it('stores only a hash of the meeting password', async () => {
    const ctx = createTestContext();
    const { auth } = await seedInstructor(ctx.root, 'owner');

    const meeting = await seedMeeting(ctx.root, auth, { password: 'open-sesame' });

    expect(meeting.has_password).toBe(true);
    const stored = ctx.store.meetings.find((m) => m.id === meeting.id);
    expect(stored?.password_hash).toMatch(/^\$2[aby]\$/);
  });

  it('walks created -> active -> ended -> active', async () => {
    const ctx = createTestContext();
    const { auth } = await seedInstructor(ctx.root, 'owner');
    const lifecycle = ctx.root.getMeetingLifecycleService();
    const meeting = await seedMeeting(ctx.root, auth, { startImmediately: false });
    expect(meeting.state).toBe('created');

    const started = await lifecycle.startMeeting(meeting.instructor_code, auth);
    expect(started.state).toBe('active');

    const ended = await lifecycle.endMeeting(meeting.instructor_code, auth);
    expect(ended).toMatchObject({ state: 'ended', is_active: false });
    expect(ended.ended_at).not.toBeNull();

    const restarted = await lifecycle.restartMeeting(meeting.instructor_code, auth);
    expect(restarted).toMatchObject({ state: 'active', is_active: true, ended_at: null });

    expect(ctx.store.auditLog.map((e) => e.action)).toEqual([
      'meeting.create',
      'meeting.start',
      'meeting.end',
      'meeting.restart',
    ]);
  });

  it('rejects transitions from the wrong state', async () => {
    const ctx = createTestContext();
    const { auth } = await seedInstructor(ctx.root, 'owner');
    const lifecycle = ctx.root.getMeetingLifecycleService();
    const fresh = await seedMeeting(ctx.root, auth, { startImmediately: false });

    await expect(lifecycle.restartMeeting(fresh.instructor_code, auth)).rejects.toThrow(
      'Only an ended meeting can be restarted'
    );
    await expect(lifecycle.endMeeting(fresh.instructor_code, auth)).rejects.toBeInstanceOf(ConflictError);

    await lifecycle.startMeeting(fresh.instructor_code, auth);
    await expect(lifecycle.startMeeting(fresh.instructor_code, auth)).rejects.toThrow('Meeting has already been started');
  });

  it('refuses questions before the meeting starts and after it ends', async () => {
    const ctx = createTestContext();
    const { auth } = await seedInstructor(ctx.root, 'owner');
    const meeting = await seedMeeting(ctx.root, auth, { startImmediately: false });
    const questions = ctx.root.getQuestionService();

    await expect(questions.submitQuestion(meeting.meeting_code, { text: 'Too early?' })).rejects.toMatchObject({
      code: ErrorCodes.MEETING_NOT_ACTIVE,
    });

    expect(ctx.store.questions).toHaveLength(0);

    await ctx.root.getMeetingLifecycleService().startMeeting(meeting.instructor_code, auth);
    await questions.submitQuestion(meeting.meeting_code, { text: 'Just in time' });
    await ctx.root.getMeetingLifecycleService().endMeeting(meeting.instructor_code, auth);
    await expect(questions.submitQuestion(meeting.meeting_code, { text: 'Too late?' })).rejects.toMatchObject({
      code: ErrorCodes.MEETING_NOT_ACTIVE,
    });
    expect(ctx.store.questions.map((q) => q.text)).toEqual(['Just in time']);
  });

  it('keeps numbering questions across a restart', async () => {
    const ctx = createTestContext();
    const { auth } = await seedInstructor(ctx.root, 'owner');
    const meeting = await seedMeeting(ctx.root, auth);
    const questions = ctx.root.getQuestionService();
    const lifecycle = ctx.root.getMeetingLifecycleService();

    const ids: number[] = [];
    for (let i = 1; i <= 5; i += 1) {
      ids.push((await questions.submitQuestion(meeting.meeting_code, { text: `Question ${i}` })).id);
    }
    const votes = ctx.root.getVoteAggregatorService();
    await votes.toggleVote(ids[0], '11111111-1111-4111-8111-111111111111');
    await votes.toggleVote(ids[0], '22222222-2222-4222-8222-222222222222');
    await votes.toggleVote(ids[2], '11111111-1111-4111-8111-111111111111');

    await lifecycle.endMeeting(meeting.instructor_code, auth);
    await lifecycle.restartMeeting(meeting.instructor_code, auth);
    const sixth = await questions.submitQuestion(meeting.meeting_code, { text: 'Question 6' });

    expect(sixth.question_number).toBe(6);
    const view = await questions.getStudentMeetingView(meeting.meeting_code);
    expect(view.questions.map((q) => [q.question_number, q.upvotes])).toEqual([
      [1, 2],
      [3, 1],
      [2, 0],
      [4, 0],
      [5, 0],
      [6, 0],
    ]);
    expect(ctx.store.votes).toHaveLength(3);
  });

  it('announces end and restart to students', async () => {
    const ctx = createTestContext();
    const { auth } = await seedInstructor(ctx.root, 'owner');
    const meeting = await seedMeeting(ctx.root, auth);
    const students = listen(ctx.root, studentChannel(meeting.meeting_code));

    await ctx.root.getMeetingLifecycleService().endMeeting(meeting.instructor_code, auth);
    await ctx.root.getMeetingLifecycleService().restartMeeting(meeting.instructor_code, auth);

    expect(students).toEqual([{ type: 'session_ended' }, { type: 'session_restarted' }]);
  });

  it('does not open meetings in an archived class', async () => {
    const ctx = createTestContext();
    const { auth } = await seedInstructor(ctx.root, 'owner');
    const archived = await ctx.root.getClassService().createClass(auth, { name: 'Old course' });
    await ctx.root.getClassService().archiveClass(archived.id, auth);

    await expect(
      ctx.root.getMeetingLifecycleService().createMeeting(archived.id, { title: 'Late' }, auth)
    ).rejects.toThrow('Cannot create a meeting in an archived class');
  });

  it('limits transitions to the owner, with admins bypassing', async () => {
    const ctx = createTestContext();
    const admin = await seedInstructor(ctx.root, 'site-admin');
    const alice = await seedInstructor(ctx.root, 'alice');
    const bob = await seedInstructor(ctx.root, 'bob');
    const meeting = await seedMeeting(ctx.root, alice.auth);
    const lifecycle = ctx.root.getMeetingLifecycleService();

    expect(admin.auth.role).toBe('super_admin');
    expect(bob.auth.role).toBe('instructor');
    await expect(lifecycle.endMeeting(meeting.instructor_code, bob.auth)).rejects.toBeInstanceOf(AuthorizationError);
    await expect(lifecycle.endMeeting(meeting.instructor_code, admin.auth)).resolves.toMatchObject({ state: 'ended' });
  });

  it('leaves meetings opened through an API key to that key', async () => {
    const ctx = createTestContext();
    await seedInstructor(ctx.root, 'site-admin');
    const alice = await seedInstructor(ctx.root, 'alice');
    const primary = await ctx.root.getAuthService().authenticateApiKey(alice.apiKey.key);
    const secondKey = await ctx.root.getApiKeyService().createKey(alice.auth, 'Lecture hall kiosk');
    const secondary = await ctx.root.getAuthService().authenticateApiKey(secondKey.key);
    const meeting = await seedMeeting(ctx.root, primary);
    const lifecycle = ctx.root.getMeetingLifecycleService();

    expect(ctx.store.meetings[0]?.api_key_id).toBe(primary.apiKeyId);
    await expect(lifecycle.endMeeting(meeting.instructor_code, secondary)).rejects.toThrow(
      'This meeting was created with a different API key'
    );
    await expect(lifecycle.endMeeting(meeting.instructor_code, primary)).resolves.toMatchObject({ state: 'ended' });
  });

  it('lists a class meetings with question counts', async () => {
    const ctx = createTestContext();
    const { auth } = await seedInstructor(ctx.root, 'owner');
    const meeting = await seedMeeting(ctx.root, auth);
    await ctx.root.getQuestionService().submitQuestion(meeting.meeting_code, { text: 'One?' });
    await ctx.root.getQuestionService().submitQuestion(meeting.meeting_code, { text: 'Two?' });

    const listed = await ctx.root.getMeetingLifecycleService().listMeetings(meeting.class_id, auth);

    expect(listed).toHaveLength(1);
    expect(listed[0]).toMatchObject({ id: meeting.id, question_count: 2, state: 'active' });
  });
});
