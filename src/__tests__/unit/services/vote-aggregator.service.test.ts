import { createTestContext, listen, seedInstructor, seedMeeting, type TestContext } from '../../test-utils/app-setup';
import { studentChannel, instructorChannel } from '../../../services/meeting-broadcaster.service';
import { createWordListProfanityAdapter } from '../../../adapters/moderation/word-list-profanity.adapter';
import type { VoteRepositoryPort } from '../../../services/ports/vote.repository.port';
import type { MeetingSummary } from '../../../services/meeting-lifecycle.service';
import type { AuthContext } from '../../../types/auth.types';
import { AppError, ConflictError, NotFoundError } from '../../../utils/errors';
import { ErrorCodes } from '../../../types/api.types';

const STUDENT_A = '11111111-1111-4111-8111-111111111111';
const STUDENT_B = '22222222-2222-4222-8222-222222222222';

function studentId(n: number): string {
  return `00000000-0000-4000-8000-${String(n).padStart(12, '0')}`;
}

async function setup(ctx: TestContext): Promise<{ owner: AuthContext; meeting: MeetingSummary; questionId: number }> {
  const { auth } = await seedInstructor(ctx.root, 'owner');
  const meeting = await seedMeeting(ctx.root, auth);
  const receipt = await ctx.root.getQuestionService().submitQuestion(meeting.meeting_code, { text: 'What is entropy?' });
  return { owner: auth, meeting, questionId: receipt.id };
}

describe('VoteAggregatorService', () => {
  it('toggles a vote on and back off', async () => {
    const ctx = createTestContext();
    const { questionId } = await setup(ctx);
    const votes = ctx.root.getVoteAggregatorService();

    await expect(votes.toggleVote(questionId, STUDENT_A)).resolves.toEqual({ questionId, upvotes: 1, voted: true });
    await expect(votes.toggleVote(questionId, STUDENT_A)).resolves.toEqual({ questionId, upvotes: 0, voted: false });
    expect(ctx.store.votes).toHaveLength(0);
  });

  it('counts one vote per student', async () => {
    const ctx = createTestContext();
    const { questionId } = await setup(ctx);
    const votes = ctx.root.getVoteAggregatorService();

    await votes.toggleVote(questionId, STUDENT_A);
    const result = await votes.toggleVote(questionId, STUDENT_B);

    expect(result).toEqual({ questionId, upvotes: 2, voted: true });
  });

  it('keeps upvotes equal to the vote rows under concurrent toggles', async () => {
    const ctx = createTestContext();
    const { questionId } = await setup(ctx);
    const votes = ctx.root.getVoteAggregatorService();

    const toggles = Array.from({ length: 20 }, (_, i) => votes.toggleVote(questionId, studentId(i + 1)));
    // One student double-clicks: the pair cancels out
    toggles.push(votes.toggleVote(questionId, STUDENT_A), votes.toggleVote(questionId, STUDENT_A));
    await Promise.all(toggles);

    const question = ctx.store.questions.find((q) => q.id === questionId);
    const rows = ctx.store.votes.filter((v) => v.question_id === questionId);
    expect(rows).toHaveLength(20);
    expect(question?.upvotes).toBe(20);
  });

  it('broadcasts the new count to students and instructors', async () => {
    const ctx = createTestContext();
    const { meeting, questionId } = await setup(ctx);
    const students = listen(ctx.root, studentChannel(meeting.meeting_code));
    const instructors = listen(ctx.root, instructorChannel(meeting.instructor_code));

    await ctx.root.getVoteAggregatorService().toggleVote(questionId, STUDENT_A);

    const expected = { type: 'vote_update', question_id: questionId, upvotes: 1 };
    expect(students).toEqual([expected]);
    expect(instructors).toEqual([expected]);
  });

  it('rejects votes once the meeting has ended', async () => {
    const ctx = createTestContext();
    const { owner, meeting, questionId } = await setup(ctx);
    await ctx.root.getMeetingLifecycleService().endMeeting(meeting.instructor_code, owner);

    const error = await ctx.root
      .getVoteAggregatorService()
      .toggleVote(questionId, STUDENT_A)
      .catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ConflictError);
    expect(error).toMatchObject({ code: ErrorCodes.MEETING_NOT_ACTIVE, statusCode: 409 });
    expect(ctx.store.votes).toHaveLength(0);
  });

  it('treats questions students cannot see as missing', async () => {
    const ctx = createTestContext({ profanityClassifier: createWordListProfanityAdapter(['darn']) });
    const { auth } = await seedInstructor(ctx.root, 'owner');
    const meeting = await seedMeeting(ctx.root, auth);
    const flagged = await ctx.root.getQuestionService().submitQuestion(meeting.meeting_code, { text: 'darn it' });

    expect(flagged.status).toBe('flagged');
    await expect(ctx.root.getVoteAggregatorService().toggleVote(flagged.id, STUDENT_A)).rejects.toBeInstanceOf(
      NotFoundError
    );
    await expect(ctx.root.getVoteAggregatorService().toggleVote(9999, STUDENT_A)).rejects.toBeInstanceOf(NotFoundError);
  });

  it('requires the meeting password grant for protected meetings', async () => {
    const ctx = createTestContext();
    const { auth } = await seedInstructor(ctx.root, 'owner');
    const meeting = await seedMeeting(ctx.root, auth, { password: 'open-sesame' });
    const grant = { grantedMeetingCode: meeting.meeting_code };
    const receipt = await ctx.root
      .getQuestionService()
      .submitQuestion(meeting.meeting_code, { text: 'Is this on the exam?' }, grant);
    const votes = ctx.root.getVoteAggregatorService();

    const denied = await votes.toggleVote(receipt.id, STUDENT_A).catch((e: unknown) => e);
    expect(denied).toBeInstanceOf(AppError);
    expect(denied).toMatchObject({ code: ErrorCodes.MEETING_PASSWORD_REQUIRED, statusCode: 401 });

    await expect(votes.toggleVote(receipt.id, STUDENT_A, grant)).resolves.toMatchObject({ upvotes: 1, voted: true });
  });

  it('retries once when a concurrent toggle by the same student wins the race', async () => {
    let calls = 0;
    const ctx = createTestContext({
      repositories: (store) => {
        const real = store.repositories().votes;
        const flaky: VoteRepositoryPort = {
          ...real,
          toggleVote: async (questionId, student) => {
            calls += 1;
            if (calls === 1) return { outcome: 'contended' };
            return real.toggleVote(questionId, student);
          },
        };
        return { votes: flaky };
      },
    });
    const { questionId } = await setup(ctx);

    const result = await ctx.root.getVoteAggregatorService().toggleVote(questionId, STUDENT_A);

    expect(calls).toBe(2);
    expect(result).toEqual({ questionId, upvotes: 1, voted: true });
  });

  it('gives up with a conflict when every attempt is contended', async () => {
    const ctx = createTestContext({
      repositories: (store) => ({
        votes: { ...store.repositories().votes, toggleVote: async () => ({ outcome: 'contended' }) },
      }),
    });
    const { questionId } = await setup(ctx);

    await expect(ctx.root.getVoteAggregatorService().toggleVote(questionId, STUDENT_A)).rejects.toMatchObject({
      code: ErrorCodes.CONFLICT,
      statusCode: 409,
    });
  });

  it('reconciles drifted counts and records the correction', async () => {
    const ctx = createTestContext();
    const { owner, meeting, questionId } = await setup(ctx);
    await ctx.root.getVoteAggregatorService().toggleVote(questionId, STUDENT_A);
    const question = ctx.store.questions.find((q) => q.id === questionId);
    if (question) question.upvotes = 7;

    const result = await ctx.root.getVoteAggregatorService().reconcileVoteCounts(meeting.instructor_code, owner);

    expect(result).toEqual({ corrected: 1 });
    expect(question?.upvotes).toBe(1);
    expect(ctx.store.auditLog.map((e) => e.action)).toContain('meeting.reconcile_votes');
  });
});
