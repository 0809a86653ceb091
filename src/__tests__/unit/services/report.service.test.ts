import { createTestContext, seedInstructor, seedMeeting } from '../../test-utils/app-setup';
import { createWordListProfanityAdapter } from '../../../adapters/moderation/word-list-profanity.adapter';
import {
  escapeCsvField,
  renderMeetingReportCsv,
  reportFilename,
  type MeetingReport,
} from '../../../services/report.service';

describe('escapeCsvField', () => {
  it.each([
    [null, ''],
    ['plain', 'plain'],
    [42, '42'],
    [true, 'true'],
    ['a,b', '"a,b"'],
    ['say "hi"', '"say ""hi"""'],
    ['line\nbreak', '"line\nbreak"'],
  ])('escapes %p as %p', (input, expected) => {
    expect(escapeCsvField(input)).toBe(expected);
  });
});

describe('renderMeetingReportCsv', () => {
  it('writes a header and one CRLF-terminated row per question', () => {
    const report: MeetingReport = {
      meeting: {
        title: 'Week 1',
        class_name: 'Physics 101',
        meeting_code: 'abc123',
        state: 'ended',
        created_at: '2026-01-05T09:00:00.000Z',
        started_at: '2026-01-05T09:00:00.000Z',
        ended_at: '2026-01-05T10:00:00.000Z',
      },
      generated_at: '2026-01-05T10:05:00.000Z',
      statistics: {
        total_questions: 1,
        approved: 1,
        flagged: 0,
        rejected: 0,
        pending: 0,
        answered_in_class: 1,
        written_answers: 1,
        total_upvotes: 3,
      },
      questions: [
        {
          question_number: 1,
          text: 'Is "heat" energy, or not?',
          sanitized_text: 'Is "heat" energy, or not?',
          status: 'approved',
          upvotes: 3,
          is_answered_in_class: true,
          written_answer: 'Yes.',
          answer_published: false,
          created_at: '2026-01-05T09:10:00.000Z',
        },
      ],
    };

    expect(renderMeetingReportCsv(report)).toBe(
      'Question Number,Question,Sanitized Question,Status,Upvotes,Answered In Class,Written Answer,Answer Published,Created At\r\n' +
        '1,"Is ""heat"" energy, or not?","Is ""heat"" energy, or not?",approved,3,Yes,Yes.,No,2026-01-05T09:10:00.000Z\r\n'
    );
  });

  it('names the download after the meeting code', () => {
    expect(reportFilename('abc123')).toBe('meeting_abc123_report.csv');
  });
});

describe('ReportService', () => {
  it('summarises every question regardless of status', async () => {
    const ctx = createTestContext({ profanityClassifier: createWordListProfanityAdapter(['darn']) });
    const { auth } = await seedInstructor(ctx.root, 'owner');
    const meeting = await seedMeeting(ctx.root, auth);
    const questions = ctx.root.getQuestionService();
    const popular = await questions.submitQuestion(meeting.meeting_code, { text: 'Popular question' });
    await questions.submitQuestion(meeting.meeting_code, { text: 'darn flagged' });
    const rejected = await questions.submitQuestion(meeting.meeting_code, { text: 'Off topic' });

    const votes = ctx.root.getVoteAggregatorService();
    await votes.toggleVote(popular.id, '11111111-1111-4111-8111-111111111111');
    await votes.toggleVote(popular.id, '22222222-2222-4222-8222-222222222222');
    await questions.toggleAnsweredInClass(popular.id, auth);
    await ctx.root.getAnswerService().saveAnswer(popular.id, { answerText: 'Answer', isApproved: true }, auth);
    await ctx.root.getModerationService().rejectQuestion(rejected.id, auth);

    const report = await ctx.root.getReportService().buildMeetingReport(meeting.instructor_code, auth);

    expect(report.meeting).toMatchObject({ title: 'Week 1', class_name: 'Physics 101', state: 'active' });
    expect(report.statistics).toEqual({
      total_questions: 3,
      approved: 1,
      flagged: 1,
      rejected: 1,
      pending: 0,
      answered_in_class: 1,
      written_answers: 1,
      total_upvotes: 2,
    });
    expect(report.questions[0]).toMatchObject({
      question_number: 1,
      upvotes: 2,
      is_answered_in_class: true,
      written_answer: 'Answer',
      answer_published: true,
    });
    expect(report.questions.map((q) => q.question_number)).toEqual([1, 2, 3]);
  });
});
