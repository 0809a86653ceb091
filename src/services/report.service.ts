import type { QuestionRepositoryPort, QuestionStatus } from './ports/question.repository.port';
import type { MeetingAccessService } from './meeting-access.service';
import type { AuthContext } from '../types/auth.types';
import type { MeetingState } from '../types/meeting.types';
import { deriveMeetingState, toIso } from '../utils/question-views';

export interface MeetingReportRow {
  question_number: number;
  text: string;
  sanitized_text: string;
  status: QuestionStatus;
  upvotes: number;
  is_answered_in_class: boolean;
  written_answer: string | null;
  answer_published: boolean;
  created_at: string;
}

export interface MeetingReportStatistics {
  total_questions: number;
  approved: number;
  flagged: number;
  rejected: number;
  pending: number;
  answered_in_class: number;
  written_answers: number;
  total_upvotes: number;
}

export interface MeetingReport {
  meeting: {
    title: string;
    class_name: string;
    meeting_code: string;
    state: MeetingState;
    created_at: string;
    started_at: string | null;
    ended_at: string | null;
  };
  generated_at: string;
  statistics: MeetingReportStatistics;
  questions: MeetingReportRow[];
}

export const REPORT_CSV_HEADER = [
  'Question Number',
  'Question',
  'Sanitized Question',
  'Status',
  'Upvotes',
  'Answered In Class',
  'Written Answer',
  'Answer Published',
  'Created At',
] as const;

export function escapeCsvField(value: string | number | boolean | null): string {
  if (value === null) return '';
  const text = String(value);
  if (/[",\r\n]/.test(text)) {
    return `"${text.replace(/"/g, '""')}"`;
  }
  return text;
}

/** RFC 4180: CRLF line endings, header row first. */
export function renderMeetingReportCsv(report: MeetingReport): string {
  const lines = [REPORT_CSV_HEADER.map(escapeCsvField).join(',')];
  for (const row of report.questions) {
    lines.push(
      [
        row.question_number,
        row.text,
        row.sanitized_text,
        row.status,
        row.upvotes,
        row.is_answered_in_class ? 'Yes' : 'No',
        row.written_answer,
        row.answer_published ? 'Yes' : 'No',
        row.created_at,
      ]
        .map(escapeCsvField)
        .join(',')
    );
  }
  return `${lines.join('\r\n')}\r\n`;
}

export function reportFilename(meetingCode: string): string {
  return `meeting_${meetingCode}_report.csv`;
}

/**
 * Read-only export of a meeting's questions and outcomes.
 */
export class ReportService {
  constructor(
    private readonly questions: QuestionRepositoryPort,
    private readonly access: MeetingAccessService
  ) {}

  async buildMeetingReport(instructorCode: string, auth: AuthContext): Promise<MeetingReport> {
    const meeting = await this.access.getOwnedMeeting(instructorCode, auth);
    const rows = await this.questions.listForMeeting(meeting.id);

    const statistics: MeetingReportStatistics = {
      total_questions: rows.length,
      approved: 0,
      flagged: 0,
      rejected: 0,
      pending: 0,
      answered_in_class: 0,
      written_answers: 0,
      total_upvotes: 0,
    };
    const questions = rows.map((row): MeetingReportRow => {
      statistics[row.status] += 1;
      if (row.is_answered_in_class) statistics.answered_in_class += 1;
      if (row.answer_text !== null) statistics.written_answers += 1;
      statistics.total_upvotes += row.upvotes;
      return {
        question_number: row.question_number,
        text: row.text,
        sanitized_text: row.sanitized_text,
        status: row.status,
        upvotes: row.upvotes,
        is_answered_in_class: row.is_answered_in_class,
        written_answer: row.answer_text,
        answer_published: row.answer_is_approved === true,
        created_at: toIso(row.created_at),
      };
    });

    return {
      meeting: {
        title: meeting.title,
        class_name: meeting.class_name,
        meeting_code: meeting.meeting_code,
        state: deriveMeetingState(meeting),
        created_at: toIso(meeting.created_at),
        started_at: toIso(meeting.started_at),
        ended_at: toIso(meeting.ended_at),
      },
      generated_at: new Date().toISOString(),
      statistics,
      questions,
    };
  }
}
