import type {
  MeetingListItem,
  MeetingRecord,
  MeetingRepositoryPort,
  MeetingTransition,
  MeetingWithOwner,
  NewMeeting,
} from '../../services/ports/meeting.repository.port';
import type { DbPort } from '../../services/ports/db.port';
import { qaTable } from '../db/fqn.utils';

const MEETING_TABLE = qaTable('class_meetings');
const CLASS_TABLE = qaTable('classes');
const QUESTION_TABLE = qaTable('questions');

const MEETING_COLUMNS = `
  m.id, m.class_id, m.api_key_id, m.meeting_code, m.instructor_code, m.title, m.password_hash,
  m.is_active, m.question_counter, m.created_at, m.started_at, m.ended_at
`;

const SELECT_WITH_OWNER = `
  SELECT ${MEETING_COLUMNS}, c.instructor_id, c.name AS class_name
  FROM ${MEETING_TABLE} m
  JOIN ${CLASS_TABLE} c ON c.id = m.class_id
`;

// Each transition only fires from its source state
const TRANSITION_SQL: Record<MeetingTransition, string> = {
  start: `
    UPDATE ${MEETING_TABLE} m
    SET is_active = TRUE, started_at = ?
    WHERE m.id = ? AND m.is_active = FALSE AND m.started_at IS NULL
    RETURNING ${MEETING_COLUMNS}
  `,
  end: `
    UPDATE ${MEETING_TABLE} m
    SET is_active = FALSE, ended_at = ?
    WHERE m.id = ? AND m.is_active = TRUE
    RETURNING ${MEETING_COLUMNS}
  `,
  restart: `
    UPDATE ${MEETING_TABLE} m
    SET is_active = TRUE, started_at = ?, ended_at = NULL
    WHERE m.id = ? AND m.is_active = FALSE AND m.ended_at IS NOT NULL
    RETURNING ${MEETING_COLUMNS}
  `,
};

export class DbMeetingRepository implements MeetingRepositoryPort {
  constructor(private readonly db: DbPort) {}

  async insertMeeting(data: NewMeeting): Promise<MeetingRecord> {
    return this.db.insert<MeetingRecord>(
      MEETING_TABLE,
      {
        class_id: data.class_id,
        api_key_id: data.api_key_id,
        meeting_code: data.meeting_code,
        instructor_code: data.instructor_code,
        title: data.title,
        password_hash: data.password_hash,
        is_active: data.is_active,
        started_at: data.started_at,
      },
      { operation: 'insertMeeting' }
    );
  }

  async getById(meetingId: number): Promise<MeetingWithOwner | null> {
    return this.db.queryOne<MeetingWithOwner>(`${SELECT_WITH_OWNER} WHERE m.id = ?`, [meetingId], {
      operation: 'getMeetingById',
    });
  }

  async getByMeetingCode(meetingCode: string): Promise<MeetingWithOwner | null> {
    return this.db.queryOne<MeetingWithOwner>(`${SELECT_WITH_OWNER} WHERE m.meeting_code = ?`, [meetingCode], {
      operation: 'getMeetingByCode',
    });
  }

  async getByInstructorCode(instructorCode: string): Promise<MeetingWithOwner | null> {
    return this.db.queryOne<MeetingWithOwner>(`${SELECT_WITH_OWNER} WHERE m.instructor_code = ?`, [instructorCode], {
      operation: 'getMeetingByInstructorCode',
    });
  }

  async listForClass(classId: number): Promise<MeetingListItem[]> {
    const sql = `
      SELECT ${MEETING_COLUMNS},
        (SELECT COUNT(*)::int FROM ${QUESTION_TABLE} q WHERE q.meeting_id = m.id) AS question_count
      FROM ${MEETING_TABLE} m
      WHERE m.class_id = ?
      ORDER BY m.created_at DESC, m.id DESC
    `;
    return this.db.query<MeetingListItem>(sql, [classId], { operation: 'listMeetingsForClass' });
  }

  async applyTransition(meetingId: number, transition: MeetingTransition, at: Date): Promise<MeetingRecord | null> {
    return this.db.queryOne<MeetingRecord>(TRANSITION_SQL[transition], [at, meetingId], {
      operation: `meeting_${transition}`,
    });
  }
}

export function createDbMeetingRepository(db: DbPort): MeetingRepositoryPort {
  return new DbMeetingRepository(db);
}
