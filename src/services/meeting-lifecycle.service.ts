import bcrypt from 'bcryptjs';
import type {
  MeetingListItem,
  MeetingRecord,
  MeetingRepositoryPort,
  MeetingTransition,
} from './ports/meeting.repository.port';
import type { MeetingAccessService } from './meeting-access.service';
import type { MeetingBroadcaster } from './meeting-broadcaster.service';
import type { AuditLogService } from './audit-log.service';
import type { AuthContext } from '../types/auth.types';
import type { MeetingState } from '../types/meeting.types';
import { isUniqueViolation } from '../adapters/db/postgres.adapter';
import { generateMeetingCode } from '../utils/codes';
import { canBypassOwnership } from '../utils/roles';
import { deriveMeetingState, toIso } from '../utils/question-views';
import { AuthorizationError, ConflictError } from '../utils/errors';
import { meetingTransitionsTotal } from '../metrics/qa.metrics';
import { logger } from '../utils/logger';

export interface CreateMeetingInput {
  title: string;
  password?: string | null;
  startImmediately?: boolean;
}

export interface MeetingSummary {
  id: number;
  class_id: number;
  title: string;
  meeting_code: string;
  instructor_code: string;
  is_active: boolean;
  state: MeetingState;
  has_password: boolean;
  question_count?: number;
  created_at: string;
  started_at: string | null;
  ended_at: string | null;
  student_url: string;
  instructor_url: string;
}

const CODE_ATTEMPTS = 3;

const TRANSITION_CONFLICT: Record<MeetingTransition, string> = {
  start: 'Meeting has already been started',
  end: 'Meeting is not active',
  restart: 'Only an ended meeting can be restarted',
};

/**
 * created -> active -> ended -> active. Ending is reversible; restarting keeps
 * every question and vote.
 */
export class MeetingLifecycleService {
  constructor(
    private readonly meetings: MeetingRepositoryPort,
    private readonly access: MeetingAccessService,
    private readonly broadcaster: MeetingBroadcaster,
    private readonly audit: AuditLogService,
    private readonly options: { baseUrl: string; passwordHashRounds: number }
  ) {}

  async createMeeting(classId: number, input: CreateMeetingInput, auth: AuthContext): Promise<MeetingSummary> {
    const owned = await this.access.getOwnedClass(classId, auth);
    if (owned.is_archived) {
      throw new ConflictError('Cannot create a meeting in an archived class');
    }
    const startImmediately = input.startImmediately ?? true;
    const passwordHash = input.password ? await bcrypt.hash(input.password, this.options.passwordHashRounds) : null;
    const now = new Date();

    let created: MeetingRecord | null = null;
    for (let attempt = 1; attempt <= CODE_ATTEMPTS && !created; attempt += 1) {
      try {
        created = await this.meetings.insertMeeting({
          class_id: owned.id,
          api_key_id: auth.apiKeyId ?? null,
          meeting_code: generateMeetingCode(),
          instructor_code: generateMeetingCode(),
          title: input.title,
          password_hash: passwordHash,
          is_active: startImmediately,
          started_at: startImmediately ? now : null,
        });
      } catch (error) {
        // Code collision: draw new codes
        if (!isUniqueViolation(error) || attempt === CODE_ATTEMPTS) throw error;
        logger.warn('meeting:code_collision', { attempt });
      }
    }
    if (!created) throw new ConflictError('Could not allocate unique meeting codes');

    await this.audit.record(auth, 'meeting.create', 'meeting', created.id, {
      classId: owned.id,
      startImmediately,
      hasPassword: passwordHash !== null,
    });
    logger.info('meeting:created', { meetingId: created.id, classId: owned.id });
    return this.toSummary(created);
  }

  async listMeetings(classId: number, auth: AuthContext): Promise<MeetingSummary[]> {
    await this.access.getOwnedClass(classId, auth);
    const rows = await this.meetings.listForClass(classId);
    return rows.map((row) => this.toSummary(row));
  }

  startMeeting(instructorCode: string, auth: AuthContext): Promise<MeetingSummary> {
    return this.transition(instructorCode, 'start', auth);
  }

  endMeeting(instructorCode: string, auth: AuthContext): Promise<MeetingSummary> {
    return this.transition(instructorCode, 'end', auth);
  }

  restartMeeting(instructorCode: string, auth: AuthContext): Promise<MeetingSummary> {
    return this.transition(instructorCode, 'restart', auth);
  }

  toSummary(meeting: MeetingRecord | MeetingListItem): MeetingSummary {
    return {
      id: meeting.id,
      class_id: meeting.class_id,
      title: meeting.title,
      meeting_code: meeting.meeting_code,
      instructor_code: meeting.instructor_code,
      is_active: meeting.is_active,
      state: deriveMeetingState(meeting),
      has_password: meeting.password_hash !== null,
      ...('question_count' in meeting ? { question_count: meeting.question_count } : {}),
      created_at: toIso(meeting.created_at),
      started_at: toIso(meeting.started_at),
      ended_at: toIso(meeting.ended_at),
      ...this.urlsFor(meeting),
    };
  }

  urlsFor(meeting: { meeting_code: string; instructor_code: string }): { student_url: string; instructor_url: string } {
    return {
      student_url: `${this.options.baseUrl}/student?code=${meeting.meeting_code}`,
      instructor_url: `${this.options.baseUrl}/instructor?code=${meeting.instructor_code}`,
    };
  }

  private async transition(
    instructorCode: string,
    transition: MeetingTransition,
    auth: AuthContext
  ): Promise<MeetingSummary> {
    const meeting = await this.access.getOwnedMeeting(instructorCode, auth);
    if (
      auth.method === 'api_key' &&
      meeting.api_key_id !== null &&
      meeting.api_key_id !== auth.apiKeyId &&
      !canBypassOwnership(auth.role)
    ) {
      // Meetings opened through an API key are managed through that key
      throw new AuthorizationError('This meeting was created with a different API key');
    }
    const updated = await this.meetings.applyTransition(meeting.id, transition, new Date());
    if (!updated) {
      throw new ConflictError(TRANSITION_CONFLICT[transition]);
    }

    meetingTransitionsTotal.inc({ transition });
    await this.audit.record(auth, `meeting.${transition}`, 'meeting', meeting.id, {
      previousState: deriveMeetingState(meeting),
    });
    logger.info('meeting:transition', { meetingId: meeting.id, transition });

    if (transition === 'end') {
      await this.broadcaster.toAll(meeting, { type: 'session_ended' });
    } else if (transition === 'restart') {
      await this.broadcaster.toAll(meeting, { type: 'session_restarted' });
    }
    return this.toSummary(updated);
  }
}
