import bcrypt from 'bcryptjs';
import type { MeetingRepositoryPort, MeetingWithOwner } from './ports/meeting.repository.port';
import type { QuestionRepositoryPort, QuestionWithMeeting } from './ports/question.repository.port';
import type { ClassRecord, ClassRepositoryPort } from './ports/class.repository.port';
import type { AuthContext, MeetingAccess } from '../types/auth.types';
import type { MeetingAudience } from '../types/meeting.types';
import type { TokenService } from '../utils/jwt.utils';
import { canBypassOwnership } from '../utils/roles';
import { AuthenticationError, AuthorizationError, NotFoundError } from '../utils/errors';
import { ErrorCodes } from '../types/api.types';
import { logger } from '../utils/logger';

/**
 * Ownership checks for instructors and password gating for students.
 */
export class MeetingAccessService {
  constructor(
    private readonly meetings: MeetingRepositoryPort,
    private readonly questions: QuestionRepositoryPort,
    private readonly classes: ClassRepositoryPort,
    private readonly tokens: TokenService
  ) {}

  assertOwner(auth: AuthContext, ownerId: number): void {
    if (auth.instructorId === ownerId || canBypassOwnership(auth.role)) return;
    throw new AuthorizationError('You do not own this resource');
  }

  async getOwnedClass(classId: number, auth: AuthContext): Promise<ClassRecord> {
    const record = await this.classes.getById(classId);
    if (!record) throw new NotFoundError('Class not found');
    this.assertOwner(auth, record.instructor_id);
    return record;
  }

  async getOwnedMeeting(instructorCode: string, auth: AuthContext): Promise<MeetingWithOwner> {
    const meeting = await this.meetings.getByInstructorCode(instructorCode);
    if (!meeting) throw new NotFoundError('Meeting not found');
    this.assertOwner(auth, meeting.instructor_id);
    return meeting;
  }

  async getOwnedQuestion(questionId: number, auth: AuthContext): Promise<QuestionWithMeeting> {
    const question = await this.questions.getWithMeeting(questionId);
    if (!question) throw new NotFoundError('Question not found');
    this.assertOwner(auth, question.instructor_id);
    return question;
  }

  async getMeetingForStudent(meetingCode: string, access?: MeetingAccess): Promise<MeetingWithOwner> {
    const meeting = await this.meetings.getByMeetingCode(meetingCode);
    if (!meeting) throw new NotFoundError('Meeting not found');
    this.assertStudentAccess({ meeting_code: meeting.meeting_code, has_password: meeting.password_hash !== null }, access);
    return meeting;
  }

  assertStudentAccess(meeting: { meeting_code: string; has_password: boolean }, access?: MeetingAccess): void {
    if (!meeting.has_password) return;
    if (access?.grantedMeetingCode === meeting.meeting_code) return;
    throw new AuthenticationError('This meeting requires a password', ErrorCodes.MEETING_PASSWORD_REQUIRED);
  }

  async verifyPassword(meetingCode: string, password: string): Promise<{ token: string; expiresIn: number }> {
    const meeting = await this.meetings.getByMeetingCode(meetingCode);
    if (!meeting) throw new NotFoundError('Meeting not found');
    if (meeting.password_hash === null) {
      return this.tokens.signMeetingAccessToken(meeting.meeting_code);
    }
    const matches = await bcrypt.compare(password, meeting.password_hash);
    if (!matches) {
      logger.info('meeting:password_rejected', { meetingId: meeting.id });
      throw new AuthenticationError('Incorrect meeting password', ErrorCodes.INVALID_CREDENTIALS);
    }
    return this.tokens.signMeetingAccessToken(meeting.meeting_code);
  }

  /**
   * Maps a code presented by a live client to its audience. Meeting codes
   * subscribe students (password gated); instructor codes need the owner.
   */
  async resolveLiveAudience(
    code: string,
    auth: AuthContext | null,
    access: MeetingAccess
  ): Promise<{ audience: MeetingAudience; meeting: MeetingWithOwner }> {
    const byMeetingCode = await this.meetings.getByMeetingCode(code);
    if (byMeetingCode) {
      this.assertStudentAccess(
        { meeting_code: byMeetingCode.meeting_code, has_password: byMeetingCode.password_hash !== null },
        access
      );
      return { audience: 'students', meeting: byMeetingCode };
    }
    const byInstructorCode = await this.meetings.getByInstructorCode(code);
    if (!byInstructorCode) throw new NotFoundError('Meeting not found');
    if (!auth) throw new AuthenticationError('Instructor authentication required');
    this.assertOwner(auth, byInstructorCode.instructor_id);
    return { audience: 'instructors', meeting: byInstructorCode };
  }

  /** Resolves a presented meeting token; an invalid token grants nothing. */
  resolveMeetingAccess(token: string | undefined): MeetingAccess {
    if (!token) return { grantedMeetingCode: null };
    try {
      return { grantedMeetingCode: this.tokens.verifyMeetingAccessToken(token) };
    } catch (error) {
      logger.debug('meeting:token_rejected', { error: error instanceof Error ? error.message : String(error) });
      return { grantedMeetingCode: null };
    }
  }
}
