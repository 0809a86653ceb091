export interface MeetingRecord {
  id: number;
  class_id: number;
  api_key_id: number | null;
  meeting_code: string;
  instructor_code: string;
  title: string;
  password_hash: string | null;
  is_active: boolean;
  question_counter: number;
  created_at: Date;
  started_at: Date | null;
  ended_at: Date | null;
}

/** Meeting joined with its owning class. */
export interface MeetingWithOwner extends MeetingRecord {
  instructor_id: number;
  class_name: string;
}

export interface MeetingListItem extends MeetingRecord {
  question_count: number;
}

export interface NewMeeting {
  class_id: number;
  api_key_id: number | null;
  meeting_code: string;
  instructor_code: string;
  title: string;
  password_hash: string | null;
  is_active: boolean;
  started_at: Date | null;
}

/**
 * start: created -> active, end: active -> ended, restart: ended -> active
 */
export type MeetingTransition = 'start' | 'end' | 'restart';

export interface MeetingRepositoryPort {
  insertMeeting(data: NewMeeting): Promise<MeetingRecord>;
  getById(meetingId: number): Promise<MeetingWithOwner | null>;
  getByMeetingCode(meetingCode: string): Promise<MeetingWithOwner | null>;
  getByInstructorCode(instructorCode: string): Promise<MeetingWithOwner | null>;
  listForClass(classId: number): Promise<MeetingListItem[]>;
  /**
   * Applies the transition only if the meeting is in its source state.
   * Returns null when the meeting was not in that state.
   */
  applyTransition(meetingId: number, transition: MeetingTransition, at: Date): Promise<MeetingRecord | null>;
}
