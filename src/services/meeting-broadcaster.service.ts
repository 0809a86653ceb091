import type { SessionBroadcastHub, PublishResult } from './session-broadcast-hub.service';
import type { MeetingAudience, MeetingEvent } from '../types/meeting.types';
import { logger } from '../utils/logger';

export interface MeetingChannels {
  meeting_code: string;
  instructor_code: string;
}

export function studentChannel(meetingCode: string): string {
  return `meeting:${meetingCode}`;
}

export function instructorChannel(instructorCode: string): string {
  return `instructor:${instructorCode}`;
}

export function channelFor(audience: MeetingAudience, meeting: MeetingChannels): string {
  return audience === 'students' ? studentChannel(meeting.meeting_code) : instructorChannel(meeting.instructor_code);
}

/**
 * Maps a meeting's two audiences onto hub channels.
 */
export class MeetingBroadcaster {
  constructor(private readonly hub: SessionBroadcastHub<MeetingEvent>) {}

  toStudents(meeting: MeetingChannels, event: MeetingEvent): Promise<PublishResult> {
    return this.publish('students', meeting, event);
  }

  toInstructors(meeting: MeetingChannels, event: MeetingEvent): Promise<PublishResult> {
    return this.publish('instructors', meeting, event);
  }

  async toAll(meeting: MeetingChannels, event: MeetingEvent): Promise<PublishResult> {
    const [students, instructors] = await Promise.all([
      this.publish('students', meeting, event),
      this.publish('instructors', meeting, event),
    ]);
    return {
      delivered: students.delivered + instructors.delivered,
      failed: students.failed + instructors.failed,
    };
  }

  private async publish(audience: MeetingAudience, meeting: MeetingChannels, event: MeetingEvent): Promise<PublishResult> {
    const result = await this.hub.publish(channelFor(audience, meeting), event);
    logger.debug('meeting:broadcast', { audience, type: event.type, ...result });
    return result;
  }
}
