import type { AuthContext } from './auth.types';
import type { MeetingAudience, MeetingEvent } from './meeting.types';

export interface MeetingJoinPayload {
  code: string;
  meetingToken?: string;
}

export interface MeetingLeavePayload {
  code: string;
}

export type MeetingJoinAck =
  | { ok: true; audience: MeetingAudience; meetingCode: string }
  | { ok: false; error: { code: string; message: string } };

export type MeetingLeaveAck = { ok: true; left: boolean } | { ok: false; error: { code: string; message: string } };

export interface ConnectedInfo {
  namespace: string;
  traceId: string | null;
  serverTime: string;
}

export interface MeetingsClientToServerEvents {
  'meeting:join': (payload: unknown, ack?: (response: MeetingJoinAck) => void) => void;
  'meeting:leave': (payload: unknown, ack?: (response: MeetingLeaveAck) => void) => void;
}

export interface MeetingsServerToClientEvents {
  'ws:connected': (info: ConnectedInfo) => void;
  'meeting:event': (event: MeetingEvent) => void;
}

// Nothing is sent between server instances; broadcast is single-process
export type InterServerEvents = Record<string, never>;

export interface NamespaceSocketData {
  /** Present when the handshake carried a valid instructor token. */
  auth: AuthContext | null;
  connectedAt: Date;
  traceId?: string;
}

// WebSocket event names
export const WSEvents = {
  CONNECTED: 'ws:connected',
  MEETING_JOIN: 'meeting:join',
  MEETING_LEAVE: 'meeting:leave',
  MEETING_EVENT: 'meeting:event',
} as const;
