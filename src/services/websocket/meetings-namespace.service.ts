import { z } from 'zod';
import type { AuthService } from '../auth.service';
import type { MeetingAccessService } from '../meeting-access.service';
import type { BroadcastConnection, SessionBroadcastHub, SubscriptionHandle } from '../session-broadcast-hub.service';
import { channelFor } from '../meeting-broadcaster.service';
import type { MeetingEvent } from '../../types/meeting.types';
import type { MeetingJoinAck, MeetingLeaveAck } from '../../types/websocket.types';
import { AppError } from '../../utils/errors';
import { ErrorCodes } from '../../types/api.types';
import { logger } from '../../utils/logger';
import { NamespaceBaseService, type NamespaceSocket, type TypedNamespace } from './namespace-base.service';

export const MEETINGS_NAMESPACE = '/meetings';

const joinSchema = z.object({
  code: z.string().trim().min(1).max(64),
  meetingToken: z.string().min(1).optional(),
});

const leaveSchema = z.object({
  code: z.string().trim().min(1).max(64),
});

type AckError = { ok: false; error: { code: string; message: string } };

function toAckError(error: unknown): AckError {
  if (error instanceof AppError) {
    return { ok: false, error: { code: error.code, message: error.message } };
  }
  logger.error('ws:handler_error', { error: error instanceof Error ? error.message : String(error) });
  return { ok: false, error: { code: ErrorCodes.INTERNAL_ERROR, message: 'An unexpected error occurred' } };
}

const INVALID_PAYLOAD: AckError = {
  ok: false,
  error: { code: ErrorCodes.VALIDATION_ERROR, message: 'Invalid payload' },
};

/**
 * `/meetings`: clients join with a meeting code (students) or an instructor
 * code (owner only) and receive `meeting:event` for that audience.
 */
export class MeetingsNamespaceService extends NamespaceBaseService {
  private readonly connections = new Map<string, BroadcastConnection<MeetingEvent>>();
  /** socket id -> presented code -> hub handle */
  private readonly handles = new Map<string, Map<string, SubscriptionHandle>>();

  constructor(
    namespace: TypedNamespace,
    authService: AuthService,
    private readonly access: MeetingAccessService,
    private readonly hub: SessionBroadcastHub<MeetingEvent>
  ) {
    super(namespace, authService);
  }

  protected getNamespaceName(): string {
    return MEETINGS_NAMESPACE;
  }

  protected onConnection(socket: NamespaceSocket): void {
    socket.on('meeting:join', (payload, ack) => {
      void this.handleJoin(socket, payload).then((response) => {
        if (typeof ack === 'function') ack(response);
      });
    });

    socket.on('meeting:leave', (payload, ack) => {
      const response = this.handleLeave(socket, payload);
      if (typeof ack === 'function') ack(response);
    });
  }

  protected onDisconnect(socket: NamespaceSocket): void {
    const released = this.hub.removeConnection(socket.id);
    this.connections.delete(socket.id);
    this.handles.delete(socket.id);
    if (released > 0) {
      logger.debug('ws:subscriptions_released', { socketId: socket.id, released });
    }
  }

  private connectionFor(socket: NamespaceSocket): BroadcastConnection<MeetingEvent> {
    let connection = this.connections.get(socket.id);
    if (!connection) {
      connection = {
        id: socket.id,
        send: (event) => {
          if (socket.disconnected) {
            throw new Error('socket disconnected');
          }
          socket.emit('meeting:event', event);
        },
      };
      this.connections.set(socket.id, connection);
    }
    return connection;
  }

  private async handleJoin(socket: NamespaceSocket, payload: unknown): Promise<MeetingJoinAck> {
    const parsed = joinSchema.safeParse(payload);
    if (!parsed.success) return INVALID_PAYLOAD;
    const { code, meetingToken } = parsed.data;

    try {
      const grant = this.access.resolveMeetingAccess(meetingToken);
      const { audience, meeting } = await this.access.resolveLiveAudience(code, socket.data.auth, grant);
      // The socket may have dropped while the meeting was being looked up
      if (socket.disconnected) {
        return { ok: false, error: { code: ErrorCodes.CONFLICT, message: 'Socket disconnected' } };
      }
      const handle = this.hub.subscribe(channelFor(audience, meeting), this.connectionFor(socket));
      let socketHandles = this.handles.get(socket.id);
      if (!socketHandles) {
        socketHandles = new Map();
        this.handles.set(socket.id, socketHandles);
      }
      socketHandles.set(code, handle);
      logger.info('ws:meeting_joined', { socketId: socket.id, meetingId: meeting.id, audience });
      return { ok: true, audience, meetingCode: meeting.meeting_code };
    } catch (error) {
      return toAckError(error);
    }
  }

  private handleLeave(socket: NamespaceSocket, payload: unknown): MeetingLeaveAck {
    const parsed = leaveSchema.safeParse(payload);
    if (!parsed.success) return INVALID_PAYLOAD;
    const socketHandles = this.handles.get(socket.id);
    const handle = socketHandles?.get(parsed.data.code);
    if (!socketHandles || !handle) {
      return { ok: true, left: false };
    }
    socketHandles.delete(parsed.data.code);
    return { ok: true, left: this.hub.unsubscribe(handle) };
  }
}
