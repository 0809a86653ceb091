import type { Namespace, Socket } from 'socket.io';
import type { AuthService } from '../auth.service';
import type {
  InterServerEvents,
  MeetingsClientToServerEvents,
  MeetingsServerToClientEvents,
  NamespaceSocketData,
} from '../../types/websocket.types';
import { wsConnectionsTotal, wsDisconnectsTotal } from '../../metrics/broadcast.metrics';
import { logger } from '../../utils/logger';

export type NamespaceSocket = Socket<
  MeetingsClientToServerEvents,
  MeetingsServerToClientEvents,
  InterServerEvents,
  NamespaceSocketData
>;

export type TypedNamespace = Namespace<
  MeetingsClientToServerEvents,
  MeetingsServerToClientEvents,
  InterServerEvents,
  NamespaceSocketData
>;

function firstString(value: unknown): string | undefined {
  const candidate = Array.isArray(value) ? value[0] : value;
  return typeof candidate === 'string' && candidate.trim() ? candidate.trim() : undefined;
}

/**
 * Handshake auth, connection bookkeeping and metrics shared by namespaces.
 * Anonymous sockets are allowed; a presented token must be valid.
 */
export abstract class NamespaceBaseService {
  protected readonly namespace: TypedNamespace;

  constructor(
    namespace: TypedNamespace,
    protected readonly authService: AuthService
  ) {
    this.namespace = namespace;
    this.setupMiddleware();
    this.setupEventHandlers();
  }

  protected abstract getNamespaceName(): string;
  protected abstract onConnection(socket: NamespaceSocket): void;
  protected abstract onDisconnect(socket: NamespaceSocket, reason: string): void;

  private setupMiddleware() {
    this.namespace.use((socket, next) => {
      const traceId = firstString(socket.handshake.auth.traceId) ?? firstString(socket.handshake.headers['x-trace-id']);
      socket.data = { auth: null, connectedAt: new Date(), traceId };

      const token = firstString(socket.handshake.auth.token);
      if (!token) {
        return next();
      }
      this.authService
        .authenticateBearer(token)
        .then((auth) => {
          socket.data.auth = auth;
          logger.info('ws:auth_ok', {
            namespace: this.getNamespaceName(),
            instructorId: auth.instructorId,
            role: auth.role,
            traceId,
          });
          next();
        })
        .catch((error: unknown) => {
          logger.info('ws:auth_failed', {
            namespace: this.getNamespaceName(),
            error: error instanceof Error ? error.message : String(error),
            traceId,
          });
          next(new Error('authentication failed'));
        });
    });
  }

  private setupEventHandlers() {
    this.namespace.on('connection', (socket) => {
      wsConnectionsTotal.inc({ namespace: this.getNamespaceName() });
      logger.info('ws:connect', {
        namespace: this.getNamespaceName(),
        socketId: socket.id,
        instructorId: socket.data.auth?.instructorId,
        traceId: socket.data.traceId,
      });

      this.onConnection(socket);

      socket.emit('ws:connected', {
        namespace: this.getNamespaceName(),
        traceId: socket.data.traceId ?? null,
        serverTime: new Date().toISOString(),
      });

      socket.on('disconnect', (reason) => {
        wsDisconnectsTotal.inc({ namespace: this.getNamespaceName(), reason });
        logger.info('ws:disconnect', {
          namespace: this.getNamespaceName(),
          socketId: socket.id,
          reason,
          traceId: socket.data.traceId,
        });
        this.onDisconnect(socket, reason);
      });
    });
  }

  getConnectedSocketCount(): number {
    return this.namespace.sockets.size;
  }
}
