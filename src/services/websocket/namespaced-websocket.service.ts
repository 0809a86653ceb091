import type { Server as HTTPServer } from 'http';
import { Server as SocketIOServer } from 'socket.io';
import type { CompositionRoot } from '../../app/composition-root';
import type {
  InterServerEvents,
  MeetingsClientToServerEvents,
  MeetingsServerToClientEvents,
  NamespaceSocketData,
} from '../../types/websocket.types';
import { logger } from '../../utils/logger';
import { MEETINGS_NAMESPACE, MeetingsNamespaceService } from './meetings-namespace.service';

export type MeetingsSocketServer = SocketIOServer<
  MeetingsClientToServerEvents,
  MeetingsServerToClientEvents,
  InterServerEvents,
  NamespaceSocketData
>;

export class NamespacedWebSocketService {
  private readonly io: MeetingsSocketServer;
  private readonly meetingsService: MeetingsNamespaceService;

  constructor(httpServer: HTTPServer, root: CompositionRoot) {
    const config = root.getConfig();
    this.io = new SocketIOServer(httpServer, {
      cors: {
        origin: [...config.corsOrigins],
        methods: ['GET', 'POST'],
        credentials: true,
      },
      // Clients only send join/leave frames
      maxHttpBufferSize: 64 * 1024,
    });

    this.io.engine.on('connection_error', (err: { code: number; message: string }) => {
      logger.warn('ws:engine_connection_error', { code: err.code, message: err.message });
    });

    this.meetingsService = new MeetingsNamespaceService(
      this.io.of(MEETINGS_NAMESPACE),
      root.getAuthService(),
      root.getMeetingAccessService(),
      root.getBroadcastHub()
    );
    logger.info('ws:namespace_ready', { namespace: MEETINGS_NAMESPACE });
  }

  public getIO(): MeetingsSocketServer {
    return this.io;
  }

  public getMeetingsService(): MeetingsNamespaceService {
    return this.meetingsService;
  }

  public shutdown(): Promise<void> {
    return new Promise((resolve) => {
      this.io.close(() => resolve());
    });
  }
}

let namespacedWSService: NamespacedWebSocketService | null = null;

export function initializeNamespacedWebSocket(httpServer: HTTPServer, root: CompositionRoot): NamespacedWebSocketService {
  if (!namespacedWSService) {
    namespacedWSService = new NamespacedWebSocketService(httpServer, root);
  }
  return namespacedWSService;
}

export function getNamespacedWebSocketService(): NamespacedWebSocketService | null {
  return namespacedWSService;
}

export async function closeNamespacedWebSocket(): Promise<void> {
  const service = namespacedWSService;
  namespacedWSService = null;
  await service?.shutdown();
}
