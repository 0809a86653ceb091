import { createServer } from 'http';
import type { Socket } from 'net';
import { createApp } from './app';
import { getCompositionRoot } from './app/composition-root';
import { initializeNamespacedWebSocket, closeNamespacedWebSocket } from './services/websocket';
import { errorMessage, logger } from './utils/logger';

const SHUTDOWN_GRACE_MS = 5000;

async function startServer(): Promise<void> {
  const root = getCompositionRoot();
  const config = root.getConfig();
  const db = root.getDbPort();

  await db.connect();

  const httpServer = createServer(createApp());
  // Track open sockets so shutdown can force-close keep-alive connections
  const sockets = new Set<Socket>();
  httpServer.on('connection', (socket: Socket) => {
    sockets.add(socket);
    socket.on('close', () => sockets.delete(socket));
  });

  initializeNamespacedWebSocket(httpServer, root);

  await new Promise<void>((resolve) => {
    httpServer.listen(config.port, resolve);
  });
  logger.info('server:listening', {
    port: config.port,
    env: config.env,
    health: `${config.baseUrl}/api/v1/health`,
  });

  let shuttingDown = false;
  const graceful = async (signal: string): Promise<void> => {
    if (shuttingDown) return;
    shuttingDown = true;
    logger.info('server:shutdown_started', { signal });
    setTimeout(() => process.exit(0), SHUTDOWN_GRACE_MS).unref();

    await closeNamespacedWebSocket();
    await new Promise<void>((resolve) => {
      httpServer.close(() => resolve());
      sockets.forEach((s) => s.destroy());
    });
    await db.disconnect();
    logger.info('server:shutdown_complete');
    process.exit(0);
  };

  for (const signal of ['SIGTERM', 'SIGINT'] as const) {
    process.on(signal, () => {
      graceful(signal).catch((error: unknown) => {
        logger.error('server:shutdown_failed', { error: errorMessage(error) });
        process.exit(1);
      });
    });
  }
}

startServer().catch((error: unknown) => {
  logger.error('server:start_failed', { error: errorMessage(error) });
  process.exit(1);
});
