import { logger } from '../utils/logger';
import {
  broadcastDeliveriesTotal,
  broadcastPublishedTotal,
  broadcastSubscriptionsGauge,
} from '../metrics/broadcast.metrics';

export interface BroadcastMessage {
  type: string;
}

/**
 * A live client. `send` may be sync or async; throwing or rejecting marks the
 * connection as dead.
 */
export interface BroadcastConnection<M extends BroadcastMessage = BroadcastMessage> {
  readonly id: string;
  send(message: M): void | Promise<void>;
}

export interface SubscriptionHandle {
  readonly subscriptionId: number;
  readonly channel: string;
  readonly connectionId: string;
}

export interface PublishResult {
  delivered: number;
  failed: number;
}

export interface BroadcastHubStats {
  channels: number;
  connections: number;
  subscriptions: number;
  published: number;
  delivered: number;
  failed: number;
}

export interface SessionBroadcastHubOptions {
  sendTimeoutMs?: number;
}

interface ConnectionState<M extends BroadcastMessage> {
  connection: BroadcastConnection<M>;
  /** Tail of this connection's send chain; every send waits for the previous one. */
  tail: Promise<void>;
  /** channel -> subscription id */
  channels: Map<string, number>;
  closed: boolean;
}

export class BroadcastSendTimeoutError extends Error {
  constructor(connectionId: string, timeoutMs: number) {
    super(`send to ${connectionId} exceeded ${timeoutMs}ms`);
    this.name = 'BroadcastSendTimeoutError';
  }
}

class ConnectionClosedError extends Error {
  constructor(connectionId: string) {
    super(`connection ${connectionId} was removed`);
    this.name = 'ConnectionClosedError';
  }
}

/**
 * In-process registry of channel -> live connections with concurrent fan-out.
 *
 * Delivery is best effort: a connection whose send fails or times out is
 * dropped from every channel, and publish never rejects. Messages reach each
 * connection in publish order. Single process only.
 */
export class SessionBroadcastHub<M extends BroadcastMessage = BroadcastMessage> {
  private readonly channels = new Map<string, Map<string, number>>();
  private readonly connections = new Map<string, ConnectionState<M>>();
  private readonly sendTimeoutMs: number;
  private nextSubscriptionId = 1;
  private counters = { published: 0, delivered: 0, failed: 0 };

  constructor(options: SessionBroadcastHubOptions = {}) {
    this.sendTimeoutMs = options.sendTimeoutMs ?? 5000;
  }

  subscribe(channel: string, connection: BroadcastConnection<M>): SubscriptionHandle {
    let state = this.connections.get(connection.id);
    if (!state || state.connection !== connection) {
      if (state) this.removeConnection(connection.id);
      state = { connection, tail: Promise.resolve(), channels: new Map(), closed: false };
      this.connections.set(connection.id, state);
    }

    const existing = state.channels.get(channel);
    if (existing !== undefined) {
      return { subscriptionId: existing, channel, connectionId: connection.id };
    }

    const subscriptionId = this.nextSubscriptionId++;
    state.channels.set(channel, subscriptionId);
    let subscribers = this.channels.get(channel);
    if (!subscribers) {
      subscribers = new Map();
      this.channels.set(channel, subscribers);
    }
    subscribers.set(connection.id, subscriptionId);
    broadcastSubscriptionsGauge.inc();
    logger.debug('broadcast:subscribe', { channel, connectionId: connection.id, subscribers: subscribers.size });
    return { subscriptionId, channel, connectionId: connection.id };
  }

  /**
   * Returns false if the handle was already released.
   */
  unsubscribe(handle: SubscriptionHandle): boolean {
    const subscribers = this.channels.get(handle.channel);
    if (!subscribers || subscribers.get(handle.connectionId) !== handle.subscriptionId) {
      return false;
    }
    subscribers.delete(handle.connectionId);
    if (subscribers.size === 0) {
      this.channels.delete(handle.channel);
    }
    broadcastSubscriptionsGauge.dec();

    const state = this.connections.get(handle.connectionId);
    if (state) {
      state.channels.delete(handle.channel);
      if (state.channels.size === 0) {
        this.connections.delete(handle.connectionId);
      }
    }
    logger.debug('broadcast:unsubscribe', { channel: handle.channel, connectionId: handle.connectionId });
    return true;
  }

  /**
   * Drops a connection from every channel it joined. Returns the number of subscriptions released.
   */
  removeConnection(connectionId: string): number {
    const state = this.connections.get(connectionId);
    if (!state) return 0;
    state.closed = true;
    this.connections.delete(connectionId);
    let released = 0;
    for (const [channel, subscriptionId] of state.channels) {
      const subscribers = this.channels.get(channel);
      if (subscribers && subscribers.get(connectionId) === subscriptionId) {
        subscribers.delete(connectionId);
        released += 1;
        if (subscribers.size === 0) this.channels.delete(channel);
      }
    }
    state.channels.clear();
    if (released > 0) broadcastSubscriptionsGauge.dec(released);
    return released;
  }

  async publish(channel: string, message: M): Promise<PublishResult> {
    this.counters.published += 1;
    broadcastPublishedTotal.inc({ type: message.type });

    const subscribers = this.channels.get(channel);
    if (!subscribers || subscribers.size === 0) {
      return { delivered: 0, failed: 0 };
    }

    // Enqueue synchronously so per-connection order follows publish call order
    const targets: ConnectionState<M>[] = [];
    for (const connectionId of subscribers.keys()) {
      const state = this.connections.get(connectionId);
      if (state) targets.push(state);
    }
    const sends = targets.map((state) => this.enqueue(state, channel, message));
    const results = await Promise.allSettled(sends);

    let delivered = 0;
    let failed = 0;
    for (const result of results) {
      if (result.status === 'fulfilled') delivered += 1;
      else failed += 1;
    }
    this.counters.delivered += delivered;
    this.counters.failed += failed;
    return { delivered, failed };
  }

  subscriberCount(channel: string): number {
    return this.channels.get(channel)?.size ?? 0;
  }

  channelCount(): number {
    return this.channels.size;
  }

  getStats(): BroadcastHubStats {
    let subscriptions = 0;
    for (const subscribers of this.channels.values()) subscriptions += subscribers.size;
    return {
      channels: this.channels.size,
      connections: this.connections.size,
      subscriptions,
      ...this.counters,
    };
  }

  private enqueue(state: ConnectionState<M>, channel: string, message: M): Promise<void> {
    const run = state.tail.then(async () => {
      if (state.closed) throw new ConnectionClosedError(state.connection.id);
      await this.sendWithTimeout(state.connection, message);
    });
    state.tail = run.then(
      () => {
        broadcastDeliveriesTotal.inc({ result: 'delivered' });
      },
      (error: unknown) => this.handleSendFailure(state, channel, message, error)
    );
    return run;
  }

  private handleSendFailure(state: ConnectionState<M>, channel: string, message: M, error: unknown): void {
    broadcastDeliveriesTotal.inc({ result: 'failed' });
    if (error instanceof ConnectionClosedError) return;
    logger.warn('broadcast:send_failed', {
      channel,
      connectionId: state.connection.id,
      type: message.type,
      error: error instanceof Error ? error.message : String(error),
    });
    if (this.connections.get(state.connection.id) === state) {
      this.removeConnection(state.connection.id);
    } else {
      state.closed = true;
    }
  }

  private async sendWithTimeout(connection: BroadcastConnection<M>, message: M): Promise<void> {
    const sending = Promise.resolve().then(() => connection.send(message));
    let timer: NodeJS.Timeout | undefined;
    const timeout = new Promise<never>((_, reject) => {
      timer = setTimeout(() => reject(new BroadcastSendTimeoutError(connection.id, this.sendTimeoutMs)), this.sendTimeoutMs);
      timer.unref();
    });
    try {
      await Promise.race([sending, timeout]);
    } finally {
      if (timer) clearTimeout(timer);
      // A send that settles after its timeout has already been reported
      void sending.catch((error: unknown) => {
        logger.debug('broadcast:late_send_failure', {
          connectionId: connection.id,
          error: error instanceof Error ? error.message : String(error),
        });
      });
    }
  }
}
