/**
 * Manages the rosbridge connection with automatic reconnection.
 */

import { BRIDGE_RECONNECT_INTERVAL_MS, DEFAULT_BRIDGE_URL } from '../constants.js';
import { errorMessage } from '../errors.js';
import { withRetry } from '../utils/error-recovery.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import {
  createAdvertise,
  createPublish,
  createSubscribe,
  createUnadvertise,
  createUnsubscribe,
  type AdvertiseOperation,
  type SubscribeOperation,
} from './protocol.js';
import { RosbridgeClient, type BridgeClient, type TopicHandler } from './ws-client.js';

/** What the ROS adapters need from a bridge connection. */
export interface BridgeConnection {
  readonly isConnected: boolean;
  advertise(topic: string, type: string): void;
  unadvertise(topic: string): void;
  subscribe(topic: string, type: string, handler: TopicHandler): () => void;
  publish(topic: string, msg: Record<string, unknown>): void;
}

export interface ConnectionManagerOptions {
  reconnectIntervalMs?: number;
  maxConnectAttempts?: number;
  logger?: Logger;
  client?: BridgeClient;
}

/**
 * Wraps RosbridgeClient with connect retries and a background reconnect
 * loop. Advertisements and subscriptions are remembered and replayed after
 * every (re)connect, since rosbridge forgets them with the socket.
 */
export class ConnectionManager implements BridgeConnection {
  private readonly client: BridgeClient;
  private reconnecting = false;
  private reconnectInterval: ReturnType<typeof setInterval> | null = null;
  private advertisements = new Map<string, AdvertiseOperation>();
  private subscriptions = new Map<string, SubscribeOperation>();
  private handlerCounts = new Map<string, number>();
  private readonly reconnectIntervalMs: number;
  private readonly maxConnectAttempts: number;
  private readonly log: Logger;

  constructor(private readonly url = DEFAULT_BRIDGE_URL, options: ConnectionManagerOptions = {}) {
    this.log = options.logger ?? rootLogger.child('ConnectionManager');
    this.client = options.client ?? new RosbridgeClient(url, { logger: this.log.child('RosbridgeClient') });
    this.reconnectIntervalMs = options.reconnectIntervalMs ?? BRIDGE_RECONNECT_INTERVAL_MS;
    this.maxConnectAttempts = options.maxConnectAttempts ?? 3;
    this.client.onClose(() => {
      if (this.reconnectInterval) {
        this.log.warn(`Bridge connection lost, retrying every ${this.reconnectIntervalMs}ms`);
      }
    });
  }

  /**
   * Connect with retry, replay registrations, and keep the connection alive
   * in the background. Resolves even when the bridge is down: the reconnect
   * loop keeps trying.
   */
  async connect(): Promise<void> {
    try {
      await withRetry(
        () => this.client.connect(),
        { component: 'ConnectionManager', operation: 'connect', logger: this.log },
        this.maxConnectAttempts,
      );
      this.replay();
    } catch (err) {
      this.log.error(`Bridge unavailable at ${this.url}: ${errorMessage(err)}`);
    }
    this.startReconnectLoop();
  }

  advertise(topic: string, type: string): void {
    const operation = createAdvertise(topic, type);
    this.advertisements.set(topic, operation);
    if (this.client.isConnected) {
      this.client.send(operation);
    }
  }

  unadvertise(topic: string): void {
    if (!this.advertisements.delete(topic)) return;
    if (this.client.isConnected) {
      this.client.send(createUnadvertise(topic));
    }
  }

  /**
   * Register a topic handler. The returned function removes it; removing
   * the last handler for a topic unsubscribes from the bridge and drops the
   * topic from the replay set.
   */
  subscribe(topic: string, type: string, handler: TopicHandler): () => void {
    const operation = createSubscribe(topic, type);
    this.subscriptions.set(topic, operation);
    this.handlerCounts.set(topic, (this.handlerCounts.get(topic) ?? 0) + 1);
    const offHandler = this.client.onTopic(topic, handler);
    if (this.client.isConnected) {
      this.client.send(operation);
    }

    let removed = false;
    return () => {
      if (removed) return;
      removed = true;
      offHandler();
      const remaining = (this.handlerCounts.get(topic) ?? 1) - 1;
      if (remaining > 0) {
        this.handlerCounts.set(topic, remaining);
        return;
      }
      this.handlerCounts.delete(topic);
      this.subscriptions.delete(topic);
      if (this.client.isConnected) {
        this.client.send(createUnsubscribe(topic));
      }
    };
  }

  /** @throws BridgeConnectionError when the bridge is not connected */
  publish(topic: string, msg: Record<string, unknown>): void {
    this.client.send(createPublish(topic, msg));
  }

  private replay(): void {
    for (const operation of this.advertisements.values()) {
      this.client.send(operation);
    }
    for (const operation of this.subscriptions.values()) {
      this.client.send(operation);
    }
  }

  private startReconnectLoop() {
    if (this.reconnectInterval) return;
    this.reconnectInterval = setInterval(() => {
      void this.tryReconnect();
    }, this.reconnectIntervalMs);
  }

  private async tryReconnect(): Promise<void> {
    if (this.client.isConnected || this.reconnecting) return;
    this.reconnecting = true;
    this.log.warn('Bridge disconnected, attempting reconnect...');
    try {
      await this.client.connect();
      this.replay();
      this.log.info('Reconnected to bridge');
    } catch (err) {
      this.log.debug(`Reconnect failed: ${errorMessage(err)}`);
    } finally {
      this.reconnecting = false;
    }
  }

  get isConnected(): boolean {
    return this.client.isConnected;
  }

  /** Disconnect from the bridge and stop the reconnect loop. */
  disconnect() {
    if (this.reconnectInterval) {
      clearInterval(this.reconnectInterval);
      this.reconnectInterval = null;
    }
    this.client.disconnect();
  }
}
