/**
 * WebSocket client for a rosbridge v2 server.
 */

import WebSocket from 'ws';
import {
  BRIDGE_CONNECT_TIMEOUT_MS,
  BRIDGE_HEARTBEAT_INTERVAL_MS,
  BRIDGE_HEARTBEAT_STALE_MS,
  DEFAULT_BRIDGE_URL,
} from '../constants.js';
import { BridgeConnectionError, BridgeTimeoutError, errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { IncomingOperationSchema, type OutgoingOperation } from './protocol.js';

export type TopicHandler = (msg: Record<string, unknown>) => void;

/** The socket-level surface ConnectionManager drives. */
export interface BridgeClient {
  readonly isConnected: boolean;
  connect(): Promise<void>;
  send(operation: OutgoingOperation): void;
  onTopic(topic: string, handler: TopicHandler): () => void;
  onClose(listener: () => void): () => void;
  disconnect(): void;
}

export interface RosbridgeClientOptions {
  connectTimeoutMs?: number;
  heartbeatIntervalMs?: number;
  staleAfterMs?: number;
  logger?: Logger;
}

/**
 * Owns one WebSocket to the bridge: connection lifecycle, heartbeat pings
 * with stale connection detection, and dispatch of inbound topic messages
 * to per-topic handlers. Sends are fire-and-forget.
 */
export class RosbridgeClient implements BridgeClient {
  private ws: WebSocket | null = null;
  private topicHandlers = new Map<string, Set<TopicHandler>>();
  private closeListeners = new Set<() => void>();
  private heartbeatInterval: ReturnType<typeof setInterval> | null = null;
  private lastPongTime = 0;
  private readonly connectTimeoutMs: number;
  private readonly heartbeatIntervalMs: number;
  private readonly staleAfterMs: number;
  private readonly log: Logger;

  constructor(private readonly url = DEFAULT_BRIDGE_URL, options: RosbridgeClientOptions = {}) {
    this.connectTimeoutMs = options.connectTimeoutMs ?? BRIDGE_CONNECT_TIMEOUT_MS;
    this.heartbeatIntervalMs = options.heartbeatIntervalMs ?? BRIDGE_HEARTBEAT_INTERVAL_MS;
    this.staleAfterMs = options.staleAfterMs ?? BRIDGE_HEARTBEAT_STALE_MS;
    this.log = options.logger ?? rootLogger.child('RosbridgeClient');
  }

  async connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(this.url);
      this.ws = ws;

      const timer = setTimeout(() => {
        this.log.error(`Connection to ${this.url} timed out after ${this.connectTimeoutMs}ms`);
        reject(new BridgeTimeoutError(`Connect timed out after ${this.connectTimeoutMs}ms`, this.connectTimeoutMs));
        ws.terminate();
      }, this.connectTimeoutMs);

      ws.on('open', () => {
        clearTimeout(timer);
        this.log.info(`Connected to bridge at ${this.url}`);
        this.lastPongTime = Date.now();
        this.startHeartbeat();
        resolve();
      });

      ws.on('message', (data) => {
        this.handleMessage(data.toString());
      });

      ws.on('pong', () => {
        this.lastPongTime = Date.now();
      });

      ws.on('error', (err) => {
        clearTimeout(timer);
        this.log.error(`WebSocket error: ${err.message}`);
        reject(new BridgeConnectionError(err.message, this.url));
      });

      ws.on('close', (code, reason) => {
        clearTimeout(timer);
        this.log.warn(`Connection closed: ${code} ${reason.toString()}`);
        this.stopHeartbeat();
        if (this.ws === ws) {
          this.ws = null;
        }
        for (const listener of this.closeListeners) {
          listener();
        }
      });
    });
  }

  send(operation: OutgoingOperation): void {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      throw new BridgeConnectionError('Not connected to bridge', this.url);
    }
    ws.send(JSON.stringify(operation));
  }

  /** Route inbound messages on a topic to a handler. Returns an unsubscribe function. */
  onTopic(topic: string, handler: TopicHandler): () => void {
    let handlers = this.topicHandlers.get(topic);
    if (!handlers) {
      handlers = new Set();
      this.topicHandlers.set(topic, handlers);
    }
    const set = handlers;
    set.add(handler);
    return () => {
      set.delete(handler);
    };
  }

  onClose(listener: () => void): () => void {
    this.closeListeners.add(listener);
    return () => {
      this.closeListeners.delete(listener);
    };
  }

  private startHeartbeat() {
    this.stopHeartbeat();
    this.heartbeatInterval = setInterval(() => {
      const ws = this.ws;
      if (!ws || ws.readyState !== WebSocket.OPEN) return;

      if (Date.now() - this.lastPongTime > this.staleAfterMs) {
        this.log.error('Heartbeat timeout, closing stale connection');
        ws.terminate();
        return;
      }

      ws.ping();
    }, this.heartbeatIntervalMs);
  }

  private stopHeartbeat() {
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = null;
    }
  }

  private handleMessage(raw: string) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      this.log.warn(`Failed to parse message: ${errorMessage(err)}`);
      return;
    }

    const result = IncomingOperationSchema.safeParse(parsed);
    if (!result.success) {
      this.log.debug('Ignoring unsupported bridge message', { issues: result.error.issues.length });
      return;
    }

    const operation = result.data;
    if (operation.op === 'status') {
      const text = `Bridge status: ${operation.msg}`;
      if (operation.level === 'error') this.log.error(text);
      else if (operation.level === 'warning') this.log.warn(text);
      else this.log.debug(text);
      return;
    }

    const handlers = this.topicHandlers.get(operation.topic);
    if (!handlers) return;
    for (const handler of handlers) {
      try {
        handler(operation.msg);
      } catch (err) {
        this.log.error(`Handler for ${operation.topic} failed: ${errorMessage(err)}`);
      }
    }
  }

  disconnect(): void {
    this.stopHeartbeat();
    const ws = this.ws;
    if (ws) {
      this.ws = null;
      ws.close();
    }
  }

  get isConnected(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }
}
