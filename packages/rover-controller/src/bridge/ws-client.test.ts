import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { RosbridgeClient } from './ws-client.js';
import { BridgeConnectionError, BridgeTimeoutError } from '../errors.js';
import { Logger } from '../utils/logger.js';

// ---------------------------------------------------------------------------
// vi.mock is hoisted above the imports, so the fake socket class is created
// with vi.hoisted and shared with the tests through its static registry.
// ---------------------------------------------------------------------------
const { MockWebSocket } = vi.hoisted(() => {
  type Handler = (...args: unknown[]) => void;

  class MockWebSocket {
    static readonly CONNECTING = 0;
    static readonly OPEN = 1;
    static readonly CLOSED = 3;
    static instances: MockWebSocket[] = [];
    static failNextWith: Error | null = null;
    static hangNext = false;

    readyState = MockWebSocket.CONNECTING;
    sent: string[] = [];
    pings = 0;
    private handlers = new Map<string, Handler[]>();

    constructor(public readonly url: string) {
      MockWebSocket.instances.push(this);
      const failure = MockWebSocket.failNextWith;
      MockWebSocket.failNextWith = null;
      const hang = MockWebSocket.hangNext;
      MockWebSocket.hangNext = false;
      if (hang) return;
      // open (or fail) once the client has registered its handlers
      queueMicrotask(() => {
        if (failure) {
          this.emit('error', failure);
          this.readyState = MockWebSocket.CLOSED;
          this.emit('close', 1006, Buffer.from('Abnormal'));
          return;
        }
        this.readyState = MockWebSocket.OPEN;
        this.emit('open');
      });
    }

    static latest(): MockWebSocket {
      const ws = MockWebSocket.instances[MockWebSocket.instances.length - 1];
      if (!ws) throw new Error('no socket constructed');
      return ws;
    }

    on(event: string, handler: Handler): void {
      const list = this.handlers.get(event) ?? [];
      list.push(handler);
      this.handlers.set(event, list);
    }

    emit(event: string, ...args: unknown[]): void {
      for (const handler of this.handlers.get(event) ?? []) handler(...args);
    }

    send(data: string): void {
      this.sent.push(data);
    }

    ping(): void {
      this.pings++;
    }

    close(): void {
      this.readyState = MockWebSocket.CLOSED;
      this.emit('close', 1000, Buffer.from('Normal'));
    }

    terminate(): void {
      this.readyState = MockWebSocket.CLOSED;
      this.emit('close', 1006, Buffer.from('Terminated'));
    }
  }

  return { MockWebSocket };
});

vi.mock('ws', () => ({ default: MockWebSocket }));

describe('RosbridgeClient', () => {
  let output: ReturnType<typeof vi.fn>;
  let log: Logger;
  let client: RosbridgeClient;

  beforeEach(() => {
    MockWebSocket.instances = [];
    output = vi.fn();
    log = new Logger({ level: 'debug', component: 'Bridge' });
    log.setOutput(output);
    client = new RosbridgeClient('ws://test-bridge:9090', { logger: log });
  });

  afterEach(() => {
    client.disconnect();
  });

  describe('connect', () => {
    it('resolves once the socket opens', async () => {
      await client.connect();
      expect(client.isConnected).toBe(true);
      expect(MockWebSocket.latest().url).toBe('ws://test-bridge:9090');
      expect(output).toHaveBeenCalledWith('[Bridge] INFO  Connected to bridge at ws://test-bridge:9090');
    });

    it('rejects with BridgeConnectionError when the socket errors', async () => {
      MockWebSocket.failNextWith = new Error('ECONNREFUSED');

      const attempt = client.connect();

      await expect(attempt).rejects.toBeInstanceOf(BridgeConnectionError);
      await expect(attempt).rejects.toThrow('ECONNREFUSED');
      expect(client.isConnected).toBe(false);
    });
  });

  describe('connect timeout', () => {
    afterEach(() => {
      vi.useRealTimers();
    });

    it('rejects with BridgeTimeoutError when the socket never opens', async () => {
      vi.useFakeTimers();
      MockWebSocket.hangNext = true;
      client = new RosbridgeClient('ws://test-bridge:9090', { logger: log, connectTimeoutMs: 500 });

      const attempt = client.connect();
      const assertion = expect(attempt).rejects.toBeInstanceOf(BridgeTimeoutError);
      await vi.advanceTimersByTimeAsync(500);
      await assertion;

      expect(MockWebSocket.latest().readyState).toBe(MockWebSocket.CLOSED);
      expect(client.isConnected).toBe(false);
      expect(output).toHaveBeenCalledWith('[Bridge] ERROR Connection to ws://test-bridge:9090 timed out after 500ms');
    });
  });

  describe('send', () => {
    it('serializes the operation as JSON', async () => {
      await client.connect();
      client.send({ op: 'advertise', topic: '/cmd_vel', type: 'geometry_msgs/msg/Twist' });
      expect(MockWebSocket.latest().sent).toEqual([
        '{"op":"advertise","topic":"/cmd_vel","type":"geometry_msgs/msg/Twist"}',
      ]);
    });

    it('throws when not connected', () => {
      expect(() => client.send({ op: 'publish', topic: '/cmd_vel', msg: {} })).toThrow(BridgeConnectionError);
    });
  });

  describe('inbound messages', () => {
    beforeEach(async () => {
      await client.connect();
    });

    it('routes publish messages to handlers for the topic', () => {
      const handler = vi.fn();
      const other = vi.fn();
      client.onTopic('/uwb/hazard_distance', handler);
      client.onTopic('/other', other);

      MockWebSocket.latest().emit(
        'message',
        Buffer.from('{"op":"publish","topic":"/uwb/hazard_distance","msg":{"data":4.2}}'),
      );

      expect(handler).toHaveBeenCalledWith({ data: 4.2 });
      expect(other).not.toHaveBeenCalled();
    });

    it('stops routing after the handler unsubscribes', () => {
      const handler = vi.fn();
      const off = client.onTopic('/uwb/hazard_distance', handler);
      off();

      MockWebSocket.latest().emit('message', '{"op":"publish","topic":"/uwb/hazard_distance","msg":{"data":1}}');

      expect(handler).not.toHaveBeenCalled();
    });

    it('logs unparseable JSON and keeps going', () => {
      MockWebSocket.latest().emit('message', 'not json');
      expect(output).toHaveBeenCalledWith(expect.stringMatching(/^\[Bridge\] WARN {2}Failed to parse message: /));
    });

    it('ignores operations it does not handle', () => {
      const handler = vi.fn();
      client.onTopic('/x', handler);
      MockWebSocket.latest().emit('message', '{"op":"service_response","service":"/x","values":{}}');
      expect(handler).not.toHaveBeenCalled();
      expect(output).toHaveBeenCalledWith('[Bridge] DEBUG Ignoring unsupported bridge message {"issues":1}');
    });

    it('logs status messages at their level', () => {
      MockWebSocket.latest().emit('message', '{"op":"status","level":"error","msg":"unknown topic type"}');
      MockWebSocket.latest().emit('message', '{"op":"status","level":"warning","msg":"throttled"}');

      expect(output).toHaveBeenCalledWith('[Bridge] ERROR Bridge status: unknown topic type');
      expect(output).toHaveBeenCalledWith('[Bridge] WARN  Bridge status: throttled');
    });

    it('isolates a failing handler', () => {
      const good = vi.fn();
      client.onTopic('/t', () => {
        throw new Error('handler broke');
      });
      client.onTopic('/t', good);

      MockWebSocket.latest().emit('message', '{"op":"publish","topic":"/t","msg":{}}');

      expect(good).toHaveBeenCalledTimes(1);
      expect(output).toHaveBeenCalledWith('[Bridge] ERROR Handler for /t failed: handler broke');
    });
  });

  describe('close', () => {
    it('notifies close listeners and drops the socket', async () => {
      await client.connect();
      const listener = vi.fn();
      client.onClose(listener);

      MockWebSocket.latest().terminate();

      expect(listener).toHaveBeenCalledTimes(1);
      expect(client.isConnected).toBe(false);
      expect(output).toHaveBeenCalledWith('[Bridge] WARN  Connection closed: 1006 Terminated');
    });

    it('disconnect closes the socket', async () => {
      await client.connect();
      const ws = MockWebSocket.latest();
      client.disconnect();
      expect(ws.readyState).toBe(MockWebSocket.CLOSED);
      expect(client.isConnected).toBe(false);
    });
  });

  describe('heartbeat', () => {
    beforeEach(() => {
      vi.useFakeTimers();
      client = new RosbridgeClient('ws://test-bridge:9090', {
        logger: log,
        heartbeatIntervalMs: 1000,
        staleAfterMs: 2500,
      });
    });

    afterEach(() => {
      client.disconnect();
      vi.useRealTimers();
    });

    it('pings on the interval while pongs arrive', async () => {
      await client.connect();
      const ws = MockWebSocket.latest();

      vi.advanceTimersByTime(2000);
      ws.emit('pong');
      vi.advanceTimersByTime(1000);

      expect(ws.pings).toBe(3);
      expect(client.isConnected).toBe(true);
    });

    it('terminates a connection that stopped answering', async () => {
      await client.connect();
      const ws = MockWebSocket.latest();

      vi.advanceTimersByTime(3000);

      expect(ws.pings).toBe(2);
      expect(ws.readyState).toBe(MockWebSocket.CLOSED);
      expect(output).toHaveBeenCalledWith('[Bridge] ERROR Heartbeat timeout, closing stale connection');
    });
  });
});
