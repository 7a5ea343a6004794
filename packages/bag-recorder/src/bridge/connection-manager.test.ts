import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { Logger } from '../utils/logger.js';

// ---------------------------------------------------------------------------
// Mock the ws-client module.
// vi.mock is hoisted, so the factory must be self-contained; the latest
// instance is exposed through globalThis, as in ws-client.test.ts.
// ---------------------------------------------------------------------------
vi.mock('./ws-client.js', () => {
  class MockWSClient {
    url: string;
    _isConnected = false;
    connectFn: ReturnType<typeof vi.fn>;
    disconnectFn: ReturnType<typeof vi.fn>;
    sendFn: ReturnType<typeof vi.fn>;
    listeners = new Set<(frame: unknown) => void>();

    constructor(url: string) {
      this.url = url;
      this.connectFn = vi.fn(async () => { this._isConnected = true; });
      this.disconnectFn = vi.fn(() => { this._isConnected = false; });
      this.sendFn = vi.fn().mockResolvedValue({
        id: 'test-id',
        status: 'ok',
        data: { pong: true },
        timestamp: Date.now(),
      });
      (globalThis as Record<string, unknown>).__mockWSClient = this;
    }

    async connect() { return this.connectFn(); }
    disconnect() { return this.disconnectFn(); }
    async send(type: string, params: Record<string, unknown> = {}) { return this.sendFn(type, params); }
    onTopicMessage(listener: (frame: unknown) => void) {
      this.listeners.add(listener);
      return () => { this.listeners.delete(listener); };
    }

    get isConnected() { return this._isConnected; }

    _setConnected(value: boolean) { this._isConnected = value; }
  }

  return { WSClient: MockWSClient };
});

import { ConnectionManager } from './connection-manager.js';

interface MockWSClientInstance {
  url: string;
  connectFn: ReturnType<typeof vi.fn>;
  disconnectFn: ReturnType<typeof vi.fn>;
  sendFn: ReturnType<typeof vi.fn>;
  listeners: Set<(frame: unknown) => void>;
  _setConnected: (value: boolean) => void;
}

function getMockClient(): MockWSClientInstance {
  return (globalThis as Record<string, unknown>).__mockWSClient as MockWSClientInstance;
}

function quietLogger(): Logger {
  const log = new Logger();
  log.setOutput(() => {});
  return log;
}

function subscribeCalls(): unknown[][] {
  return getMockClient().sendFn.mock.calls.filter((c) => c[0] === 'topic.subscribe');
}

describe('ConnectionManager', () => {
  let manager: ConnectionManager;

  beforeEach(() => {
    vi.useFakeTimers();
    manager = new ConnectionManager('ws://test:9090', quietLogger());
  });

  afterEach(() => {
    manager.disconnect();
    vi.useRealTimers();
  });

  describe('constructor', () => {
    it('passes the bridge URL to WSClient', () => {
      expect(getMockClient().url).toBe('ws://test:9090');
      expect(manager.url).toBe('ws://test:9090');
    });

    it('starts disconnected', () => {
      expect(manager.isConnected).toBe(false);
    });
  });

  describe('connect()', () => {
    it('connects the client', async () => {
      await manager.connect();
      expect(manager.isConnected).toBe(true);
      expect(getMockClient().connectFn).toHaveBeenCalledTimes(1);
    });

    it('throws after all retry attempts fail', async () => {
      getMockClient().connectFn.mockRejectedValue(new Error('ECONNREFUSED'));

      let caught: unknown = null;
      const connectPromise = manager.connect().catch((err: unknown) => { caught = err; });

      await vi.advanceTimersByTimeAsync(1500);
      await vi.advanceTimersByTimeAsync(3500);
      await connectPromise;

      expect(caught).toBeInstanceOf(Error);
      expect(String(caught)).toMatch(/connect failed after 3 attempts: ECONNREFUSED/);
      expect(getMockClient().connectFn).toHaveBeenCalledTimes(3);
    });
  });

  describe('send()', () => {
    it('auto-connects when the client is disconnected', async () => {
      const response = await manager.send('topic.list');
      expect(getMockClient().connectFn).toHaveBeenCalledTimes(1);
      expect(response.status).toBe('ok');
    });

    it('opens the circuit breaker after five failures', async () => {
      await manager.connect();
      getMockClient().sendFn.mockRejectedValue(new Error('Bridge error'));
      for (let i = 0; i < 5; i++) {
        await expect(manager.send('topic.list')).rejects.toThrow('Bridge error');
      }
      await expect(manager.send('topic.list')).rejects.toThrow('Circuit breaker open');
    });
  });

  describe('listTopics()', () => {
    it('returns the parsed topic list', async () => {
      await manager.connect();
      getMockClient().sendFn.mockResolvedValueOnce({
        id: 'a',
        status: 'ok',
        data: { topics: [{ name: '/rosout', type: 'rcl_interfaces/msg/Log' }] },
        timestamp: 1,
      });

      await expect(manager.listTopics()).resolves.toEqual([
        { name: '/rosout', type: 'rcl_interfaces/msg/Log' },
      ]);
      expect(getMockClient().sendFn).toHaveBeenCalledWith('topic.list', {});
    });

    it('throws when the bridge answers with an error', async () => {
      await manager.connect();
      getMockClient().sendFn.mockResolvedValueOnce({ id: 'a', status: 'error', data: 'no graph', timestamp: 1 });

      await expect(manager.listTopics()).rejects.toThrow('topic.list rejected by bridge: "no graph"');
    });
  });

  describe('subscriptions', () => {
    it('sends a streaming subscribe for the first subscriber only', async () => {
      await manager.connect();
      await manager.subscribe('/bag_control', 'modaq_messages/msg/Bagcontrol');
      await manager.subscribe('/bag_control', 'modaq_messages/msg/Bagcontrol');

      expect(subscribeCalls()).toEqual([
        ['topic.subscribe', { topic: '/bag_control', message_type: 'modaq_messages/msg/Bagcontrol', stream: true }],
      ]);
      expect(manager.subscribedTopics).toEqual(['/bag_control']);
    });

    it('unsubscribes from the bridge once the last reference is dropped', async () => {
      await manager.connect();
      await manager.subscribe('/rosout', 'rcl_interfaces/msg/Log');
      await manager.subscribe('/rosout', 'rcl_interfaces/msg/Log');

      await manager.unsubscribe('/rosout');
      expect(getMockClient().sendFn).not.toHaveBeenCalledWith('topic.unsubscribe', { topic: '/rosout' });

      await manager.unsubscribe('/rosout');
      expect(getMockClient().sendFn).toHaveBeenCalledWith('topic.unsubscribe', { topic: '/rosout' });
      expect(manager.subscribedTopics).toEqual([]);
    });

    it('ignores unsubscribe for an unknown topic', async () => {
      await manager.connect();
      await manager.unsubscribe('/never');
      expect(getMockClient().sendFn).not.toHaveBeenCalled();
    });

    it('does not record a subscription the bridge rejected', async () => {
      await manager.connect();
      getMockClient().sendFn.mockResolvedValueOnce({ id: 'a', status: 'error', data: 'unknown type', timestamp: 1 });

      await expect(manager.subscribe('/x', 'bad/Type')).rejects.toThrow('topic.subscribe /x rejected by bridge');
      expect(manager.subscribedTopics).toEqual([]);
    });

    it('forwards topic listeners to the client', () => {
      const listener = vi.fn();
      const off = manager.onTopicMessage(listener);
      expect(getMockClient().listeners.has(listener)).toBe(true);
      off();
      expect(getMockClient().listeners.has(listener)).toBe(false);
    });
  });

  describe('reconnect loop', () => {
    it('reconnects and replays live subscriptions', async () => {
      await manager.connect();
      await manager.subscribe('/rosout', 'rcl_interfaces/msg/Log');

      getMockClient()._setConnected(false);
      getMockClient().connectFn.mockImplementation(async () => {
        getMockClient()._setConnected(true);
      });

      await vi.advanceTimersByTimeAsync(5500);

      expect(getMockClient().connectFn).toHaveBeenCalledTimes(2);
      expect(manager.isConnected).toBe(true);
      expect(subscribeCalls()).toHaveLength(2);
    });

    it('retries on the next interval after a failed reconnect', async () => {
      await manager.connect();
      getMockClient()._setConnected(false);
      getMockClient().connectFn.mockRejectedValue(new Error('ECONNREFUSED'));

      await vi.advanceTimersByTimeAsync(5500);
      expect(getMockClient().connectFn).toHaveBeenCalledTimes(2);
      expect(manager.isConnected).toBe(false);

      getMockClient().connectFn.mockImplementation(async () => {
        getMockClient()._setConnected(true);
      });
      await vi.advanceTimersByTimeAsync(5000);
      expect(getMockClient().connectFn).toHaveBeenCalledTimes(3);
      expect(manager.isConnected).toBe(true);
    });

    it('stops after disconnect()', async () => {
      await manager.connect();
      getMockClient()._setConnected(false);
      manager.disconnect();

      await vi.advanceTimersByTimeAsync(15000);
      expect(getMockClient().connectFn).toHaveBeenCalledTimes(1);
    });
  });
});
