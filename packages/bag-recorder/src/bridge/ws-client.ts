/**
 * WebSocket client that sends commands to the ROS2 bridge and receives
 * streamed topic messages from it.
 */

import WebSocket from 'ws';
import { randomUUID } from 'crypto';
import {
  BridgeResponseSchema,
  TopicMessageFrameSchema,
  type BridgeResponse,
  type CommandTypeValue,
  type TopicMessageFrame,
} from './protocol.js';
import {
  BRIDGE_HEARTBEAT_INTERVAL_MS,
  BRIDGE_HEARTBEAT_STALE_MS,
  BRIDGE_REQUEST_TIMEOUT_MS,
  DEFAULT_BRIDGE_URL,
} from '../constants.js';
import { BridgeConnectionError, BridgeTimeoutError, errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export type { BridgeResponse } from './protocol.js';

export type TopicMessageListener = (frame: TopicMessageFrame) => void;

interface PendingRequest {
  resolve: (value: BridgeResponse) => void;
  reject: (reason: Error) => void;
  timer: ReturnType<typeof setTimeout>;
}

/**
 * WebSocket client for communicating with the ROS2 bridge.
 *
 * Handles connection lifecycle, request/response correlation via UUIDs,
 * heartbeat pings, and stale connection detection. Each `send()` call
 * returns a promise that resolves when the bridge responds or rejects
 * on timeout. Frames of type `topic.message` are not responses; they are
 * handed to every listener registered with `onTopicMessage()`.
 */
export class WSClient {
  private ws: WebSocket | null = null;
  private pendingRequests = new Map<string, PendingRequest>();
  private topicListeners = new Set<TopicMessageListener>();
  private url: string;
  private requestTimeout: number;
  private heartbeatInterval: ReturnType<typeof setInterval> | null = null;
  private lastPongTime = 0;
  private log: Logger;

  constructor(url = DEFAULT_BRIDGE_URL, requestTimeout = BRIDGE_REQUEST_TIMEOUT_MS, log: Logger = rootLogger) {
    this.url = url;
    this.requestTimeout = requestTimeout;
    this.log = log.child('WSClient');
  }

  async connect(): Promise<void> {
    return new Promise((resolve, reject) => {
      const ws = new WebSocket(this.url);
      this.ws = ws;

      ws.on('open', () => {
        this.log.info('Connected to bridge', { url: this.url });
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
        this.log.error('WebSocket error', { error: err.message });
        reject(new BridgeConnectionError(err.message, this.url));
      });

      ws.on('close', (code, reason) => {
        this.log.warn('Connection closed', { code, reason: reason.toString() });
        this.stopHeartbeat();
        this.rejectAllPending(new BridgeConnectionError('Connection closed', this.url));
        if (this.ws === ws) {
          this.ws = null;
        }
      });
    });
  }

  /** Register a listener for streamed topic messages. Returns an unsubscribe function. */
  onTopicMessage(listener: TopicMessageListener): () => void {
    this.topicListeners.add(listener);
    return () => {
      this.topicListeners.delete(listener);
    };
  }

  private startHeartbeat() {
    this.stopHeartbeat();
    this.heartbeatInterval = setInterval(() => {
      const ws = this.ws;
      if (!ws || ws.readyState !== WebSocket.OPEN) return;

      if (Date.now() - this.lastPongTime > BRIDGE_HEARTBEAT_STALE_MS) {
        this.log.warn('Heartbeat timeout, closing stale connection');
        ws.terminate();
        return;
      }

      ws.ping();
    }, BRIDGE_HEARTBEAT_INTERVAL_MS);
  }

  private stopHeartbeat() {
    if (this.heartbeatInterval) {
      clearInterval(this.heartbeatInterval);
      this.heartbeatInterval = null;
    }
  }

  async send(type: CommandTypeValue, params: Record<string, unknown> = {}): Promise<BridgeResponse> {
    const ws = this.ws;
    if (!ws || ws.readyState !== WebSocket.OPEN) {
      throw new BridgeConnectionError('Not connected to bridge', this.url);
    }

    const id = randomUUID();
    const command = JSON.stringify({ id, type, params });

    return new Promise((resolve, reject) => {
      const timer = setTimeout(() => {
        this.pendingRequests.delete(id);
        reject(new BridgeTimeoutError(`Request ${id} (${type}) timed out after ${this.requestTimeout}ms`, this.requestTimeout));
      }, this.requestTimeout);

      this.pendingRequests.set(id, { resolve, reject, timer });
      ws.send(command);
    });
  }

  private handleMessage(raw: string) {
    let parsed: unknown;
    try {
      parsed = JSON.parse(raw);
    } catch (err) {
      this.log.warn('Failed to parse bridge frame', { error: errorMessage(err) });
      return;
    }

    const frame = TopicMessageFrameSchema.safeParse(parsed);
    if (frame.success) {
      this.emitTopicMessage(frame.data);
      return;
    }

    const response = BridgeResponseSchema.safeParse(parsed);
    if (!response.success) {
      this.log.warn('Ignoring unrecognised bridge frame', { error: response.error.message });
      return;
    }

    const { id } = response.data;
    const pending = id === null ? undefined : this.pendingRequests.get(id);
    if (id !== null && pending) {
      clearTimeout(pending.timer);
      this.pendingRequests.delete(id);
      pending.resolve(response.data);
    }
  }

  private emitTopicMessage(frame: TopicMessageFrame) {
    for (const listener of this.topicListeners) {
      try {
        listener(frame);
      } catch (err) {
        this.log.error('Topic listener failed', { topic: frame.topic, error: errorMessage(err) });
      }
    }
  }

  private rejectAllPending(error: Error) {
    for (const pending of this.pendingRequests.values()) {
      clearTimeout(pending.timer);
      pending.reject(error);
    }
    this.pendingRequests.clear();
  }

  disconnect() {
    this.stopHeartbeat();
    const ws = this.ws;
    if (ws) {
      this.rejectAllPending(new BridgeConnectionError('Disconnecting', this.url));
      this.ws = null;
      ws.close();
    }
  }

  get isConnected(): boolean {
    return this.ws !== null && this.ws.readyState === WebSocket.OPEN;
  }
}
