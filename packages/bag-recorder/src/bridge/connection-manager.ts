/**
 * Manages the WebSocket connection to the ROS2 bridge with automatic
 * reconnection, a circuit breaker, and reference-counted topic subscriptions.
 */

import { WSClient, type BridgeResponse, type TopicMessageListener } from './ws-client.js';
import { CommandType, TopicListSchema, type CommandTypeValue } from './protocol.js';
import { ErrorRecovery, type CircuitBreaker } from '../utils/error-recovery.js';
import { BRIDGE_RECONNECT_INTERVAL_MS, DEFAULT_BRIDGE_URL } from '../constants.js';
import { BridgeConnectionError, errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { RosTopic, TopicSource } from '../types/ros.js';

interface Subscription {
  messageType: string;
  refs: number;
}

/**
 * Manages the WebSocket connection to the ROS2 bridge.
 *
 * Wraps WSClient with automatic reconnection and a circuit breaker that
 * prevents cascading failures when the bridge is down. Several consumers
 * (the control unit and the active recorder) may subscribe to the same
 * topic; the bridge only sees the first subscribe and the last unsubscribe.
 * Subscriptions are replayed after a reconnect.
 */
export class ConnectionManager implements TopicSource {
  private client: WSClient;
  private circuitBreaker: CircuitBreaker;
  private reconnecting = false;
  private reconnectInterval: ReturnType<typeof setInterval> | null = null;
  private subscriptions = new Map<string, Subscription>();
  private log: Logger;
  readonly url: string;

  /**
   * @param url - WebSocket URL of the ROS2 bridge (default: ws://localhost:9090)
   */
  constructor(url = DEFAULT_BRIDGE_URL, log: Logger = rootLogger) {
    this.url = url;
    this.log = log.child('ConnectionManager');
    this.client = new WSClient(url, undefined, log);
    this.circuitBreaker = ErrorRecovery.createCircuitBreaker(undefined, undefined, this.log);
  }

  /**
   * Connect to the ROS2 bridge with automatic retry, then start a background
   * loop that restores the connection whenever it drops.
   */
  async connect(): Promise<void> {
    await ErrorRecovery.withRetry(
      () => this.client.connect(),
      { component: 'ConnectionManager', operation: 'connect' },
      undefined,
      this.log
    );
    this.startReconnectLoop();
  }

  /**
   * Send a command to the ROS2 bridge through the circuit breaker.
   * Reconnects first if the WebSocket is not open.
   * @throws When the circuit breaker is open or the request times out
   */
  async send(type: CommandTypeValue, params: Record<string, unknown> = {}): Promise<BridgeResponse> {
    return this.circuitBreaker.call(async () => {
      if (!this.client.isConnected) {
        await this.client.connect();
      }
      return this.client.send(type, params);
    });
  }

  /** Ask the bridge for every topic currently advertised. */
  async listTopics(): Promise<RosTopic[]> {
    const response = await this.send(CommandType.TOPIC_LIST);
    this.assertOk(response, 'topic.list');
    return TopicListSchema.parse(response.data).topics;
  }

  /** Stream a topic from the bridge. Repeat subscriptions only bump a counter. */
  async subscribe(topic: string, messageType: string): Promise<void> {
    const existing = this.subscriptions.get(topic);
    if (existing) {
      existing.refs++;
      return;
    }
    const response = await this.send(CommandType.TOPIC_SUBSCRIBE, {
      topic,
      message_type: messageType,
      stream: true,
    });
    this.assertOk(response, `topic.subscribe ${topic}`);
    // A concurrent subscribe for the same topic may have landed while we waited
    const landed = this.subscriptions.get(topic);
    if (landed) {
      landed.refs++;
    } else {
      this.subscriptions.set(topic, { messageType, refs: 1 });
    }
  }

  /** Drop one reference to a topic; the bridge is told once nobody needs it. */
  async unsubscribe(topic: string): Promise<void> {
    const existing = this.subscriptions.get(topic);
    if (!existing) return;
    existing.refs--;
    if (existing.refs > 0) return;
    this.subscriptions.delete(topic);
    if (!this.client.isConnected) return;
    const response = await this.send(CommandType.TOPIC_UNSUBSCRIBE, { topic });
    this.assertOk(response, `topic.unsubscribe ${topic}`);
  }

  onTopicMessage(listener: TopicMessageListener): () => void {
    return this.client.onTopicMessage(listener);
  }

  /** Topics with at least one live subscription, for diagnostics. */
  get subscribedTopics(): string[] {
    return [...this.subscriptions.keys()];
  }

  private assertOk(response: BridgeResponse, what: string): void {
    if (response.status === 'error') {
      throw new BridgeConnectionError(`${what} rejected by bridge: ${JSON.stringify(response.data)}`, this.url);
    }
  }

  private async resubscribeAll(): Promise<void> {
    for (const [topic, sub] of this.subscriptions) {
      const response = await this.client.send(CommandType.TOPIC_SUBSCRIBE, {
        topic,
        message_type: sub.messageType,
        stream: true,
      });
      this.assertOk(response, `topic.subscribe ${topic}`);
    }
  }

  private startReconnectLoop() {
    if (this.reconnectInterval) return;

    this.reconnectInterval = setInterval(() => {
      if (this.client.isConnected || this.reconnecting) return;
      this.reconnecting = true;
      this.log.warn('Bridge disconnected, attempting reconnect');
      this.client.connect()
        .then(() => this.resubscribeAll())
        .then(() => {
          this.log.info('Reconnected to bridge', { subscriptions: this.subscriptions.size });
        })
        .catch((err: unknown) => {
          this.log.warn('Reconnect failed, will retry', { error: errorMessage(err) });
        })
        .finally(() => {
          this.reconnecting = false;
        });
    }, BRIDGE_RECONNECT_INTERVAL_MS);
  }

  /** Whether the underlying WebSocket is currently open. */
  get isConnected(): boolean {
    return this.client.isConnected;
  }

  /** Disconnect from the bridge and stop the automatic reconnect loop. */
  disconnect() {
    if (this.reconnectInterval) {
      clearInterval(this.reconnectInterval);
      this.reconnectInterval = null;
    }
    this.client.disconnect();
  }
}
