/**
 * In-process stand-ins for the bridge and the bag writer, shared by tests.
 */

import type { TopicMessageFrame } from '../bridge/protocol.js';
import type { BagMessage, BagWriter, StorageOptions } from '../storage/bag-writer.js';
import type { RosTopic, TopicSource } from '../types/ros.js';
import { StorageUnavailableError } from '../errors.js';
import { Logger } from '../utils/logger.js';

export class FakeTopicSource implements TopicSource {
  topics: RosTopic[] = [];
  subscribeCalls: string[] = [];
  /** `topic:type` for every subscribe call. */
  subscribeTypes: string[] = [];
  unsubscribeCalls: string[] = [];
  listError: Error | null = null;
  private listeners = new Set<(frame: TopicMessageFrame) => void>();

  async listTopics(): Promise<RosTopic[]> {
    if (this.listError) throw this.listError;
    return [...this.topics];
  }

  async subscribe(topic: string, messageType: string): Promise<void> {
    this.subscribeCalls.push(topic);
    this.subscribeTypes.push(`${topic}:${messageType}`);
  }

  async unsubscribe(topic: string): Promise<void> {
    this.unsubscribeCalls.push(topic);
  }

  onTopicMessage(listener: (frame: TopicMessageFrame) => void): () => void {
    this.listeners.add(listener);
    return () => { this.listeners.delete(listener); };
  }

  publish(topic: string, msg: unknown, timestamp = Date.now()): void {
    for (const l of this.listeners) l({ type: 'topic.message', topic, msg, timestamp });
  }

  get listenerCount(): number {
    return this.listeners.size;
  }
}

export class FakeBagWriter implements BagWriter {
  opened: StorageOptions | null = null;
  written: BagMessage[] = [];
  closeCount = 0;
  openError: Error | null = null;
  closeError: Error | null = null;
  failure: StorageUnavailableError | null = null;
  private failureListeners = new Set<(error: StorageUnavailableError) => void>();

  get isOpen(): boolean {
    return this.opened !== null;
  }

  async open(options: StorageOptions): Promise<void> {
    if (this.openError) throw this.openError;
    this.opened = options;
  }

  write(message: BagMessage): void {
    if (!this.opened) throw new StorageUnavailableError('Writer is not open');
    if (this.failure) throw this.failure;
    this.written.push(message);
  }

  async close(): Promise<void> {
    this.closeCount++;
    this.opened = null;
    if (this.closeError) throw this.closeError;
    if (this.failure) throw this.failure;
  }

  onFailure(listener: (error: StorageUnavailableError) => void): () => void {
    this.failureListeners.add(listener);
    return () => { this.failureListeners.delete(listener); };
  }

  /** Simulates a background flush failing. */
  fail(error: StorageUnavailableError): void {
    this.failure = error;
    for (const l of this.failureListeners) l(error);
  }

  get failureListenerCount(): number {
    return this.failureListeners.size;
  }
}

/** A logger that records formatted lines instead of printing them. */
export function captureLogger(level: 'debug' | 'info' = 'info'): { log: Logger; lines: string[] } {
  const lines: string[] = [];
  const log = new Logger({ level });
  log.setOutput((msg) => lines.push(msg));
  return { log, lines };
}
