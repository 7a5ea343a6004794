/**
 * Writer-driving unit of one capture session.
 *
 * Opens the bag writer, discovers topics in scope by polling the bridge's
 * topic list, subscribes to each one as it appears, and writes every message
 * the executor dispatches to it. A recorder records once: after `stop()` it
 * cannot be restarted.
 *
 * A storage failure, whether thrown by `write` or reported by the writer's
 * background flush, is reported once through `onFailure`. The recorder then
 * accepts no more messages; `stop()` still closes the writer.
 */

import type { ExecutorUnit } from '../execution/executor.js';
import type { BagMessage, BagWriter, StorageOptions } from '../storage/bag-writer.js';
import type { TopicSource } from '../types/ros.js';
import { StorageUnavailableError, errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { scopeIncludes, type TopicScope } from './topic-filter.js';

export interface RecordOptions {
  scope: TopicScope;
  serializationFormat: string;
  /** How often the bridge's topic list is polled for new topics. */
  topicPollingIntervalMs: number;
}

export type RecorderStatus = 'idle' | 'recording' | 'stopped';

export interface RecorderStats {
  name: string;
  status: RecorderStatus;
  uri: string;
  startedAt: number | null;
  stoppedAt: number | null;
  messageCount: number;
  subscribedTopics: string[];
}

export class TopicRecorder implements ExecutorUnit {
  private status: RecorderStatus = 'idle';
  private startedAt: number | null = null;
  private stoppedAt: number | null = null;
  private messageCount = 0;
  private subscribed = new Map<string, string>();
  private pollTimer: ReturnType<typeof setInterval> | null = null;
  private discovery: Promise<void> | null = null;
  private failure: StorageUnavailableError | null = null;
  private failureListeners = new Set<(error: StorageUnavailableError) => void>();
  private detachWriter: (() => void) | null = null;
  private readonly log: Logger;

  constructor(
    readonly name: string,
    private readonly writer: BagWriter,
    readonly storageOptions: StorageOptions,
    readonly recordOptions: RecordOptions,
    private readonly source: TopicSource,
    log: Logger = rootLogger
  ) {
    this.log = log.child('TopicRecorder');
  }

  /** Open the writer and start discovering topics. Rejects if the writer cannot open. */
  async record(): Promise<void> {
    if (this.status !== 'idle') {
      throw new Error(`Recorder "${this.name}" has already been started`);
    }

    await this.writer.open(this.storageOptions);
    this.detachWriter = this.writer.onFailure((error) => this.fail(error));
    this.status = 'recording';
    this.startedAt = Date.now();

    await this.discover();
    this.pollTimer = setInterval(() => {
      this.discover().catch((err: unknown) => {
        this.log.error('Topic discovery crashed', { recorder: this.name, error: errorMessage(err) });
      });
    }, this.recordOptions.topicPollingIntervalMs);
  }

  /** Unsubscribe from every topic and close the writer. Writer failures propagate. */
  async stop(): Promise<void> {
    if (this.status !== 'recording') return;
    this.status = 'stopped';
    this.stoppedAt = Date.now();

    if (this.pollTimer) {
      clearInterval(this.pollTimer);
      this.pollTimer = null;
    }
    if (this.discovery) {
      await this.discovery;
    }

    for (const topic of this.subscribed.keys()) {
      try {
        await this.source.unsubscribe(topic);
      } catch (err) {
        this.log.warn('Unsubscribe failed', { recorder: this.name, topic, error: errorMessage(err) });
      }
    }
    this.subscribed.clear();

    try {
      await this.writer.close();
    } finally {
      this.detachWriter?.();
      this.detachWriter = null;
    }
    this.log.info('Recorder stopped', { recorder: this.name, messages: this.messageCount });
  }

  /** Register for the first storage failure. Returns an unsubscribe function. */
  onFailure(listener: (error: StorageUnavailableError) => void): () => void {
    this.failureListeners.add(listener);
    return () => {
      this.failureListeners.delete(listener);
    };
  }

  getFailure(): StorageUnavailableError | null {
    return this.failure;
  }

  wants(topic: string): boolean {
    return scopeIncludes(this.recordOptions.scope, topic);
  }

  accepts(topic: string): boolean {
    return this.status === 'recording' && this.failure === null && this.wants(topic);
  }

  dispatch(message: BagMessage): void {
    try {
      this.writer.write({ ...message, type: message.type ?? this.subscribed.get(message.topic) });
    } catch (err) {
      this.fail(
        err instanceof StorageUnavailableError
          ? err
          : new StorageUnavailableError(`Write to ${this.storageOptions.uri} failed: ${errorMessage(err)}`, this.storageOptions.uri)
      );
      return;
    }
    this.messageCount++;
  }

  getStatus(): RecorderStatus {
    return this.status;
  }

  getStats(): RecorderStats {
    return {
      name: this.name,
      status: this.status,
      uri: this.storageOptions.uri,
      startedAt: this.startedAt,
      stoppedAt: this.stoppedAt,
      messageCount: this.messageCount,
      subscribedTopics: [...this.subscribed.keys()],
    };
  }

  private fail(error: StorageUnavailableError): void {
    if (this.failure) return;
    this.failure = error;
    for (const listener of this.failureListeners) {
      try {
        listener(error);
      } catch (err) {
        this.log.error('Failure listener threw', { recorder: this.name, error: errorMessage(err) });
      }
    }
  }

  private discover(): Promise<void> {
    if (this.discovery || this.status !== 'recording') {
      return this.discovery ?? Promise.resolve();
    }
    this.discovery = this.discoverOnce().finally(() => {
      this.discovery = null;
    });
    return this.discovery;
  }

  private async discoverOnce(): Promise<void> {
    try {
      const topics = await this.source.listTopics();
      for (const topic of topics) {
        if (this.status !== 'recording') break;
        if (this.subscribed.has(topic.name) || !this.wants(topic.name)) continue;
        await this.source.subscribe(topic.name, topic.type);
        this.subscribed.set(topic.name, topic.type);
        this.log.info('Subscribed', { recorder: this.name, topic: topic.name, type: topic.type });
      }
    } catch (err) {
      this.log.warn('Topic discovery failed, will retry', { recorder: this.name, error: errorMessage(err) });
    }
  }
}
