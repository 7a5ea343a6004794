/**
 * Line-delimited JSON bag writer.
 *
 * Each bag is a directory holding `<bag>_0.jsonl`, `<bag>_1.jsonl`, ... plus a
 * `metadata.yaml` written on close. Lines are buffered until the cache budget
 * is reached, then appended in order on a single flush chain.
 */

import { appendFile, mkdir, writeFile } from 'fs/promises';
import { basename, dirname, join } from 'path';
import { stringify as stringifyYaml } from 'yaml';
import { METADATA_FILE_NAME } from '../constants.js';
import { StorageUnavailableError, errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { BagMessage, BagWriter, StorageOptions } from './bag-writer.js';

interface BagFile {
  path: string;
  startedAt: number;
  messageCount: number;
  bytes: number;
}

interface TopicCount {
  type: string;
  count: number;
}

export interface JsonlBagWriterOptions {
  now?: () => number;
  log?: Logger;
}

export class JsonlBagWriter implements BagWriter {
  private options: StorageOptions | null = null;
  private files: BagFile[] = [];
  private topics = new Map<string, TopicCount>();
  private cache: string[] = [];
  private cacheBytes = 0;
  private flushChain: Promise<void> = Promise.resolve();
  private failure: StorageUnavailableError | null = null;
  private failureListeners = new Set<(error: StorageUnavailableError) => void>();
  private openedAt = 0;
  private readonly now: () => number;
  private readonly log: Logger;

  constructor(options: JsonlBagWriterOptions = {}) {
    this.now = options.now ?? Date.now;
    this.log = (options.log ?? rootLogger).child('JsonlBagWriter');
  }

  get isOpen(): boolean {
    return this.options !== null;
  }

  /** Files written so far, relative to the bag directory. */
  get relativeFilePaths(): string[] {
    return this.files.map((f) => basename(f.path));
  }

  async open(options: StorageOptions): Promise<void> {
    if (this.options) {
      throw new StorageUnavailableError(`Writer already open at ${this.options.uri}`, this.options.uri);
    }
    if (options.snapshotMode) {
      throw new StorageUnavailableError('Snapshot mode is not supported by the jsonl writer', options.uri);
    }

    try {
      await mkdir(dirname(options.uri), { recursive: true });
      // Non-recursive: an existing bag directory is an error
      await mkdir(options.uri);
    } catch (err) {
      throw new StorageUnavailableError(`Cannot create bag directory ${options.uri}: ${errorMessage(err)}`, options.uri);
    }

    this.options = options;
    this.openedAt = this.now();
    this.startFile(options, this.openedAt);
    await this.flushChain;
    if (this.failure) {
      this.options = null;
      throw this.failure;
    }
    this.log.debug('Bag opened', { uri: options.uri, storageId: options.storageId });
  }

  write(message: BagMessage): void {
    const options = this.options;
    if (!options) {
      throw new StorageUnavailableError('Writer is not open');
    }
    if (this.failure) {
      throw this.failure;
    }

    // Rotation follows the writer clock; the message stamp is stored as-is
    const now = this.now();
    if (this.shouldRotate(options, now)) {
      this.flush();
      this.startFile(options, now);
    }

    const line = JSON.stringify({
      topic: message.topic,
      type: message.type ?? null,
      timestamp: message.timestamp,
      data: message.data,
    }) + '\n';
    const bytes = Buffer.byteLength(line);

    this.cache.push(line);
    this.cacheBytes += bytes;

    const file = this.currentFile();
    file.messageCount++;
    file.bytes += bytes;

    const topic = this.topics.get(message.topic);
    if (topic) {
      topic.count++;
    } else {
      this.topics.set(message.topic, { type: message.type ?? '', count: 1 });
    }

    if (this.cacheBytes >= options.maxCacheSize) {
      this.flush();
    }
  }

  async close(): Promise<void> {
    const options = this.options;
    if (!options) return;

    this.flush();
    await this.flushChain;

    try {
      await writeFile(join(options.uri, METADATA_FILE_NAME), stringifyYaml(this.metadata(options)));
    } catch (err) {
      this.failure ??= new StorageUnavailableError(`Cannot write bag metadata: ${errorMessage(err)}`, options.uri);
    }

    this.options = null;
    this.log.debug('Bag closed', { uri: options.uri, files: this.files.length });
    if (this.failure) {
      throw this.failure;
    }
  }

  onFailure(listener: (error: StorageUnavailableError) => void): () => void {
    this.failureListeners.add(listener);
    return () => {
      this.failureListeners.delete(listener);
    };
  }

  private shouldRotate(options: StorageOptions, now: number): boolean {
    const file = this.currentFile();
    if (file.messageCount === 0) return false;
    if (options.maxBagfileDuration > 0 && now - file.startedAt >= options.maxBagfileDuration * 1000) {
      return true;
    }
    return options.maxBagfileSize > 0 && file.bytes >= options.maxBagfileSize;
  }

  private currentFile(): BagFile {
    const file = this.files[this.files.length - 1];
    if (!file) {
      throw new StorageUnavailableError('Writer has no active file');
    }
    return file;
  }

  private startFile(options: StorageOptions, startedAt: number): void {
    const name = `${basename(options.uri)}_${this.files.length}.${options.storageId}`;
    const path = join(options.uri, name);
    this.files.push({ path, startedAt, messageCount: 0, bytes: 0 });
    this.enqueue(() => appendFile(path, ''), path);
  }

  private flush(): void {
    if (this.cache.length === 0) return;
    const chunk = this.cache.join('');
    const path = this.currentFile().path;
    this.cache = [];
    this.cacheBytes = 0;
    this.enqueue(() => appendFile(path, chunk), path);
  }

  /** Appends run in order; after the first failure the rest are skipped. */
  private enqueue(task: () => Promise<void>, path: string): void {
    this.flushChain = this.flushChain
      .then(() => (this.failure ? undefined : task()))
      .catch((err: unknown) => {
        const message = errorMessage(err);
        this.log.error('Bag write failed', { path, error: message });
        this.fail(new StorageUnavailableError(`Write to ${path} failed: ${message}`, this.options?.uri));
      });
  }

  private fail(error: StorageUnavailableError): void {
    if (this.failure) return;
    this.failure = error;
    for (const listener of this.failureListeners) {
      try {
        listener(error);
      } catch (err) {
        this.log.error('Failure listener threw', { error: errorMessage(err) });
      }
    }
  }

  private metadata(options: StorageOptions): Record<string, unknown> {
    const messageCount = this.files.reduce((sum, f) => sum + f.messageCount, 0);
    return {
      version: 1,
      storage_identifier: options.storageId,
      relative_file_paths: this.relativeFilePaths,
      starting_time_ms: this.openedAt,
      duration_ms: Math.max(0, this.now() - this.openedAt),
      message_count: messageCount,
      topics_with_message_count: [...this.topics].map(([name, t]) => ({
        name,
        type: t.type,
        message_count: t.count,
      })),
      files: this.files.map((f) => ({
        path: basename(f.path),
        starting_time_ms: f.startedAt,
        message_count: f.messageCount,
      })),
    };
  }
}
