/**
 * Capture Session: acquires and releases one recording instance.
 *
 * `begin` builds a fresh writer and recorder for the given path, registers
 * the recorder with the executor and starts it. `end` unregisters and stops
 * it. Callers (the session controller) are responsible for never beginning
 * twice or ending a handle twice.
 *
 * A storage failure during an active capture is reported once through
 * `onSessionFailed`; the handle stays active until the caller ends it.
 */

import { DEFAULT_SERIALIZATION_FORMAT, TOPIC_POLLING_INTERVAL_MS } from '../constants.js';
import type { RecordingConfig } from '../config/config-loader.js';
import type { Executor } from '../execution/executor.js';
import { buildStorageOptions, type BagWriterFactory, type StorageOptions } from '../storage/bag-writer.js';
import type { TopicSource } from '../types/ros.js';
import {
  BagRecorderError,
  DoubleTransitionError,
  StorageUnavailableError,
  errorMessage,
} from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import { TopicRecorder, type RecorderStats } from './topic-recorder.js';
import { describeScope, type TopicScope } from './topic-filter.js';

export interface CaptureHandle {
  readonly id: string;
  readonly path: string;
  readonly scope: TopicScope;
  readonly storageOptions: StorageOptions;
  readonly startedAt: number;
}

export interface CaptureService {
  begin(config: RecordingConfig, scope: TopicScope, path: string): Promise<CaptureHandle>;
  end(handle: CaptureHandle): Promise<void>;
  onSessionFailed(listener: SessionFailedListener): () => void;
}

export type SessionFailedListener = (handle: CaptureHandle, error: StorageUnavailableError) => void;

interface ActiveCapture {
  recorder: TopicRecorder;
  handle: CaptureHandle;
  detach: () => void;
}

export interface CaptureSessionDeps {
  executor: Executor;
  source: TopicSource;
  createWriter: BagWriterFactory;
  topicPollingIntervalMs?: number;
  now?: () => number;
  log?: Logger;
}

export class CaptureSession implements CaptureService {
  private active = new Map<string, ActiveCapture>();
  private failureListeners = new Set<SessionFailedListener>();
  private sequence = 0;
  private readonly deps: CaptureSessionDeps;
  private readonly log: Logger;
  private readonly now: () => number;

  constructor(deps: CaptureSessionDeps) {
    this.deps = deps;
    this.log = (deps.log ?? rootLogger).child('CaptureSession');
    this.now = deps.now ?? Date.now;
  }

  async begin(config: RecordingConfig, scope: TopicScope, path: string): Promise<CaptureHandle> {
    const id = `recorder_${++this.sequence}`;
    const storageOptions = buildStorageOptions(path, config.fileDuration);
    const recorder = new TopicRecorder(
      id,
      this.deps.createWriter(),
      storageOptions,
      {
        scope,
        serializationFormat: DEFAULT_SERIALIZATION_FORMAT,
        topicPollingIntervalMs: this.deps.topicPollingIntervalMs ?? TOPIC_POLLING_INTERVAL_MS,
      },
      this.deps.source,
      this.deps.log ?? rootLogger
    );

    this.log.info('Storage Path', { uri: path, topics: describeScope(scope) });
    this.deps.executor.add(recorder);
    try {
      await recorder.record();
    } catch (err) {
      this.deps.executor.remove(recorder);
      if (err instanceof BagRecorderError) throw err;
      throw new StorageUnavailableError(`Cannot start recording to ${path}: ${errorMessage(err)}`, path);
    }

    const handle: CaptureHandle = { id, path, scope, storageOptions, startedAt: this.now() };
    const detach = recorder.onFailure((error) => this.reportFailure(handle, error));
    this.active.set(id, { recorder, handle, detach });

    // Failed while starting up, before anyone was listening
    const early = recorder.getFailure();
    if (early) this.reportFailure(handle, early);
    return handle;
  }

  async end(handle: CaptureHandle): Promise<void> {
    const capture = this.active.get(handle.id);
    if (!capture) {
      throw new DoubleTransitionError('end', 'idle');
    }
    this.active.delete(handle.id);
    capture.detach();
    this.deps.executor.remove(capture.recorder);
    await capture.recorder.stop();
  }

  onSessionFailed(listener: SessionFailedListener): () => void {
    this.failureListeners.add(listener);
    return () => {
      this.failureListeners.delete(listener);
    };
  }

  /** Recorder statistics for an active handle, or null once it has ended. */
  stats(handle: CaptureHandle): RecorderStats | null {
    return this.active.get(handle.id)?.recorder.getStats() ?? null;
  }

  get activeCount(): number {
    return this.active.size;
  }

  private reportFailure(handle: CaptureHandle, error: StorageUnavailableError): void {
    if (!this.active.has(handle.id)) return;
    for (const listener of this.failureListeners) {
      try {
        listener(handle, error);
      } catch (err) {
        this.log.error('Session failure listener threw', { uri: handle.path, error: errorMessage(err) });
      }
    }
  }
}
