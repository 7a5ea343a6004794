/**
 * Recording Session Controller.
 *
 * Two states, Idle and Recording, with at most one active capture handle.
 * Every transition (start, stop, reset, control signals, auto-reset ticks)
 * runs as one task on a single-consumer ControlQueue, so a signal that
 * arrives mid-reset is handled only after the whole reset has finished.
 *
 * When storage fails under an active session, the session is ended on the
 * queue and the controller returns to Idle with `lastError` set. The next
 * enable signal begins a fresh session.
 */

import type { RecordingConfig } from '../config/config-loader.js';
import { DoubleTransitionError, type StorageUnavailableError, errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';
import type { CaptureHandle, CaptureService } from './capture-session.js';
import { ControlQueue } from './control-queue.js';
import type { PathNamer } from './path-namer.js';
import { describeScope, resolveTopicScope, type TopicScope } from './topic-filter.js';

export type SessionState = 'idle' | 'recording';

export interface SessionStatus {
  state: SessionState;
  path: string | null;
  startedAt: number | null;
  /** Sessions begun since the controller was created. */
  sessionCount: number;
  lastError: string | null;
}

export interface SessionControllerOptions {
  config: RecordingConfig;
  capture: CaptureService;
  namer: PathNamer;
  queue?: ControlQueue;
  log?: Logger;
}

export class SessionController {
  private state: SessionState = 'idle';
  private handle: CaptureHandle | null = null;
  private sessionCount = 0;
  private lastError: string | null = null;
  private timers = new Set<ReturnType<typeof setInterval>>();
  private readonly detachCapture: () => void;
  private readonly scope: TopicScope;
  private readonly config: RecordingConfig;
  private readonly capture: CaptureService;
  private readonly namer: PathNamer;
  private readonly queue: ControlQueue;
  private readonly log: Logger;

  constructor(options: SessionControllerOptions) {
    this.config = options.config;
    this.capture = options.capture;
    this.namer = options.namer;
    this.log = (options.log ?? rootLogger).child('SessionController');
    this.queue = options.queue ?? new ControlQueue(undefined, options.log ?? rootLogger);
    this.scope = resolveTopicScope(options.config.loggedTopics);
    this.detachCapture = this.capture.onSessionFailed((handle, error) => this.sessionFailed(handle, error));

    this.log.info('Data Folder', { dataFolder: this.config.dataFolder });
    this.log.info('File Duration', { seconds: this.config.fileDuration });
    this.log.info('Logged Topics', { topics: describeScope(this.scope) });
  }

  /** Begin a session unless one is already active. */
  async start(): Promise<void> {
    await this.queue.push('start', 'command', () => this.enable(true));
  }

  /** End the active session, if any. */
  async stop(): Promise<void> {
    await this.queue.push('stop', 'command', () => this.disable(true));
  }

  /** End the active session (if any) and begin a new one, as a single transition. */
  async reset(): Promise<void> {
    await this.queue.push('reset', 'command', async () => {
      await this.disable(true);
      await this.enable(true);
    });
  }

  /**
   * Apply a control signal. Failures are logged, never thrown: there is no
   * caller to hand them to. Resolves false when the signal was dropped.
   */
  handleSignal(enableRecording: boolean): Promise<boolean> {
    const label = enableRecording ? 'enable' : 'disable';
    return this.queue
      .push(label, 'signal', () => (enableRecording ? this.enable(false) : this.disable(false)))
      .catch((err: unknown) => {
        this.log.error('Control signal failed', { signal: label, error: errorMessage(err) });
        return true;
      });
  }

  /** Resolves once every queued transition has settled. */
  whenIdle(): Promise<void> {
    return this.queue.whenIdle();
  }

  getActiveHandle(): CaptureHandle | null {
    return this.handle;
  }

  getStatus(): SessionStatus {
    return {
      state: this.state,
      path: this.handle?.path ?? null,
      startedAt: this.handle?.startedAt ?? null,
      sessionCount: this.sessionCount,
      lastError: this.lastError,
    };
  }

  /**
   * Periodically reset the session through the control queue. Returns a
   * function that cancels the timer.
   */
  startAutoReset(intervalMs: number): () => void {
    const timer = setInterval(() => {
      this.reset().catch((err: unknown) => {
        this.log.error('Scheduled reset failed', { error: errorMessage(err) });
      });
    }, intervalMs);
    this.timers.add(timer);
    return () => {
      clearInterval(timer);
      this.timers.delete(timer);
    };
  }

  /** Cancel auto-reset timers, wait for queued transitions, and stop. */
  async shutdown(): Promise<void> {
    for (const timer of this.timers) clearInterval(timer);
    this.timers.clear();
    try {
      await this.stop();
    } finally {
      this.detachCapture();
    }
  }

  private async enable(rethrow: boolean): Promise<void> {
    if (this.state === 'recording') {
      this.log.debug('Already recording, ignoring start');
      return;
    }
    try {
      await this.begin();
    } catch (err) {
      this.lastError = errorMessage(err);
      this.log.error('Failed to start recording', { error: this.lastError });
      if (rethrow) throw err;
    }
  }

  private async disable(rethrow: boolean): Promise<void> {
    if (this.state === 'idle') {
      this.log.debug('Not recording, ignoring stop');
      return;
    }
    try {
      await this.end();
    } catch (err) {
      this.lastError = errorMessage(err);
      this.log.error('Failed to stop recording cleanly', { error: this.lastError });
      if (rethrow) throw err;
    }
  }

  private sessionFailed(handle: CaptureHandle, error: StorageUnavailableError): void {
    this.log.error('Recording failed, ending session', { id: handle.id, path: handle.path, error: error.message });
    this.queue
      .push('storage-failure', 'command', async () => {
        // Already ended or replaced by the time this runs
        if (this.handle?.id !== handle.id) return;
        this.lastError = error.message;
        try {
          await this.end();
        } catch (err) {
          if (err !== error) {
            this.log.warn('Failed session did not close cleanly', { id: handle.id, error: errorMessage(err) });
          }
        }
      })
      .catch((err: unknown) => {
        this.log.error('Ending failed session crashed', { id: handle.id, error: errorMessage(err) });
      });
  }

  private async begin(): Promise<void> {
    if (this.handle) throw new DoubleTransitionError('begin', this.state);
    const path = this.namer.next();
    this.handle = await this.capture.begin(this.config, this.scope, path);
    this.state = 'recording';
    this.sessionCount++;
    this.lastError = null;
    this.log.info('Recording started', { id: this.handle.id, path });
  }

  private async end(): Promise<void> {
    const handle = this.handle;
    if (!handle) throw new DoubleTransitionError('end', this.state);
    try {
      await this.capture.end(handle);
    } finally {
      this.handle = null;
      this.state = 'idle';
    }
    this.log.info('Recording stopped', { id: handle.id, path: handle.path });
  }
}
