/**
 * Single-consumer queue that serializes session transitions.
 *
 * Tasks run one at a time in arrival order; a task is not started until the
 * previous one has settled. Control signals are bounded by `depth`: when that
 * many signals are already waiting, the oldest waiting signal is dropped
 * (keep-last, as with the control subscription's history). Commands issued
 * programmatically are never dropped.
 */

import { CONTROL_QUEUE_DEPTH } from '../constants.js';
import { errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export type TaskKind = 'signal' | 'command';

interface QueuedTask {
  label: string;
  kind: TaskKind;
  run: () => Promise<void>;
  resolve: (ran: boolean) => void;
  reject: (reason: unknown) => void;
}

export class ControlQueue {
  private pending: QueuedTask[] = [];
  private draining = false;
  private idleWaiters: (() => void)[] = [];
  private readonly log: Logger;

  constructor(private readonly depth = CONTROL_QUEUE_DEPTH, log: Logger = rootLogger) {
    if (!Number.isInteger(depth) || depth < 1) {
      throw new RangeError(`Control queue depth must be a positive integer, got ${depth}`);
    }
    this.log = log.child('ControlQueue');
  }

  /**
   * Queue a task. Resolves `true` once it has run, `false` if it was dropped,
   * and rejects with whatever the task threw.
   */
  push(label: string, kind: TaskKind, run: () => Promise<void>): Promise<boolean> {
    return new Promise<boolean>((resolve, reject) => {
      if (kind === 'signal') {
        this.evictOldestSignalIfFull();
      }
      this.pending.push({ label, kind, run, resolve, reject });
      this.drain().catch((err: unknown) => {
        this.log.error('Control queue drain failed', { error: errorMessage(err) });
      });
    });
  }

  get size(): number {
    return this.pending.length;
  }

  get isBusy(): boolean {
    return this.draining;
  }

  /** Resolves once every queued task has settled. */
  whenIdle(): Promise<void> {
    if (!this.draining && this.pending.length === 0) return Promise.resolve();
    return new Promise((resolve) => this.idleWaiters.push(resolve));
  }

  private evictOldestSignalIfFull(): void {
    const waiting = this.pending.filter((t) => t.kind === 'signal');
    if (waiting.length < this.depth) return;
    const oldest = waiting[0];
    this.pending = this.pending.filter((t) => t !== oldest);
    this.log.warn('Control queue full, dropping oldest signal', { dropped: oldest.label, depth: this.depth });
    oldest.resolve(false);
  }

  private async drain(): Promise<void> {
    if (this.draining) return;
    this.draining = true;
    try {
      for (let task = this.pending.shift(); task; task = this.pending.shift()) {
        try {
          await task.run();
          task.resolve(true);
        } catch (err) {
          task.reject(err);
        }
      }
    } finally {
      this.draining = false;
      const waiters = this.idleWaiters;
      this.idleWaiters = [];
      for (const wake of waiters) wake();
    }
  }
}
