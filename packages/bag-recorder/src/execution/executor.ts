/**
 * Shared execution context for topic-driven units.
 *
 * Units register by name. While the executor spins, every message streamed
 * from the topic source is dispatched to each registered unit that accepts
 * its topic, in registration order. A unit that is not registered receives
 * nothing.
 */

import type { TopicMessageFrame } from '../bridge/protocol.js';
import type { BagMessage } from '../storage/bag-writer.js';
import { UnitRegistrationError, errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export interface ExecutorUnit {
  readonly name: string;
  accepts(topic: string): boolean;
  dispatch(message: BagMessage): void;
}

export interface MessageStream {
  onTopicMessage(listener: (frame: TopicMessageFrame) => void): () => void;
}

export class Executor {
  private units = new Map<string, ExecutorUnit>();
  private detach: (() => void) | null = null;
  private release: (() => void) | null = null;
  private spinning: Promise<void> | null = null;
  private readonly log: Logger;

  constructor(private readonly stream: MessageStream, log: Logger = rootLogger) {
    this.log = log.child('Executor');
  }

  add(unit: ExecutorUnit): void {
    if (this.units.has(unit.name)) {
      throw new UnitRegistrationError(`Unit "${unit.name}" is already registered`, unit.name);
    }
    this.units.set(unit.name, unit);
    this.log.debug('Unit added', { unit: unit.name });
  }

  remove(unit: ExecutorUnit): void {
    if (this.units.get(unit.name) !== unit) {
      throw new UnitRegistrationError(`Unit "${unit.name}" is not registered`, unit.name);
    }
    this.units.delete(unit.name);
    this.log.debug('Unit removed', { unit: unit.name });
  }

  has(unit: ExecutorUnit): boolean {
    return this.units.get(unit.name) === unit;
  }

  get unitNames(): string[] {
    return [...this.units.keys()];
  }

  get isSpinning(): boolean {
    return this.spinning !== null;
  }

  /** Start dispatching. The returned promise settles once `shutdown()` is called. */
  spin(): Promise<void> {
    if (this.spinning) return this.spinning;
    this.detach = this.stream.onTopicMessage((frame) => this.dispatch(frame));
    this.spinning = new Promise<void>((resolve) => {
      this.release = () => resolve();
    });
    return this.spinning;
  }

  shutdown(): void {
    this.detach?.();
    this.detach = null;
    this.release?.();
    this.release = null;
    this.spinning = null;
  }

  private dispatch(frame: TopicMessageFrame): void {
    const message: BagMessage = {
      topic: frame.topic,
      type: frame.message_type,
      timestamp: frame.timestamp,
      data: frame.msg,
    };
    // Snapshot: a unit may remove itself (or another) while handling a message
    for (const unit of [...this.units.values()]) {
      if (!unit.accepts(frame.topic)) continue;
      try {
        unit.dispatch(message);
      } catch (err) {
        this.log.error('Unit failed to handle message', {
          unit: unit.name,
          topic: frame.topic,
          error: errorMessage(err),
        });
      }
    }
  }
}
