/**
 * Control Signal Source: the executor unit that listens on the control topic
 * and forwards `enable_recording` to the session controller.
 */

import { z } from 'zod';
import type { ExecutorUnit } from '../execution/executor.js';
import type { BagMessage } from '../storage/bag-writer.js';
import { errorMessage } from '../errors.js';
import { logger as rootLogger, type Logger } from '../utils/logger.js';

export const ControlSignalSchema = z.object({
  enable_recording: z.boolean(),
});

export interface SignalSink {
  handleSignal(enableRecording: boolean): Promise<boolean>;
}

export class BagControlSubscriber implements ExecutorUnit {
  readonly name = 'bag_control';
  private readonly log: Logger;

  constructor(
    readonly controlTopic: string,
    private readonly controller: SignalSink,
    log: Logger = rootLogger
  ) {
    this.log = log.child('BagControl');
  }

  accepts(topic: string): boolean {
    return topic === this.controlTopic;
  }

  dispatch(message: BagMessage): void {
    const parsed = ControlSignalSchema.safeParse(message.data);
    if (!parsed.success) {
      this.log.warn('Ignoring malformed control message', {
        topic: message.topic,
        issues: parsed.error.issues.map((i) => `${i.path.join('.') || '(root)'}: ${i.message}`),
      });
      return;
    }
    this.log.info('Message Received', { enable_recording: parsed.data.enable_recording });
    this.controller.handleSignal(parsed.data.enable_recording).catch((err: unknown) => {
      this.log.error('Control signal was not applied', { error: errorMessage(err) });
    });
  }
}
