/**
 * Wires the bridge, executor, capture session, session controller and
 * control unit into one running recorder.
 */

import type { RecorderConfig } from './config/config-loader.js';
import { errorMessage } from './errors.js';
import { Executor } from './execution/executor.js';
import { BagControlSubscriber } from './recorder/bag-control.js';
import { CaptureSession } from './recorder/capture-session.js';
import { PathNamer, type Clock } from './recorder/path-namer.js';
import { SessionController } from './recorder/session-controller.js';
import type { BagWriterFactory } from './storage/bag-writer.js';
import { JsonlBagWriter } from './storage/jsonl-writer.js';
import type { TopicSource } from './types/ros.js';
import { logger as rootLogger, type Logger } from './utils/logger.js';

/** A topic source with a connection lifecycle, such as the bridge's ConnectionManager. */
export interface BridgeLink extends TopicSource {
  connect(): Promise<void>;
  disconnect(): void;
}

export interface RecorderAppOptions {
  config: RecorderConfig;
  bridge: BridgeLink;
  createWriter?: BagWriterFactory;
  clock?: Clock;
  topicPollingIntervalMs?: number;
  log?: Logger;
}

export class RecorderApp {
  readonly executor: Executor;
  readonly capture: CaptureSession;
  readonly controller: SessionController;
  private readonly control: BagControlSubscriber;
  private readonly bridge: BridgeLink;
  private readonly config: RecorderConfig;
  private readonly log: Logger;
  private running = false;

  constructor(options: RecorderAppOptions) {
    const log = options.log ?? rootLogger;
    this.log = log.child('BagRecorder');
    this.bridge = options.bridge;
    this.config = options.config;

    this.executor = new Executor(this.bridge, log);
    this.capture = new CaptureSession({
      executor: this.executor,
      source: this.bridge,
      createWriter: options.createWriter ?? (() => new JsonlBagWriter({ log })),
      topicPollingIntervalMs: options.topicPollingIntervalMs,
      log,
    });
    this.controller = new SessionController({
      config: this.config,
      capture: this.capture,
      namer: new PathNamer(this.config.dataFolder, options.clock),
      log,
    });
    this.control = new BagControlSubscriber(this.config.controlTopic, this.controller, log);
  }

  /**
   * Connect, listen on the control topic and begin recording. A failed first
   * session leaves the recorder idle, waiting for an enable signal.
   */
  async start(): Promise<void> {
    if (this.running) return;
    await this.bridge.connect();

    this.executor.add(this.control);
    await this.bridge.subscribe(this.config.controlTopic, this.config.controlMessageType);
    this.executor.spin().catch((err: unknown) => {
      this.log.error('Executor stopped unexpectedly', { error: errorMessage(err) });
    });
    this.running = true;
    this.log.info('Listening for control messages', { topic: this.config.controlTopic });

    try {
      await this.controller.start();
    } catch (err) {
      this.log.warn('Initial recording failed, waiting for an enable signal', { error: errorMessage(err) });
    }
  }

  /** Stop recording, release the control subscription and disconnect. */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;

    try {
      await this.controller.shutdown();
    } finally {
      if (this.executor.has(this.control)) this.executor.remove(this.control);
      try {
        await this.bridge.unsubscribe(this.config.controlTopic);
      } catch (err) {
        this.log.warn('Failed to release control subscription', { error: errorMessage(err) });
      }
      this.executor.shutdown();
      this.bridge.disconnect();
    }
  }

  get isRunning(): boolean {
    return this.running;
  }
}
