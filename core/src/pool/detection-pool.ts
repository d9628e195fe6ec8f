import fs from 'fs';
import os from 'os';
import path from 'path';
import { Worker } from 'worker_threads';
import { DetectionResult, Language } from '../types';
import { resolveSettings, SettingsInput } from '../config';
import { deserializeError, WorkerPoolError } from '../errors';
import { consoleLogger, DetectorLogger } from '../logger';
import { VoiceDetector } from '../detector';
import { isWorkerResponse, WorkerInit, WorkerRequest, WorkerResponse } from './protocol';

export interface DetectionPoolOptions {
  /** Number of worker threads. Defaults to one less than the available cores. */
  size?: number;
  settings?: SettingsInput;
  logger?: DetectorLogger;
  /** Compiled worker entry point. Defaults to detection-worker.js beside this module. */
  workerScript?: string;
}

interface PendingTask {
  id: number;
  bytes: Uint8Array;
  language: Language;
  resolve(result: DetectionResult): void;
  reject(err: Error): void;
}

/** Workers that die before reporting ready, in a row, before the pool gives up. */
export const MAX_STARTUP_FAILURES = 3;

export function defaultPoolSize(): number {
  return Math.max(1, os.availableParallelism() - 1);
}

/**
 * Fixed-size worker_threads pool for detection calls. Tasks are dispatched
 * FIFO to idle workers; completion order between tasks is unspecified.
 *
 * When the worker script does not exist (e.g. running from TypeScript
 * sources) tasks run inline on the calling thread instead.
 *
 * A worker that dies is replaced. If MAX_STARTUP_FAILURES workers in a row
 * die before reporting ready, the pool stops spawning and fails every
 * pending and future task.
 */
export class DetectionPool {
  readonly size: number;
  readonly mode: 'threads' | 'inline';

  private readonly logger: DetectorLogger;
  private readonly settings: SettingsInput;
  private readonly workerScript: string;
  private readonly inlineDetector: VoiceDetector | null = null;

  private readonly idle: Worker[] = [];
  private readonly active = new Map<Worker, PendingTask>();
  private readonly queue: PendingTask[] = [];
  private readonly ready = new Set<Worker>();
  private startupFailures = 0;
  private failure: WorkerPoolError | null = null;
  private nextId = 1;
  private closed = false;

  constructor(options: DetectionPoolOptions = {}) {
    this.logger = options.logger ?? consoleLogger;
    this.settings = options.settings ?? {};
    // Fail fast on bad settings rather than inside every worker
    resolveSettings(this.settings);

    this.size = options.size ?? defaultPoolSize();
    if (!Number.isInteger(this.size) || this.size < 1) {
      throw new WorkerPoolError(`Pool size must be a positive integer, got ${this.size}`);
    }

    this.workerScript = options.workerScript ?? path.join(__dirname, 'detection-worker.js');
    if (fs.existsSync(this.workerScript)) {
      this.mode = 'threads';
      for (let i = 0; i < this.size; i++) this.idle.push(this.spawn());
    } else {
      this.mode = 'inline';
      this.inlineDetector = new VoiceDetector({ ...this.settings, logger: this.logger });
      this.logger.info(`Worker script ${this.workerScript} not found; running detections inline`);
    }
  }

  run(bytes: Uint8Array, language: Language): Promise<DetectionResult> {
    if (this.closed) {
      return Promise.reject(new WorkerPoolError('Pool is closed'));
    }
    if (this.failure) {
      return Promise.reject(this.failure);
    }
    if (this.inlineDetector) {
      return this.inlineDetector.detect(bytes, language);
    }
    return new Promise<DetectionResult>((resolve, reject) => {
      this.queue.push({ id: this.nextId++, bytes, language, resolve, reject });
      this.dispatch();
    });
  }

  get pending(): number {
    return this.queue.length + this.active.size;
  }

  async close(): Promise<void> {
    if (this.closed) return;
    this.closed = true;

    for (const task of this.queue.splice(0)) {
      task.reject(new WorkerPoolError('Pool closed before the task started'));
    }
    const workers = [...this.idle, ...this.active.keys()];
    for (const task of this.active.values()) {
      task.reject(new WorkerPoolError('Pool closed while the task was running'));
    }
    this.idle.length = 0;
    this.active.clear();
    this.ready.clear();
    await Promise.all(workers.map((worker) => worker.terminate()));
  }

  private spawn(): Worker {
    const init: WorkerInit = { settings: this.settings };
    const worker = new Worker(this.workerScript, { workerData: init });
    worker.on('message', (message: unknown) => this.onMessage(worker, message));
    worker.on('error', (err) => this.onFailure(worker, err));
    worker.on('exit', (code) => {
      if (code !== 0) this.onFailure(worker, new Error(`Worker exited with code ${code}`));
    });
    return worker;
  }

  private dispatch(): void {
    while (this.idle.length > 0 && this.queue.length > 0) {
      const worker = this.idle.pop();
      const task = this.queue.shift();
      if (!worker || !task) return;
      this.active.set(worker, task);
      const request: WorkerRequest = { id: task.id, bytes: task.bytes, language: task.language };
      worker.postMessage(request);
    }
  }

  private onMessage(worker: Worker, message: unknown): void {
    if (!isWorkerResponse(message)) {
      this.logger.warn('Discarding malformed worker message');
      return;
    }
    if (message.type === 'log') {
      this.log(message);
      return;
    }
    if (message.type === 'ready') {
      this.ready.add(worker);
      this.startupFailures = 0;
      return;
    }

    const task = this.active.get(worker);
    if (!task || task.id !== message.id) {
      this.logger.warn(`Discarding response for unknown task ${message.id}`);
      return;
    }
    this.active.delete(worker);
    this.idle.push(worker);

    if (message.type === 'result') {
      task.resolve(message.result);
    } else {
      task.reject(deserializeError(message.error));
    }
    this.dispatch();
  }

  private onFailure(worker: Worker, err: Error): void {
    if (this.closed || this.failure) return;
    const idleIndex = this.idle.indexOf(worker);
    if (idleIndex >= 0) this.idle.splice(idleIndex, 1);

    const task = this.active.get(worker);
    const known = idleIndex >= 0 || task !== undefined;
    if (!known) return; // already replaced

    this.active.delete(worker);
    const started = this.ready.delete(worker);
    this.logger.error(`Detection worker failed: ${err.message}`);
    task?.reject(new WorkerPoolError(`Worker failed: ${err.message}`));

    if (!started && ++this.startupFailures >= MAX_STARTUP_FAILURES) {
      this.fail(err);
      return;
    }
    this.idle.push(this.spawn());
    this.dispatch();
  }

  private fail(cause: Error): void {
    const failure = new WorkerPoolError(
      `Detection workers failed to start ${MAX_STARTUP_FAILURES} times in a row: ${cause.message}`
    );
    this.failure = failure;
    this.logger.error(failure.message);

    for (const task of [...this.queue.splice(0), ...this.active.values()]) {
      task.reject(failure);
    }
    const workers = [...this.idle, ...this.active.keys()];
    this.idle.length = 0;
    this.active.clear();
    this.ready.clear();
    Promise.all(workers.map((worker) => worker.terminate())).catch((err: unknown) => {
      this.logger.error(`Failed to stop detection workers: ${String(err)}`);
    });
  }

  private log(message: Extract<WorkerResponse, { type: 'log' }>): void {
    const { logger } = this;
    switch (message.level) {
      case 'debug':
        logger.debug(message.message);
        break;
      case 'info':
        logger.info(message.message);
        break;
      case 'warn':
        logger.warn(message.message);
        break;
      default:
        logger.error(message.message);
    }
  }
}
