import chalk from "chalk";
import { ConfigurationError } from "../types/errors.js";
import type { Logger } from "../utils/logger.js";
import type { TaskQueue } from "./task-queue.js";
import type {
  PoolProgress,
  ValidatedEvent,
  WorkerPoolOptions,
  WorkerResult,
} from "./types.js";
import { Worker } from "./worker.js";

/**
 * Worker Pool Manager
 *
 * Owns a fixed set of workers sharing one queue: builds them, starts
 * their loops and joins them.
 */
export class WorkerPool {
  private queue: TaskQueue<string>;
  private workerCount: number;
  private options: WorkerPoolOptions;
  private logger: Logger;
  private workers: Worker[];
  private running: Promise<WorkerResult>[];
  private progress: PoolProgress;

  constructor(
    queue: TaskQueue<string>,
    workerCount: number,
    options: WorkerPoolOptions,
  ) {
    if (!Number.isInteger(workerCount) || workerCount < 1) {
      throw new ConfigurationError(
        `Worker count must be a positive integer, got '${workerCount}'`,
      );
    }

    this.queue = queue;
    this.workerCount = workerCount;
    this.options = options;
    this.logger = options.logger;
    this.workers = [];
    this.running = [];
    this.progress = { queued: 0, validated: 0, failed: 0 };
  }

  /**
   * Build every worker, then start them all. A worker that cannot be
   * built aborts the start before any of them runs.
   */
  start(): void {
    if (this.running.length > 0) {
      throw new Error("Worker pool already started");
    }

    this.logger.debug(chalk.blue(`Starting ${this.workerCount} workers...`));

    const workers: Worker[] = [];
    for (let i = 0; i < this.workerCount; i++) {
      workers.push(
        new Worker(`worker-${i + 1}`, this.queue, {
          validatorPath: this.options.validatorPath,
          logger: this.logger,
          timeoutMs: this.options.timeoutMs,
          createValidator: this.options.createValidator,
          onValidated: (event) => this.handleValidated(event),
        }),
      );
    }

    this.workers = workers;
    this.running = workers.map((worker) => worker.run());

    this.logger.debug(chalk.green(`✓ All ${this.workerCount} workers started`));
  }

  /**
   * Wait for every worker to drain the queue and exit
   */
  async waitForCompletion(): Promise<WorkerResult[]> {
    this.logger.debug(chalk.blue("Waiting for workers to complete..."));

    const results = await Promise.all(this.running);

    this.logger.debug(
      chalk.green(
        `✓ All workers completed: ${this.progress.validated} files validated, ${this.progress.failed} failed`,
      ),
    );

    return results;
  }

  /**
   * Record that the producer queued another file
   */
  noteQueued(): void {
    this.progress.queued++;
    this.emitProgress();
  }

  getProgress(): PoolProgress {
    return { ...this.progress };
  }

  getWorkerCount(): number {
    return this.workers.length;
  }

  private handleValidated(event: ValidatedEvent): void {
    this.progress.validated++;
    if (!event.ok) {
      this.progress.failed++;
    }
    this.emitProgress();
  }

  private emitProgress(): void {
    if (!this.options.onProgress) {
      return;
    }
    try {
      this.options.onProgress(this.getProgress());
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(chalk.yellow(`Progress callback failed: ${message}`));
    }
  }
}
