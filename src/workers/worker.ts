/**
 * Worker
 *
 * Long-lived consumer that:
 * 1. Pops file paths from the shared queue
 * 2. Runs the validator on each one
 * 3. Records failures in its own map
 * 4. Exits when the queue reports no more work
 */

import chalk from "chalk";
import { createDecoderValidator } from "../validator/decoder-validator.js";
import type { Logger } from "../utils/logger.js";
import type { TaskQueue } from "./task-queue.js";
import type {
  FailureRecord,
  ValidatedEvent,
  ValidationOutcome,
  Validator,
  WorkerOptions,
  WorkerResult,
} from "./types.js";

export class Worker {
  readonly workerId: string;
  private queue: TaskQueue<string>;
  private validator: Validator;
  private logger: Logger;
  private onValidated?: (event: ValidatedEvent) => void;
  private failed: FailureRecord;
  private processed: number;

  /**
   * Throws ConfigurationError when the validator executable is unusable
   */
  constructor(workerId: string, queue: TaskQueue<string>, options: WorkerOptions) {
    const createValidator = options.createValidator ?? createDecoderValidator;
    this.workerId = workerId;
    this.queue = queue;
    this.validator = createValidator(options.validatorPath, {
      timeoutMs: options.timeoutMs,
    });
    this.logger = options.logger;
    this.onValidated = options.onValidated;
    this.failed = new Map();
    this.processed = 0;
  }

  /**
   * Main loop. Resolves once the queue is complete and drained.
   */
  async run(): Promise<WorkerResult> {
    this.logger.debug(chalk.gray(`[${this.workerId}] Started`));

    while (true) {
      const filePath = await this.queue.pop();
      if (filePath === null) {
        break;
      }
      await this.validateFile(filePath);
    }

    this.logger.debug(
      chalk.gray(
        `[${this.workerId}] Finished: ${this.processed - this.failed.size} passed, ${this.failed.size} failed`,
      ),
    );

    return {
      workerId: this.workerId,
      filesProcessed: this.processed,
      filesFailed: this.failed.size,
      failures: this.failed,
    };
  }

  /**
   * Failures recorded so far. Only stable once `run` has resolved.
   */
  get failures(): ReadonlyMap<string, string> {
    return this.failed;
  }

  private async validateFile(filePath: string): Promise<void> {
    this.processed++;
    this.logger.debug(chalk.gray(`[${this.workerId}] Processing file: ${filePath}`));

    const outcome = await this.invoke(filePath);

    if (!outcome.ok) {
      this.failed.set(filePath, outcome.diagnostic);
      this.logger.debug(
        chalk.yellow(`[${this.workerId}] Failed: ${filePath} - ${outcome.diagnostic}`),
      );
    }

    this.notify({ workerId: this.workerId, filePath, ok: outcome.ok });
  }

  // A failing listener must not end the loop either
  private notify(event: ValidatedEvent): void {
    try {
      this.onValidated?.(event);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      this.logger.warn(
        chalk.yellow(`[${this.workerId}] Progress listener failed: ${message}`),
      );
    }
  }

  // A broken file must never stop the loop
  private async invoke(filePath: string): Promise<ValidationOutcome> {
    try {
      return await this.validator.validate(filePath);
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      return { ok: false, diagnostic: message, exitCode: null };
    }
  }
}
