import fs from "fs";
import chalk from "chalk";
import {
  DEFAULT_VALIDATOR_PATH,
  DEFAULT_WORKERS,
  RAW_EXTENSIONS,
} from "../types/constants.js";
import { ConfigurationError } from "../types/errors.js";
import { createLogger, type Logger } from "../utils/logger.js";
import { getExtension, toExtensionSet } from "../validator/helpers.js";
import { walkFiles } from "../validator/traverse.js";
import { TaskQueue } from "./task-queue.js";
import { WorkerPool } from "./worker-pool.js";
import type {
  CoordinatorOptions,
  CoordinatorResult,
  ExtensionCounts,
  FailureRecord,
  WorkerResult,
} from "./types.js";

/**
 * Coordinator (Producer)
 *
 * Runs one validation pass over a directory tree:
 * 1. Checks the root directory
 * 2. Starts the worker pool
 * 3. Walks the tree, counting extensions and queueing RAW files
 * 4. Signals completion and waits for the workers
 * 5. Merges the per-worker failures into one report
 *
 * Aborting `options.signal` drops the pending queue; workers finish the
 * file they are on and exit, and the run resolves as cancelled.
 */
export class Coordinator {
  private rootDirectory: string;
  private workerCount: number;
  private validatorPath: string;
  private rawExtensions: Set<string>;
  private options: CoordinatorOptions;
  private logger: Logger;

  constructor(rootDirectory: string, options: CoordinatorOptions = {}) {
    this.rootDirectory = rootDirectory;
    this.options = options;
    this.workerCount = options.workers ?? DEFAULT_WORKERS;
    this.validatorPath = options.validatorPath ?? DEFAULT_VALIDATOR_PATH;
    this.rawExtensions = toExtensionSet(options.rawExtensions ?? RAW_EXTENSIONS);
    this.logger = options.logger ?? createLogger();
  }

  /**
   * Main run method. A fresh queue and pool are used on every call.
   */
  async run(): Promise<CoordinatorResult> {
    const startTime = Date.now();
    const signal = this.options.signal;

    // Phase 1: Check root directory
    await this.checkRootDirectory();

    // Phase 2: Start workers
    const queue = new TaskQueue<string>();
    const workerPool = new WorkerPool(queue, this.workerCount, {
      validatorPath: this.validatorPath,
      logger: this.logger,
      timeoutMs: this.options.timeoutMs,
      createValidator: this.options.createValidator,
      onProgress: this.options.onProgress,
    });
    workerPool.start();

    const cancel = () => {
      const dropped = queue.clear();
      queue.markComplete();
      this.logger.debug(
        chalk.yellow(`Cancelled, dropped ${dropped} queued files`),
      );
    };

    if (signal?.aborted) {
      cancel();
    } else {
      signal?.addEventListener("abort", cancel, { once: true });
    }

    const extensions: ExtensionCounts = new Map();
    let filesQueued = 0;
    let results: WorkerResult[] = [];

    try {
      // Phase 3: Producer loop
      try {
        for await (const filePath of walkFiles(this.rootDirectory, {
          signal,
          onError: (directory, error) => {
            const message = error instanceof Error ? error.message : String(error);
            this.logger.warn(
              chalk.yellow(`Skipping unreadable directory ${directory}: ${message}`),
            );
          },
        })) {
          if (signal?.aborted) break;

          const extension = getExtension(filePath);
          extensions.set(extension, (extensions.get(extension) ?? 0) + 1);

          if (this.rawExtensions.has(extension)) {
            queue.push(filePath);
            filesQueued++;
            workerPool.noteQueued();
          }
        }
      } catch (error) {
        // Let the workers unwind before surfacing the error
        cancel();
        await workerPool.waitForCompletion();
        throw error;
      }

      // Phase 4: Signal completion and wait for workers
      if (!queue.isComplete) {
        queue.markComplete();
      }
      this.logger.debug(chalk.gray(`Queued ${filesQueued} files for validation`));

      results = await workerPool.waitForCompletion();
    } finally {
      signal?.removeEventListener("abort", cancel);
    }

    const duration = Date.now() - startTime;
    const filesValidated = results.reduce(
      (sum, result) => sum + result.filesProcessed,
      0,
    );

    if (signal?.aborted) {
      return {
        success: false,
        cancelled: true,
        failures: new Map(),
        extensions,
        filesQueued,
        filesValidated,
        workersUsed: this.workerCount,
        duration,
      };
    }

    // Phase 5: Merge failures
    const failures = mergeFailures(results);

    return {
      success: failures.size === 0,
      cancelled: false,
      failures,
      extensions,
      filesQueued,
      filesValidated,
      workersUsed: this.workerCount,
      duration,
    };
  }

  private async checkRootDirectory(): Promise<void> {
    let isDirectory = false;
    try {
      const stats = await fs.promises.stat(this.rootDirectory);
      isDirectory = stats.isDirectory();
    } catch {
      isDirectory = false;
    }

    if (!isDirectory) {
      throw new ConfigurationError(
        `Specified path '${this.rootDirectory}' does not exist or is not a directory`,
      );
    }
  }
}

/**
 * Union of the workers' failure maps. Paths are disjoint across workers;
 * if one ever repeats, the later worker's diagnostic wins.
 */
export function mergeFailures(results: readonly WorkerResult[]): FailureRecord {
  const merged: FailureRecord = new Map();
  for (const result of results) {
    for (const [filePath, diagnostic] of result.failures) {
      merged.set(filePath, diagnostic);
    }
  }
  return merged;
}
