/**
 * Type definitions for the validation pool
 * Producer-Consumer Pipeline Architecture
 */

import type { Logger } from "../utils/logger.js";

/**
 * A file path waiting to be validated
 */
export type WorkItem = string;

/**
 * Failed path -> cleaned decoder diagnostic
 */
export type FailureRecord = Map<string, string>;

/**
 * Lowercase extension (no dot, "" when there is none) -> file count
 */
export type ExtensionCounts = Map<string, number>;

/**
 * Counters kept by the task queue
 */
export interface QueueStats {
  pushed: number;
  pending: number;
  delivered: number;
}

/**
 * Outcome of one validator invocation
 */
export interface ValidationOutcome {
  ok: boolean;
  diagnostic: string;
  exitCode: number | null;
}

/**
 * Checks one file. Implementations must resolve, not reject, for bad files.
 */
export interface Validator {
  validate(filePath: string): Promise<ValidationOutcome>;
}

export interface ValidatorOptions {
  timeoutMs?: number;
}

/**
 * Builds the validator a worker uses. Throws ConfigurationError
 * when the executable cannot be used.
 */
export type ValidatorFactory = (
  validatorPath: string,
  options: ValidatorOptions,
) => Validator;

/**
 * Emitted by a worker after each file
 */
export interface ValidatedEvent {
  workerId: string;
  filePath: string;
  ok: boolean;
}

/**
 * Progress statistics for the pool
 */
export interface PoolProgress {
  queued: number;
  validated: number;
  failed: number;
}

/**
 * Options for individual workers
 */
export interface WorkerOptions {
  validatorPath: string;
  logger: Logger;
  timeoutMs?: number;
  createValidator?: ValidatorFactory;
  onValidated?: (event: ValidatedEvent) => void;
}

/**
 * Result from a worker run
 */
export interface WorkerResult {
  workerId: string;
  filesProcessed: number;
  filesFailed: number;
  failures: ReadonlyMap<string, string>;
}

/**
 * Options for the WorkerPool
 */
export interface WorkerPoolOptions {
  validatorPath: string;
  logger: Logger;
  timeoutMs?: number;
  createValidator?: ValidatorFactory;
  onProgress?: (progress: PoolProgress) => void;
}

/**
 * Options for the Coordinator
 */
export interface CoordinatorOptions {
  workers?: number;
  validatorPath?: string;
  rawExtensions?: readonly string[];
  timeoutMs?: number;
  logger?: Logger;
  signal?: AbortSignal;
  createValidator?: ValidatorFactory;
  onProgress?: (progress: PoolProgress) => void;
}

/**
 * Result from the Coordinator run
 */
export interface CoordinatorResult {
  success: boolean;
  cancelled: boolean;
  failures: FailureRecord;
  extensions: ExtensionCounts;
  filesQueued: number;
  filesValidated: number;
  workersUsed: number;
  duration: number;
}
