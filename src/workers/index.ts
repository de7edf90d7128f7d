/**
 * Parallel Validation Module
 *
 * Producer-Consumer Pipeline for validating RAW files.
 *
 * Usage:
 *   import { Coordinator } from "./src/workers/index.js";
 *
 *   const coordinator = new Coordinator("./photos", {
 *     workers: 4,
 *     validatorPath: "/usr/bin/dcraw_emu",
 *   });
 *
 *   const result = await coordinator.run();
 */

// Main classes
export { Coordinator, mergeFailures } from "./coordinator.js";
export { WorkerPool } from "./worker-pool.js";
export { TaskQueue } from "./task-queue.js";
export { Worker } from "./worker.js";

// Types
export type {
  WorkItem,
  FailureRecord,
  ExtensionCounts,
  QueueStats,
  ValidationOutcome,
  Validator,
  ValidatorOptions,
  ValidatorFactory,
  ValidatedEvent,
  PoolProgress,
  CoordinatorOptions,
  CoordinatorResult,
  WorkerPoolOptions,
  WorkerOptions,
  WorkerResult,
} from "./types.js";
