import { MultiProgressBars } from "multi-progress-bars";
import chalk from "chalk";
import type { PoolProgress } from "../workers/types.js";

// Progress bar manager singleton
let mpb: MultiProgressBars | null = null;

/**
 * Initialize the progress bar manager
 */
export function initProgressBars(): MultiProgressBars {
  if (!mpb) {
    mpb = new MultiProgressBars({
      anchor: "bottom",
      persist: true,
      border: true,
      initMessage: " Validation Progress ",
    });
  }
  return mpb;
}

/**
 * Close and cleanup progress bars
 */
export function closeProgressBars(): void {
  if (mpb) {
    mpb.close();
    mpb = null;
  }
}

/**
 * Add the validation progress task (Green)
 */
export function addValidationProgressTask(taskName: string): void {
  const bars = initProgressBars();
  bars.addTask(taskName, {
    type: "percentage",
    barTransformFn: chalk.green,
    nameTransformFn: chalk.green.bold,
    message: "0/0 files",
  });
}

export function formatProgressMessage(progress: PoolProgress): string {
  const failed = progress.failed > 0 ? `, ${progress.failed} failed` : "";
  return `${progress.validated}/${progress.queued} files${failed}`;
}

/**
 * Update validation progress. The total grows while the tree is walked.
 */
export function updateValidationProgress(
  taskName: string,
  progress: PoolProgress,
): void {
  if (!mpb) return;
  const percentage =
    progress.queued > 0 ? progress.validated / progress.queued : 0;
  mpb.updateTask(taskName, {
    percentage,
    message: formatProgressMessage(progress),
  });
}

/**
 * Mark a task as done
 */
export function markTaskDone(
  taskName: string,
  message?: string,
  colorFn?: (text: string) => string,
): void {
  if (!mpb) return;
  mpb.done(taskName, {
    message: message || "Complete",
    barTransformFn: colorFn || chalk.gray,
  });
}
