#!/usr/bin/env node
/**
 * rawcheck CLI
 *
 * Checks every camera RAW file below a directory by running it through
 * an external decoder (LibRaw's dcraw_emu) and lists the files that fail
 * to decode.
 *
 * @module index
 * @license MIT
 */

// ============================================================================
// SECTION 1: IMPORTS
// ============================================================================

import { Command } from "commander";
import chalk from "chalk";
import fs from "fs";
import path from "path";
import { fileURLToPath } from "url";
import { PromptType } from "./src/types/enums.js";
import {
  DEFAULT_VALIDATOR_PATH,
  DEFAULT_WORKERS,
  RAW_EXTENSIONS,
  VALIDATOR_PATH_ENV,
} from "./src/types/constants.js";
import { ConfigurationError, isConfigurationError } from "./src/types/errors.js";
import { createLogger, type Logger } from "./src/utils/logger.js";
import { prompt } from "./src/utils/prompt.js";
import {
  addValidationProgressTask,
  closeProgressBars,
  formatProgressMessage,
  markTaskDone,
  updateValidationProgress,
} from "./src/utils/progress.js";
import {
  cleanupAfterPromptExit,
  parseExtensionList,
  parseTimeoutSeconds,
  parseWorkerCount,
  readPackageVersion,
  showConfiguration,
  showHeader,
  showReport,
  toTimeoutMs,
  type RunConfiguration,
} from "./src/utils/helpers.js";
import { Coordinator } from "./src/workers/index.js";

// ============================================================================
// SECTION 2: CONSTANTS & CONFIGURATION
// ============================================================================

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

/** Application version from package.json */
const VERSION = readPackageVersion(moduleDir);
const PROGRESS_TASK = "RAW files";

const defaultValidatorPath =
  process.env[VALIDATOR_PATH_ENV] || DEFAULT_VALIDATOR_PATH;

type CliOptions = {
  dir?: string;
  workers: string;
  dcrawBinary: string;
  rawExtensions: string;
  timeout: string;
  showExtensions: boolean;
  progress: boolean;
  verbose: boolean;
  interactive: boolean;
};

/** Commander.js program instance */
const program = new Command();

// ============================================================================
// SECTION 3: INTERACTIVE MODE
// ============================================================================

function isDirectory(value: string): boolean {
  try {
    return fs.statSync(value).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Interactive mode: prompts for every option, pre-filled from the flags.
 */
async function runInteractiveMode(
  options: CliOptions,
  logger: Logger,
): Promise<RunConfiguration> {
  const directory = await prompt({
    type: PromptType.Input,
    message: "Directory to check:",
    default: options.dir,
    validate: (value) =>
      isDirectory(value.trim()) || "Please enter an existing directory",
    logger,
    cleanup: cleanupAfterPromptExit,
  });

  const workers = await prompt({
    type: PromptType.Input,
    message: "Number of parallel workers:",
    default: options.workers,
    validate: (value) =>
      /^[1-9]\d*$/.test(value.trim()) || "Please enter a positive integer",
    logger,
    cleanup: cleanupAfterPromptExit,
  });

  const validatorPath = await prompt({
    type: PromptType.Input,
    message: "Path to the dcraw_emu decoder:",
    default: options.dcrawBinary,
    logger,
    cleanup: cleanupAfterPromptExit,
  });

  const showExtensions = await prompt({
    type: PromptType.Confirm,
    message: "Show a summary of file extensions?",
    default: options.showExtensions,
    logger,
    cleanup: cleanupAfterPromptExit,
  });

  return {
    directory: directory.trim(),
    workers: parseWorkerCount(workers),
    validatorPath: validatorPath.trim(),
    rawExtensions: parseExtensionList(options.rawExtensions),
    timeoutSeconds: parseTimeoutSeconds(options.timeout),
    showExtensions,
    showProgress: options.progress,
    verbose: options.verbose,
  };
}

function fromFlags(options: CliOptions): RunConfiguration {
  if (!options.dir) {
    throw new ConfigurationError("--dir is required");
  }

  return {
    directory: options.dir,
    workers: parseWorkerCount(options.workers),
    validatorPath: options.dcrawBinary,
    rawExtensions: parseExtensionList(options.rawExtensions),
    timeoutSeconds: parseTimeoutSeconds(options.timeout),
    showExtensions: options.showExtensions,
    showProgress: options.progress,
    verbose: options.verbose,
  };
}

// ============================================================================
// SECTION 4: MAIN APPLICATION
// ============================================================================

/**
 * Main application entry point. Resolves with the process exit code.
 */
async function main(): Promise<number> {
  program
    .name("rawcheck")
    .description("Check camera RAW files for decoding errors")
    .version(VERSION)
    .option("-d, --dir <path>", "Directory to check (required)")
    .option(
      "-w, --workers <number>",
      "Number of parallel workers",
      String(DEFAULT_WORKERS),
    )
    .option(
      "--dcraw-binary <path>",
      `Path to the dcraw_emu decoder (env: ${VALIDATOR_PATH_ENV})`,
      defaultValidatorPath,
    )
    .option(
      "-e, --raw-extensions <list>",
      "Comma-separated RAW file extensions",
      RAW_EXTENSIONS.join(","),
    )
    .option(
      "-t, --timeout <seconds>",
      "Give up on a single file after this many seconds (0 = never)",
      "0",
    )
    .option("--show-extensions", "Print a summary of file extensions", false)
    .option("--progress", "Show a progress bar", false)
    .option("-v, --verbose", "Show verbose debug output", false)
    .option(
      "-i, --interactive",
      "Interactive mode: prompt for all options (flags provided will be pre-filled)",
      false,
    )
    .configureHelp({
      sortSubcommands: true,
      helpWidth: 80,
    })
    .addHelpText(
      "after",
      `
    Examples:
    - Check a folder: rawcheck -d ~/Pictures
    - Use 8 workers: rawcheck -d ~/Pictures -w 8
    - Custom decoder: rawcheck -d ~/Pictures --dcraw-binary /opt/libraw/bin/dcraw_emu
    - Only Canon files: rawcheck -d ~/Pictures -e cr2,cr3,crw
    - Extension summary: rawcheck -d ~/Pictures --show-extensions
    - Interactive mode: rawcheck -i
      `,
    )
    .parse();

  const options = program.opts<CliOptions>();
  const logger = createLogger({ verbose: options.verbose });

  // -------------------------------------------------------------------------
  // Setup Signal Handlers for Graceful Interruption
  // -------------------------------------------------------------------------
  const controller = new AbortController();

  process.on("uncaughtException", (error) => {
    closeProgressBars();
    logger.error(error);
    process.exit(1);
  });

  process.on("unhandledRejection", (reason) => {
    closeProgressBars();
    logger.error(reason);
    process.exit(1);
  });

  process.on("SIGINT", () => {
    if (controller.signal.aborted) {
      // Second Ctrl+C: do not wait for running decoders
      closeProgressBars();
      process.exit(130);
    }

    closeProgressBars();
    logger.info(chalk.yellow("\n\n⚠ Interrupted by user (Ctrl+C)"));
    logger.info(chalk.gray("Waiting for running decoders to finish..."));
    controller.abort();
  });

  // -------------------------------------------------------------------------
  // Collect Configuration
  // -------------------------------------------------------------------------
  const isInteractiveMode =
    options.interactive || (!options.dir && process.stdin.isTTY === true);

  let config: RunConfiguration;
  if (isInteractiveMode) {
    showHeader(VERSION, logger);
    config = await runInteractiveMode(options, logger);
  } else {
    config = fromFlags(options);
  }

  showConfiguration(config, logger);

  // -------------------------------------------------------------------------
  // Execute Validation
  // -------------------------------------------------------------------------
  if (config.showProgress) {
    addValidationProgressTask(PROGRESS_TASK);
  }

  const coordinator = new Coordinator(config.directory, {
    workers: config.workers,
    validatorPath: config.validatorPath,
    rawExtensions: config.rawExtensions,
    timeoutMs: toTimeoutMs(config.timeoutSeconds),
    logger,
    signal: controller.signal,
    onProgress: config.showProgress
      ? (progress) => updateValidationProgress(PROGRESS_TASK, progress)
      : undefined,
  });

  try {
    const result = await coordinator.run();

    if (config.showProgress) {
      markTaskDone(
        PROGRESS_TASK,
        formatProgressMessage({
          queued: result.filesQueued,
          validated: result.filesValidated,
          failed: result.failures.size,
        }),
        result.success ? chalk.green : chalk.red,
      );
    }
    closeProgressBars();

    showReport(result, config.showExtensions, logger);
    return result.success ? 0 : 1;
  } finally {
    closeProgressBars();
  }
}

// ============================================================================
// SECTION 5: ERROR HANDLING
// ============================================================================

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((error: unknown) => {
    closeProgressBars();
    if (isConfigurationError(error)) {
      console.error(chalk.red(`Error: ${error.message}\n`));
    } else {
      console.error(chalk.red(error));
    }
    process.exit(1);
  });
