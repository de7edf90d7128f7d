import chalk from "chalk";
import fs from "fs";
import path from "path";
import { MAX_TIMEOUT_SECONDS } from "../types/constants.js";
import { ConfigurationError } from "../types/errors.js";
import type {
  CoordinatorResult,
  ExtensionCounts,
  FailureRecord,
} from "../workers/types.js";
import { getAsciiArt } from "./ascii.js";
import type { Logger } from "./logger.js";
import { closeProgressBars } from "./progress.js";

export interface RunConfiguration {
  directory: string;
  workers: number;
  validatorPath: string;
  rawExtensions: readonly string[];
  timeoutSeconds: number;
  showExtensions: boolean;
  showProgress: boolean;
  verbose: boolean;
}

/**
 * Walk up from `startDirectory` to the nearest package.json and return its version
 */
export function readPackageVersion(startDirectory: string): string {
  let directory = startDirectory;
  while (true) {
    const candidate = path.join(directory, "package.json");
    if (fs.existsSync(candidate)) {
      const packageJson: unknown = JSON.parse(fs.readFileSync(candidate, "utf-8"));
      if (
        typeof packageJson === "object" &&
        packageJson !== null &&
        "version" in packageJson &&
        typeof packageJson.version === "string"
      ) {
        return packageJson.version;
      }
      return "0.0.0";
    }
    const parent = path.dirname(directory);
    if (parent === directory) {
      return "0.0.0";
    }
    directory = parent;
  }
}

export function parseWorkerCount(value: string): number {
  const workers = Number(value);
  if (!/^\d+$/.test(value.trim()) || !Number.isInteger(workers) || workers < 1) {
    throw new ConfigurationError(
      `--workers must be a positive integer, got '${value}'`,
    );
  }
  return workers;
}

export function parseTimeoutSeconds(value: string): number {
  const seconds = Number(value);
  if (value.trim() === "" || !Number.isFinite(seconds) || seconds < 0) {
    throw new ConfigurationError(
      `--timeout must be a non-negative number of seconds, got '${value}'`,
    );
  }
  if (seconds > MAX_TIMEOUT_SECONDS) {
    throw new ConfigurationError(
      `--timeout must be at most ${MAX_TIMEOUT_SECONDS} seconds, got '${value}'`,
    );
  }
  return seconds;
}

/**
 * Seconds to whole milliseconds, rounded up so a positive timeout stays positive
 */
export function toTimeoutMs(seconds: number): number {
  return Math.ceil(seconds * 1000);
}

export function parseExtensionList(value: string): string[] {
  const extensions = value
    .split(",")
    .map((extension) => extension.trim().replace(/^\./, "").toLowerCase())
    .filter((extension) => extension.length > 0);
  if (extensions.length === 0) {
    throw new ConfigurationError("--raw-extensions must name at least one extension");
  }
  return extensions;
}

/**
 * "File Extensions:" block, one line per extension in name order
 */
export function formatExtensionSummary(extensions: ExtensionCounts): string[] {
  const lines = ["File Extensions:"];
  const names = [...extensions.keys()].sort();
  for (const name of names) {
    lines.push(`  ${name === "" ? "(none)" : name}: ${extensions.get(name) ?? 0}`);
  }
  return lines;
}

/**
 * "Failed:" block, one line per failed path in path order
 */
export function formatFailures(failures: FailureRecord): string[] {
  const lines = ["Failed:"];
  const paths = [...failures.keys()].sort();
  for (const filePath of paths) {
    lines.push(`  ${filePath}: ${failures.get(filePath) ?? ""}`);
  }
  return lines;
}

export function showHeader(version: string, logger: Logger): void {
  logger.info(chalk.cyan(getAsciiArt("RAWCHECK", logger)));
  logger.info(chalk.cyan.bold(`RAW image integrity checker (Version ${version})\n`));
}

export function showConfiguration(config: RunConfiguration, logger: Logger): void {
  logger.debug(chalk.cyan("\nConfiguration:"));
  logger.debug(chalk.white(`  Directory: ${config.directory}`));
  logger.debug(chalk.white(`  Workers: ${config.workers}`));
  logger.debug(chalk.white(`  Decoder: ${config.validatorPath}`));
  logger.debug(chalk.white(`  RAW extensions: ${config.rawExtensions.join(", ")}`));
  logger.debug(
    chalk.white(
      `  Timeout: ${config.timeoutSeconds > 0 ? `${config.timeoutSeconds}s` : "none"}`,
    ),
  );
  logger.debug(chalk.white(`  Verbose: ${config.verbose ? "Yes" : "No"}\n`));
}

export function showReport(
  result: CoordinatorResult,
  showExtensions: boolean,
  logger: Logger,
): void {
  if (showExtensions) {
    const [title, ...rows] = formatExtensionSummary(result.extensions);
    logger.info(chalk.cyan(title));
    for (const row of rows) {
      logger.info(chalk.white(row));
    }
    logger.info("");
  }

  if (result.cancelled) {
    logger.info(chalk.yellow("Check cancelled before all files were validated"));
    return;
  }

  if (result.failures.size > 0) {
    const [title, ...rows] = formatFailures(result.failures);
    logger.info(chalk.red(title));
    for (const row of rows) {
      logger.info(chalk.red(row));
    }
    logger.info("");
  }

  logger.debug(
    chalk.gray(
      `Validated ${result.filesValidated}/${result.filesQueued} files with ${result.workersUsed} workers in ${formatDuration(result.duration)}`,
    ),
  );
}

export function cleanupAfterPromptExit(): void {
  closeProgressBars();
}

/**
 * Format duration for display
 */
export function formatDuration(ms: number): string {
  const seconds = Math.floor(ms / 1000);
  const minutes = Math.floor(seconds / 60);
  const hours = Math.floor(minutes / 60);

  if (hours > 0) {
    return `${hours}h ${minutes % 60}m ${seconds % 60}s`;
  } else if (minutes > 0) {
    return `${minutes}m ${seconds % 60}s`;
  } else {
    return `${seconds}s`;
  }
}
