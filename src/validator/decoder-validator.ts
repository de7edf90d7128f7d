import { spawn } from "child_process";
import fs from "fs";
import { MAX_TIMEOUT_MS } from "../types/constants.js";
import { ConfigurationError } from "../types/errors.js";
import type {
  ValidationOutcome,
  Validator,
  ValidatorOptions,
} from "../workers/types.js";
import { cleanDiagnostic } from "./helpers.js";

/**
 * Make sure the decoder exists and can be executed.
 * Throws ConfigurationError otherwise.
 */
export function assertExecutable(executablePath: string): void {
  let stats: fs.Stats;
  try {
    stats = fs.statSync(executablePath);
  } catch {
    throw new ConfigurationError(`Executable '${executablePath}' not found`);
  }

  if (!stats.isFile()) {
    throw new ConfigurationError(`Executable '${executablePath}' not found`);
  }

  try {
    fs.accessSync(executablePath, fs.constants.X_OK);
  } catch {
    throw new ConfigurationError(
      `File '${executablePath}' is not executable`,
    );
  }
}

/**
 * Decoder Validator
 *
 * Runs a dcraw-compatible decoder (`dcraw_emu` by default) against one
 * file with `-Z -`, so the decoded image goes to stdout and is thrown
 * away. A file passes when the decoder exits 0 and prints nothing on
 * stderr besides an echo of the file name.
 */
export class DecoderValidator implements Validator {
  private executablePath: string;
  private timeoutMs: number;

  constructor(executablePath: string, options: ValidatorOptions = {}) {
    const timeoutMs = options.timeoutMs ?? 0;
    if (!Number.isInteger(timeoutMs) || timeoutMs < 0 || timeoutMs > MAX_TIMEOUT_MS) {
      throw new ConfigurationError(
        `Timeout must be a whole number of milliseconds between 0 and ${MAX_TIMEOUT_MS}, got ${timeoutMs}`,
      );
    }
    assertExecutable(executablePath);
    this.executablePath = executablePath;
    this.timeoutMs = timeoutMs;
  }

  validate(filePath: string): Promise<ValidationOutcome> {
    return new Promise((resolve) => {
      const child = spawn(this.executablePath, ["-Z", "-", filePath], {
        stdio: ["ignore", "ignore", "pipe"],
        timeout: this.timeoutMs > 0 ? this.timeoutMs : undefined,
      });

      const chunks: Buffer[] = [];
      let settled = false;

      child.stderr.on("data", (data: Buffer) => {
        chunks.push(data);
      });

      child.on("error", (error) => {
        if (settled) return;
        settled = true;
        resolve({ ok: false, diagnostic: error.message, exitCode: null });
      });

      child.on("close", (code, signal) => {
        if (settled) return;
        settled = true;

        const stderr = Buffer.concat(chunks).toString("utf-8");
        let diagnostic = cleanDiagnostic(stderr, filePath);
        if (code === null && diagnostic === "") {
          diagnostic = `terminated by ${signal ?? "signal"}`;
        }

        resolve({
          ok: code === 0 && diagnostic === "",
          diagnostic,
          exitCode: code,
        });
      });
    });
  }
}

export function createDecoderValidator(
  executablePath: string,
  options: ValidatorOptions,
): Validator {
  return new DecoderValidator(executablePath, options);
}
