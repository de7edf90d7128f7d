import fs from "fs";
import os from "os";
import path from "path";
import type { ValidationOutcome, Validator } from "../../src/workers/types.js";

export const PASS: ValidationOutcome = { ok: true, diagnostic: "", exitCode: 0 };

export function makeTempDir(prefix = "rawcheck-"): string {
  return fs.mkdtempSync(path.join(os.tmpdir(), prefix));
}

export function removeDir(directory: string): void {
  fs.rmSync(directory, { recursive: true, force: true });
}

/**
 * Create empty files (and their parent directories) below `root`
 */
export function makeTree(root: string, files: string[]): void {
  for (const file of files) {
    const filePath = path.join(root, file);
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(filePath, "raw");
  }
}

/**
 * Write an executable shell script that mimics dcraw_emu:
 * - files named *bad* print "<path>: corrupt header" and exit 1
 * - files named *warn* print "<path>: unexpected end of file" and exit 0
 * - files named *silent* exit 3 without output
 * - files named *slow* sleep for five seconds
 * - anything else passes
 */
export function writeFakeDecoder(directory: string): string {
  const script = [
    "#!/bin/sh",
    'if [ "$1" != "-Z" ] || [ "$2" != "-" ]; then',
    '  echo "unexpected arguments: $*" >&2',
    "  exit 2",
    "fi",
    'name=$(basename "$3")',
    'case "$name" in',
    '  *bad*) echo "$3: corrupt header" >&2; exit 1 ;;',
    '  *warn*) echo "$3: unexpected end of file" >&2; exit 0 ;;',
    "  *silent*) exit 3 ;;",
    "  *slow*) exec sleep 5 ;;",
    "esac",
    "exit 0",
    "",
  ].join("\n");
  const scriptPath = path.join(directory, "dcraw_emu");
  fs.writeFileSync(scriptPath, script, { mode: 0o755 });
  return scriptPath;
}

/**
 * Validator stand-in keyed by file name. Unknown files pass.
 */
export class FakeValidator implements Validator {
  readonly calls: string[] = [];
  private outcomes: Record<string, ValidationOutcome | Error>;
  private onValidate?: (filePath: string) => void;

  constructor(
    outcomes: Record<string, ValidationOutcome | Error> = {},
    onValidate?: (filePath: string) => void,
  ) {
    this.outcomes = outcomes;
    this.onValidate = onValidate;
  }

  async validate(filePath: string): Promise<ValidationOutcome> {
    this.calls.push(filePath);
    this.onValidate?.(filePath);
    await tick();
    const outcome = this.outcomes[path.basename(filePath)];
    if (outcome instanceof Error) {
      throw outcome;
    }
    return outcome ?? PASS;
  }
}

/**
 * Validator that holds every call until `release` is called
 */
export class GatedValidator implements Validator {
  readonly calls: string[] = [];
  private opened = false;
  private waiting: Array<() => void> = [];

  async validate(filePath: string): Promise<ValidationOutcome> {
    this.calls.push(filePath);
    if (!this.opened) {
      await new Promise<void>((resolve) => this.waiting.push(resolve));
    }
    return PASS;
  }

  release(): void {
    this.opened = true;
    const waiting = this.waiting;
    this.waiting = [];
    for (const resolve of waiting) {
      resolve();
    }
  }
}

export function tick(): Promise<void> {
  return new Promise((resolve) => setImmediate(resolve));
}

export async function waitFor(condition: () => boolean, maxTicks = 10_000): Promise<void> {
  for (let i = 0; i < maxTicks; i++) {
    if (condition()) return;
    await tick();
  }
  throw new Error("Condition not met in time");
}

export async function captureError(promise: Promise<unknown>): Promise<unknown> {
  try {
    await promise;
  } catch (error) {
    return error;
  }
  throw new Error("Expected the promise to reject");
}
