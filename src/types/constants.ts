/** Extensions (lowercase, no dot) handed to the validator */
export const RAW_EXTENSIONS: readonly string[] = [
  "crw",
  "cr2",
  "cr3",
  "rw2",
  "dng",
  "raf",
];

/** LibRaw's dcraw emulator, as installed by most distributions */
export const DEFAULT_VALIDATOR_PATH = "/usr/bin/dcraw_emu";

/** Environment override for the validator executable */
export const VALIDATOR_PATH_ENV = "RAWCHECK_DCRAW_BINARY";

export const DEFAULT_WORKERS = 1;

/** Largest timeout Node's timers accept without clamping to 1 ms */
export const MAX_TIMEOUT_MS = 2 ** 31 - 1;

export const MAX_TIMEOUT_SECONDS = Math.floor(MAX_TIMEOUT_MS / 1000);
