/**
 * Base class for errors raised by rawcheck itself
 */
export class RawCheckError extends Error {
  constructor(message: string) {
    super(message);
    this.name = new.target.name;
  }
}

/**
 * Invalid root directory, validator executable or option value.
 * Fatal: the run stops before any file is validated.
 */
export class ConfigurationError extends RawCheckError {}

/**
 * Raised when an item is pushed onto a queue that was already marked complete
 */
export class QueueClosedError extends RawCheckError {}

export function isConfigurationError(
  error: unknown,
): error is ConfigurationError {
  return error instanceof ConfigurationError;
}
