/**
 * Unified exception hierarchy for cxxmatrix.
 *
 * All custom exceptions inherit from CxxMatrixError so the CLI can turn
 * them into one-line messages instead of stack traces.
 *
 * Dependency direction:
 *   This module has NO internal dependencies (leaf module).
 *   It may be imported by: all other cxxmatrix modules.
 */

/** Base exception for all cxxmatrix errors. */
export class CxxMatrixError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "CxxMatrixError";
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Configuration-related errors.
 *
 * Examples:
 *   - Catalog file missing or not valid JSON
 *   - OS entry without any compiler family
 *   - Compiler block requested with no compilers
 */
export class ConfigError extends CxxMatrixError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Input validation errors.
 *
 * Examples:
 *   - Unknown failure policy or target kind on the command line
 *   - Image repository that is not a valid reference
 */
export class ValidationError extends CxxMatrixError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** Raised when a Dockerfile or the compose manifest cannot be written. */
export class ArtifactWriteError extends CxxMatrixError {
  readonly path: string;

  constructor(path: string, cause: string) {
    super(`Failed to write ${path}: ${cause}`);
    this.name = "ArtifactWriteError";
    this.path = path;
  }
}

/**
 * Docker operation errors.
 *
 * Base class for all errors raised while talking to the compose tool.
 */
export class DockerError extends CxxMatrixError {
  constructor(message: string) {
    super(message);
    this.name = "DockerError";
  }
}

/** Raised when the compose executable is not installed or not in PATH. */
export class DockerNotFoundError extends DockerError {
  constructor(message = "Compose executable not found in PATH") {
    super(message);
    this.name = "DockerNotFoundError";
  }
}

/** Raised when one or more build batches failed. */
export class BatchBuildError extends DockerError {
  readonly failedBatches: string[];

  constructor(failedBatches: string[]) {
    super(`${failedBatches.length} batch(es) failed: ${failedBatches.join(", ")}`);
    this.name = "BatchBuildError";
    this.failedBatches = failedBatches;
  }
}

/**
 * Extract error details from an unknown error for user-friendly messages.
 *
 * Handles execa-style errors (shortMessage), plus standard Error objects.
 * Compose output is streamed to the terminal, so there is no stderr to quote.
 * Truncates output to maxLength to avoid overwhelming log output.
 */
export function extractErrorDetails(error: unknown, maxLength = 1000): string {
  if (!(error instanceof Error)) {
    return String(error).slice(0, maxLength);
  }

  if ("shortMessage" in error && typeof error.shortMessage === "string" && error.shortMessage) {
    return error.shortMessage.slice(0, maxLength);
  }
  return error.message.slice(0, maxLength);
}
