/**
 * Error reporting utilities for cxxmatrix.
 *
 * Turns compose exit codes and thrown errors into log output.
 */

import { CxxMatrixError } from "./errors.js";
import { log } from "./logger.js";

/** Known compose/process exit codes with their meanings and suggestions. */
export interface ExitCodeInfo {
  code: number;
  name: string;
  description: string;
  suggestion?: string;
  severity: "info" | "warn" | "error";
}

const EXIT_CODES: Record<number, ExitCodeInfo> = {
  0: {
    code: 0,
    name: "SUCCESS",
    description: "Build finished successfully",
    severity: "info",
  },
  1: {
    code: 1,
    name: "GENERAL_ERROR",
    description: "Build failed",
    suggestion: "Scroll up for the failing RUN step",
    severity: "error",
  },
  2: {
    code: 2,
    name: "MISUSE",
    description: "Compose rejected the command line",
    suggestion: "Check that the compose tool accepts --force-rm and --parallel",
    severity: "error",
  },
  127: {
    code: 127,
    name: "NOT_FOUND",
    description: "Command not found",
    suggestion: "Install docker-compose or pass --compose 'docker compose'",
    severity: "error",
  },
  130: {
    code: 130,
    name: "SIGINT",
    description: "Interrupted by Ctrl+C",
    severity: "info",
  },
  137: {
    code: 137,
    name: "OOM_KILLED",
    description: "Build was killed (OOM or manual stop)",
    suggestion: "Build fewer services at once (--os / --kind)",
    severity: "warn",
  },
  143: {
    code: 143,
    name: "SIGTERM",
    description: "Build terminated by signal",
    severity: "info",
  },
};

function getExitCodeInfo(code: number): ExitCodeInfo {
  return (
    EXIT_CODES[code] ?? {
      code,
      name: "UNKNOWN",
      description: `Unknown exit code ${code}`,
      severity: "warn" as const,
    }
  );
}

/** SIGINT (Ctrl+C) or SIGTERM. */
export function isUserTermination(code: number): boolean {
  return code === 130 || code === 143;
}

/** Log an exit code with appropriate styling and suggestions. */
export function logExitCode(code: number, context?: string): void {
  if (code === 0) {
    return;
  }

  const info = getExitCodeInfo(code);
  if (isUserTermination(code)) {
    log.dim(info.description);
    return;
  }

  const contextStr = context ? ` (${context})` : "";

  switch (info.severity) {
    case "error":
      log.error(`${info.description}${contextStr}`);
      break;
    case "warn":
      log.warn(`${info.description}${contextStr}`);
      break;
    default:
      log.dim(`${info.description}${contextStr}`);
  }

  if (info.suggestion) {
    log.dim(info.suggestion);
  }
}

/**
 * Log an error with context.
 *
 * cxxmatrix errors are expected failures and print as one line; anything
 * else also gets its stack trace at debug level.
 */
export function logError(error: unknown, operation: string): void {
  const message = error instanceof Error ? error.message : String(error);
  log.error(`Failed to ${operation}: ${message}`);

  if (error instanceof Error && !(error instanceof CxxMatrixError) && error.stack) {
    log.debug(error.stack);
  }
}
