/**
 * Compose build execution.
 *
 * Each batch is one `<compose> build --force-rm --parallel <services...>`
 * call with BuildKit enabled; parallelism inside the batch is left to the
 * compose tool.
 */

import { execa, ExecaError } from "execa";

import { COMPOSE_BUILD_FLAGS, DEFAULT_COMPOSE_COMMAND } from "../constants.js";
import { DockerNotFoundError, ValidationError, extractErrorDetails } from "../errors.js";
import type { BatchRequest, BatchResult, BatchRunner } from "../interfaces/batch-runner.js";
import { log } from "../logger.js";

/** Environment added on top of the inherited one for every build. */
export const BUILD_ENV = { DOCKER_BUILDKIT: "1" } as const;

/**
 * Split a compose command ("docker-compose" or "docker compose") into the
 * executable and its leading arguments.
 *
 * @throws ValidationError on an empty command.
 */
export function parseComposeCommand(command: string): { file: string; args: string[] } {
  const [file, ...args] = command.trim().split(/\s+/).filter(Boolean);
  if (!file) {
    throw new ValidationError("Compose command must not be empty");
  }
  return { file, args };
}

export function buildComposeArgs(services: readonly string[]): string[] {
  return ["build", ...COMPOSE_BUILD_FLAGS, ...services];
}

/** Shell-style rendering of a batch invocation, for logs and dry runs. */
export function formatComposeCommand(command: string, services: readonly string[]): string {
  const { file, args } = parseComposeCommand(command);
  const env = Object.entries(BUILD_ENV).map(([k, v]) => `${k}=${v}`);
  return [...env, file, ...args, ...buildComposeArgs(services)].join(" ");
}

function isCommandNotFound(error: unknown): boolean {
  return typeof error === "object" && error !== null && "code" in error && error.code === "ENOENT";
}

/** Runs batches through the real compose tool, output streamed to the terminal. */
export class ComposeRunner implements BatchRunner {
  constructor(private readonly command: string = DEFAULT_COMPOSE_COMMAND) {}

  async run(request: BatchRequest): Promise<BatchResult> {
    const { file, args } = parseComposeCommand(this.command);
    log.cyan(formatComposeCommand(this.command, request.services));

    try {
      await execa(file, [...args, ...buildComposeArgs(request.services)], {
        cwd: request.workDir,
        env: BUILD_ENV,
        stdio: "inherit",
      });
      return { success: true, exitCode: 0 };
    } catch (error: unknown) {
      if (isCommandNotFound(error)) {
        throw new DockerNotFoundError(`Compose executable '${file}' not found in PATH`);
      }
      const exitCode = error instanceof ExecaError && error.exitCode !== undefined ? error.exitCode : 1;
      return { success: false, exitCode, error: extractErrorDetails(error) };
    }
  }
}

/** Prints the commands a real run would execute. */
export class DryRunRunner implements BatchRunner {
  constructor(private readonly command: string = DEFAULT_COMPOSE_COMMAND) {}

  async run(request: BatchRequest): Promise<BatchResult> {
    log.raw(formatComposeCommand(this.command, request.services));
    return { success: true, exitCode: 0 };
  }
}
