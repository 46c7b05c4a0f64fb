/**
 * Build command: run the compose batches for the selected targets.
 */

import { existsSync } from "node:fs";
import { join } from "node:path";

import {
  assertBuildSucceeded,
  logBuildReport,
  planBatches,
  runBatches,
  type BuildReport,
} from "../build.js";
import { COMPOSE_FILE } from "../constants.js";
import { ComposeRunner, DryRunRunner } from "../docker/compose-runner.js";
import { ConfigError } from "../errors.js";
import type { BatchRunner } from "../interfaces/batch-runner.js";
import { log } from "../logger.js";
import { dockerfileName } from "../matrix.js";
import type { RunContext } from "./context.js";

export interface BuildCommandOptions {
  dryRun?: boolean;
  /** Overrides the runner chosen from dryRun (tests). */
  runner?: BatchRunner;
}

/**
 * Build every batch and report the outcome.
 *
 * @throws ConfigError if the compose manifest or a selected Dockerfile has not been generated.
 * @throws BatchBuildError if any batch failed.
 */
export async function build(ctx: RunContext, options: BuildCommandOptions = {}): Promise<BuildReport> {
  const { settings, targets } = ctx;
  const composePath = join(settings.outDir, COMPOSE_FILE);
  if (!options.dryRun && !existsSync(composePath)) {
    throw new ConfigError(`${composePath} not found. Run 'cxxmatrix generate' first.`);
  }
  if (!options.dryRun) {
    const missing = targets.map(dockerfileName).filter((name) => !existsSync(join(settings.outDir, name)));
    if (missing.length > 0) {
      throw new ConfigError(
        `${missing.length} Dockerfile(s) missing from ${settings.outDir} (${missing.join(", ")}). ` +
          "Run 'cxxmatrix generate' for these targets first."
      );
    }
  }

  const runner =
    options.runner ??
    (options.dryRun ? new DryRunRunner(settings.composeCommand) : new ComposeRunner(settings.composeCommand));

  const batches = planBatches(targets);
  log.bold(`Building ${targets.length} image(s) in ${batches.length} batch(es) (policy: ${settings.failurePolicy})`);

  const report = await runBatches(batches, runner, {
    policy: settings.failurePolicy,
    workDir: settings.outDir,
  });

  logBuildReport(report);
  assertBuildSucceeded(report);
  return report;
}
