/**
 * Build driver for cxxmatrix.
 *
 * Groups targets into batches (per OS, then by kind: main, clang, gcc,
 * cuda, nvhpc) and runs one compose invocation per batch, in sequence.
 *
 * Failure policy:
 *   abort    - stop at the first failed batch, later batches are skipped (default)
 *   continue - run every batch and report all failures at the end
 * A missing compose executable is fatal under either policy.
 */

import { logExitCode } from "./error-handler.js";
import { BatchBuildError } from "./errors.js";
import type { BatchRunner } from "./interfaces/batch-runner.js";
import { log } from "./logger.js";
import { KIND_ORDER, osName, targetName, type BuildTarget, type TargetKind } from "./matrix.js";
import type { FailurePolicy } from "./validation.js";

export interface Batch {
  osVersion: string;
  kind: TargetKind;
  /** Compose service names, in enumeration order. */
  services: string[];
}

export interface BuildOptions {
  policy: FailurePolicy;
  /** Directory holding docker-compose.yml. */
  workDir: string;
}

export interface BatchFailure {
  batch: Batch;
  exitCode: number;
  error?: string;
}

export interface BuildReport {
  succeeded: Batch[];
  failed: BatchFailure[];
  /** Batches never started because an earlier one failed under "abort". */
  skipped: Batch[];
}

export function batchLabel(batch: Batch): string {
  return `${batch.kind} ${osName(batch.osVersion)}`;
}

/**
 * Group targets into build batches.
 *
 * OS versions keep their first-seen order. Empty batches are dropped: compose
 * builds every service when given none.
 */
export function planBatches(targets: readonly BuildTarget[]): Batch[] {
  const byOs = new Map<string, Map<TargetKind, string[]>>();

  for (const target of targets) {
    let byKind = byOs.get(target.osVersion);
    if (!byKind) {
      byKind = new Map<TargetKind, string[]>();
      byOs.set(target.osVersion, byKind);
    }
    const services = byKind.get(target.kind) ?? [];
    services.push(targetName(target));
    byKind.set(target.kind, services);
  }

  const batches: Batch[] = [];
  for (const [osVersion, byKind] of byOs) {
    for (const kind of KIND_ORDER) {
      const services = byKind.get(kind);
      if (services && services.length > 0) {
        batches.push({ osVersion, kind, services });
      }
    }
  }
  return batches;
}

/**
 * Run batches one after another.
 *
 * Runner errors (e.g. DockerNotFoundError) propagate immediately.
 */
export async function runBatches(
  batches: readonly Batch[],
  runner: BatchRunner,
  options: BuildOptions
): Promise<BuildReport> {
  const report: BuildReport = { succeeded: [], failed: [], skipped: [] };
  let aborted = false;

  for (const [index, batch] of batches.entries()) {
    if (aborted) {
      report.skipped.push(batch);
      continue;
    }

    const label = batchLabel(batch);
    log.bold(`[${index + 1}/${batches.length}] Building ${label} (${batch.services.length} service(s))...`);

    const result = await runner.run({ label, services: batch.services, workDir: options.workDir });

    if (result.success) {
      log.success(`Built ${label}`);
      report.succeeded.push(batch);
      continue;
    }

    const failure: BatchFailure = { batch, exitCode: result.exitCode };
    if (result.error !== undefined) {failure.error = result.error;}
    report.failed.push(failure);
    logExitCode(result.exitCode, label);

    if (options.policy === "abort") {
      aborted = true;
      const remaining = batches.length - index - 1;
      if (remaining > 0) {
        log.warn(`Aborting build: ${remaining} remaining batch(es) skipped`);
      }
    }
  }

  return report;
}

export function logBuildReport(report: BuildReport): void {
  log.newline();
  if (report.failed.length === 0 && report.skipped.length === 0) {
    log.success(`All ${report.succeeded.length} batch(es) built`);
    return;
  }

  log.bold("Build summary");
  log.dim(`Succeeded: ${report.succeeded.length}`);
  for (const { batch, exitCode, error } of report.failed) {
    log.error(`Failed: ${batchLabel(batch)} (exit ${exitCode})`);
    if (error) {
      log.dim(`  ${error}`);
    }
  }
  for (const batch of report.skipped) {
    log.yellow(`Skipped: ${batchLabel(batch)}`);
  }
}

/** @throws BatchBuildError when any batch failed. */
export function assertBuildSucceeded(report: BuildReport): void {
  if (report.failed.length > 0) {
    throw new BatchBuildError(report.failed.map(({ batch }) => batchLabel(batch)));
  }
}
