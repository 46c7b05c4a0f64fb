/**
 * List commands: show targets and build batches without touching disk.
 */

import { batchLabel, planBatches } from "../build.js";
import { imageTag } from "../compose.js";
import { log, style } from "../logger.js";
import { baseImage, targetName } from "../matrix.js";
import type { RunContext } from "./context.js";

export function listTargets(ctx: RunContext): void {
  for (const target of ctx.targets) {
    log.raw(`  ${style.cyan(targetName(target))}`);
    log.dim(`    ${baseImage(target)} -> ${imageTag(target, ctx.settings.repo)}`);
  }
  log.newline();
  log.dim(`${ctx.targets.length} target(s)`);
}

export function listBatches(ctx: RunContext): void {
  const batches = planBatches(ctx.targets);
  for (const [index, batch] of batches.entries()) {
    log.raw(`${style.bold(`${index + 1}.`)} ${style.cyan(batchLabel(batch))}`);
    log.dim(`    ${batch.services.join(" ")}`);
  }
}
