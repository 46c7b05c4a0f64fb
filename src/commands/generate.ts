/**
 * Generate command: write Dockerfiles and the compose manifest.
 */

import { writeArtifacts, type GenerateResult } from "../generator.js";
import { log } from "../logger.js";
import type { RunContext } from "./context.js";

export function generate(ctx: RunContext): GenerateResult {
  const { settings, allTargets, targets } = ctx;
  log.bold(`Generating ${targets.length} Dockerfile(s) in ${settings.outDir}...`);

  // Filters narrow the Dockerfiles written, never the manifest
  const result = writeArtifacts(targets, {
    outDir: settings.outDir,
    repo: settings.repo,
    manifestTargets: allTargets,
  });

  log.success(`Wrote ${result.dockerfiles.length} Dockerfile(s) and ${result.composeFile}`);
  return result;
}
