/**
 * Artifact generation for cxxmatrix.
 *
 * Writes one Dockerfile per build target plus the compose manifest into the
 * output directory. Files are rewritten wholesale on every run; names are
 * derived from the target so no two writes touch the same file.
 */

import { existsSync, mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";

import { renderComposeManifest } from "./compose.js";
import { COMPOSE_FILE, ENTRYPOINT_FILE } from "./constants.js";
import { generateDockerfile } from "./dockerfile-gen.js";
import { ArtifactWriteError } from "./errors.js";
import { log } from "./logger.js";
import {
  baseImage,
  dockerfileName,
  targetCompilers,
  targetExtraPackages,
  type BuildTarget,
} from "./matrix.js";

export interface GenerateOptions {
  outDir: string;
  /** Image repository root used for compose image tags. */
  repo: string;
  /** Services listed in the compose manifest. Defaults to the written targets. */
  manifestTargets?: readonly BuildTarget[];
}

export interface GenerateResult {
  dockerfiles: string[];
  composeFile: string;
}

/** Dockerfile content for a target. */
export function generateTargetDockerfile(target: BuildTarget): string {
  return generateDockerfile({
    baseImage: baseImage(target),
    compilers: targetCompilers(target),
    extraPackages: targetExtraPackages(target),
  });
}

function writeArtifact(path: string, content: string): void {
  try {
    // Unix line endings regardless of host
    writeFileSync(path, content, { encoding: "utf-8" });
  } catch (e) {
    throw new ArtifactWriteError(path, e instanceof Error ? e.message : String(e));
  }
}

/**
 * Write the Dockerfiles for `targets` and the compose manifest.
 *
 * The first failed write aborts the run.
 *
 * @throws ArtifactWriteError if the directory or any file cannot be written.
 */
export function writeArtifacts(targets: readonly BuildTarget[], options: GenerateOptions): GenerateResult {
  const { outDir, repo, manifestTargets = targets } = options;

  try {
    mkdirSync(outDir, { recursive: true });
  } catch (e) {
    throw new ArtifactWriteError(outDir, e instanceof Error ? e.message : String(e));
  }

  const dockerfiles: string[] = [];
  for (const target of targets) {
    const path = join(outDir, dockerfileName(target));
    writeArtifact(path, generateTargetDockerfile(target));
    log.debug(`Wrote ${path}`);
    dockerfiles.push(path);
  }

  const composeFile = join(outDir, COMPOSE_FILE);
  writeArtifact(composeFile, renderComposeManifest(manifestTargets, repo));
  log.debug(`Wrote ${composeFile}`);

  if (!existsSync(join(outDir, ENTRYPOINT_FILE))) {
    log.warn(`${ENTRYPOINT_FILE} not found in ${outDir}; every Dockerfile copies it into the image`);
  }

  return { dockerfiles, composeFile };
}
