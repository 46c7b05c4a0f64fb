/**
 * cxxmatrix - Generate and build the C++ CI toolkit image matrix.
 *
 * Library entry point; the CLI lives in cli.ts.
 */

export { VERSION, DEFAULT_REPO, REPO_ENV_VAR } from "./constants.js";
export { loadCatalog, parseCatalog, type Catalog, type OsCatalog, type NvhpcPair } from "./catalog.js";
export {
  enumerateTargets,
  enumerateOsTargets,
  filterTargets,
  targetName,
  dockerfileName,
  baseImage,
  type BuildTarget,
  type CompilerSet,
  type TargetKind,
} from "./matrix.js";
export { AlternativesList, type Alternative } from "./alternatives.js";
export { generateDockerfile, generateCompilerBlock, type DockerfileSpec } from "./dockerfile-gen.js";
export { renderComposeManifest, renderComposeService, imageTag } from "./compose.js";
export { writeArtifacts, generateTargetDockerfile, type GenerateOptions, type GenerateResult } from "./generator.js";
export { planBatches, runBatches, type Batch, type BuildReport } from "./build.js";
export { ComposeRunner, DryRunRunner } from "./docker/compose-runner.js";
export type { BatchRunner, BatchRequest, BatchResult } from "./interfaces/batch-runner.js";
export { resolveSettings, loadSettings, type Settings } from "./config.js";
export {
  CxxMatrixError,
  ConfigError,
  ValidationError,
  ArtifactWriteError,
  DockerError,
  DockerNotFoundError,
  BatchBuildError,
} from "./errors.js";
