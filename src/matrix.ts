/**
 * Build matrix enumeration for cxxmatrix.
 *
 * Expands the catalog into build targets: one primary image per OS, one
 * image per clang and gcc version, and gcc images on top of the CUDA and
 * NVHPC base images.
 *
 * Dependency direction:
 *   This module imports from: catalog.ts, constants.ts, validation.ts
 *   It should NOT import from: generator, build, cli
 */

import { latestVersion, type Catalog, type OsCatalog } from "./catalog.js";
import { DOCKERFILE_PREFIX, OS_DISTRO } from "./constants.js";
import type { TargetKind } from "./validation.js";

export type { TargetKind } from "./validation.js";

/** Compilers installed into one image. At least one must be set. */
export interface CompilerSet {
  clang?: string;
  gcc?: string;
}

interface TargetBase {
  osVersion: string;
}

/** Primary image: latest compilers of each family plus analysis tools. */
export interface MainTarget extends TargetBase {
  kind: "main";
  compilers: CompilerSet;
  extraPackages: string;
}

export interface ClangTarget extends TargetBase {
  kind: "clang";
  clang: string;
}

export interface GccTarget extends TargetBase {
  kind: "gcc";
  gcc: string;
}

export interface CudaTarget extends TargetBase {
  kind: "cuda";
  gcc: string;
  cuda: string;
}

export interface NvhpcTarget extends TargetBase {
  kind: "nvhpc";
  gcc: string;
  hpc: string;
  /** CUDA runtime version, or "_multi". */
  cuda: string;
}

export type BuildTarget = MainTarget | ClangTarget | GccTarget | CudaTarget | NvhpcTarget;

/** Batch order for building; also the order kinds are listed in help output. */
export const KIND_ORDER: readonly TargetKind[] = ["main", "clang", "gcc", "cuda", "nvhpc"];

export function osName(osVersion: string): string {
  return `${OS_DISTRO}${osVersion}`;
}

/**
 * Unique name of a target, used for the compose service and image tag.
 *
 * e.g. main-ubuntu22.04, clang15-ubuntu22.04, gcc11-cuda11.8.0-ubuntu22.04,
 * gcc11-cuda_multi-nvhpc22.11-ubuntu22.04
 */
export function targetName(target: BuildTarget): string {
  const os = osName(target.osVersion);
  switch (target.kind) {
    case "main":
      return `main-${os}`;
    case "clang":
      return `clang${target.clang}-${os}`;
    case "gcc":
      return `gcc${target.gcc}-${os}`;
    case "cuda":
      return `gcc${target.gcc}-cuda${target.cuda}-${os}`;
    case "nvhpc":
      return `gcc${target.gcc}-cuda${target.cuda}-nvhpc${target.hpc}-${os}`;
  }
}

export function dockerfileName(target: BuildTarget): string {
  return `${DOCKERFILE_PREFIX}.${targetName(target)}`;
}

export function baseImage(target: BuildTarget): string {
  switch (target.kind) {
    case "main":
    case "clang":
    case "gcc":
      return `${OS_DISTRO}:${target.osVersion}`;
    case "cuda":
      return `nvidia/cuda:${target.cuda}-devel-${osName(target.osVersion)}`;
    case "nvhpc":
      return `nvcr.io/nvidia/nvhpc:${target.hpc}-devel-cuda${target.cuda}-${osName(target.osVersion)}`;
  }
}

export function targetCompilers(target: BuildTarget): CompilerSet {
  switch (target.kind) {
    case "main":
      return target.compilers;
    case "clang":
      return { clang: target.clang };
    case "gcc":
    case "cuda":
    case "nvhpc":
      return { gcc: target.gcc };
  }
}

/** Extra packages for the compiler block; only primary images carry any. */
export function targetExtraPackages(target: BuildTarget): string {
  return target.kind === "main" ? target.extraPackages : "";
}

/**
 * Targets for a single OS version.
 *
 * Order: main, every clang, then each gcc followed by its CUDA and NVHPC images.
 */
export function enumerateOsTargets(os: OsCatalog, extraPackages: string): BuildTarget[] {
  const { osVersion } = os;
  const targets: BuildTarget[] = [];

  const compilers: CompilerSet = {};
  const clang = latestVersion(os.clang);
  const gcc = latestVersion(os.gcc);
  if (clang !== undefined) {compilers.clang = clang;}
  if (gcc !== undefined) {compilers.gcc = gcc;}
  targets.push({ kind: "main", osVersion, compilers, extraPackages });

  for (const v of os.clang) {
    targets.push({ kind: "clang", osVersion, clang: v });
  }

  for (const v of os.gcc) {
    targets.push({ kind: "gcc", osVersion, gcc: v });
    for (const cuda of os.cuda) {
      targets.push({ kind: "cuda", osVersion, gcc: v, cuda });
    }
    for (const { hpc, cuda } of os.nvhpc) {
      targets.push({ kind: "nvhpc", osVersion, gcc: v, hpc, cuda });
    }
  }

  return targets;
}

/** Full matrix, OS versions in catalog order. */
export function enumerateTargets(catalog: Catalog): BuildTarget[] {
  return catalog.osVersions.flatMap((os) => enumerateOsTargets(os, catalog.extraPackages));
}

export interface TargetFilter {
  osVersions?: readonly string[];
  kinds?: readonly TargetKind[];
}

/** Narrow the matrix; an empty or missing list means "no restriction". */
export function filterTargets(targets: readonly BuildTarget[], filter: TargetFilter): BuildTarget[] {
  const { osVersions, kinds } = filter;
  return targets.filter(
    (t) =>
      (!osVersions || osVersions.length === 0 || osVersions.includes(t.osVersion)) &&
      (!kinds || kinds.length === 0 || kinds.includes(t.kind))
  );
}
