/**
 * Constants module for cxxmatrix.
 *
 * Shared names, defaults and Dockerfile constants are defined here (SSOT).
 */

import { readFileSync } from "node:fs";
import { fileURLToPath } from "node:url";

// === Version (SSOT: package.json) ===
function readVersion(): string {
  const pkgPath = fileURLToPath(new URL("../package.json", import.meta.url));
  const pkg: unknown = JSON.parse(readFileSync(pkgPath, "utf-8"));
  if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
    return pkg.version;
  }
  return "0.0.0";
}

export const VERSION: string = readVersion();

// === Image repository ===
export const REPO_ENV_VAR = "ACTION_CXX_TOOLKIT_REPO";
export const DEFAULT_REPO = "lucteo/action-cxx-toolkit";

// === Generated files ===
export const DOCKERFILE_PREFIX = "Dockerfile";
export const COMPOSE_FILE = "docker-compose.yml";
export const ENTRYPOINT_FILE = "entrypoint.py";
export const DEFAULT_OUT_DIR = ".";

/** Bundled catalog, resolved relative to this module (works from src/ and dist/). */
export const DEFAULT_CATALOG_PATH = fileURLToPath(new URL("../catalog/default.json", import.meta.url));

// === OS naming ===
export const OS_DISTRO = "ubuntu";

// === Compiler installation ===
/** clang versions at or above this need the apt.llvm.org repository. */
export const CLANG_REPO_THRESHOLD = 13;
/** clang version token meaning "tip of the llvm-toolchain repository". */
export const CLANG_DEV_VERSION = "dev";
/** Priority group for every update-alternatives registration. */
export const ALTERNATIVES_PRIORITY = 100;
export const DEFAULT_EXTRA_PACKAGES = "curl git cppcheck iwyu lcov";
export const CMAKE_VERSION = "3.24.2";

// === Compose ===
export const DEFAULT_COMPOSE_COMMAND = "docker-compose";
/** Flags passed on every batch: always rebuild, build services in parallel. */
export const COMPOSE_BUILD_FLAGS = ["--force-rm", "--parallel"] as const;

// === Project config files (in order of precedence) ===
export const PROJECT_CONFIG_FILES = ["cxxmatrix.yaml", "cxxmatrix.yml", ".cxxmatrixrc"];
