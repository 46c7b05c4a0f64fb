/* eslint-disable no-useless-escape -- Dockerfile templates require \$ escapes for shell variables */
/**
 * Dockerfile generation for cxxmatrix.
 *
 * Every Dockerfile is five blocks in fixed order: FROM, prologue, common
 * tooling, compiler installation, entry point. Only the compiler block
 * varies between images.
 */

import { AlternativesList } from "./alternatives.js";
import {
  CLANG_DEV_VERSION,
  CLANG_REPO_THRESHOLD,
  CMAKE_VERSION,
  ENTRYPOINT_FILE,
} from "./constants.js";
import { ConfigError } from "./errors.js";
import type { CompilerSet } from "./matrix.js";

const PROLOGUE = `
ARG DEBIAN_FRONTEND=noninteractive
ARG CMAKE_VERSION=${CMAKE_VERSION}

SHELL ["/bin/bash", "-Eeox", "pipefail", "-c"]
`;

// Same for every image; keep it first so the layer is shared across builds
const INSTALL_BASE = `
# Common package setup
RUN set -xe; \\
    # Packages needed to add other package sources
    apt update; \\
    apt install -y --no-install-recommends \\
        apt-transport-https ca-certificates gnupg software-properties-common wget; \\
    apt-add-repository -y -n 'ppa:ubuntu-toolchain-r/test'; \\
    apt update; \\
    # Generic build tools & python
    apt install -y --no-install-recommends \\
        pkg-config make \\
        python3 python3-pip python3-setuptools \\
        ; \\
    # CMake
    wget -O /tmp/cmake.sh \\
        https://github.com/Kitware/CMake/releases/download/v\${CMAKE_VERSION}/cmake-\${CMAKE_VERSION}-linux-$(uname -m).sh; \\
    sh /tmp/cmake.sh --skip-license --exclude-subdir --prefix=/usr/local; \\
    rm -rf /tmp/* /var/tmp/* /var/cache/apt/* /var/lib/apt/lists/*; \\
    # conan
    python3 -m pip install conan
`;

const EPILOGUE = `
# The entry point
COPY ${ENTRYPOINT_FILE} /usr/local/bin/${ENTRYPOINT_FILE}
ENTRYPOINT ["/usr/local/bin/${ENTRYPOINT_FILE}"]
SHELL ["/bin/bash", "-c"]
`;

/** Shell variable holding the clang version resolved while the image builds. */
export const LLVM_VERSION_VAR = "v";

/** Major version of the newest `llvm` candidate in the apt index. */
export const LLVM_VERSION_LOOKUP =
  "$(apt policy llvm 2>/dev/null | grep -E 'Candidate: 1:(.*).*$' - | cut -d':' -f3 | cut -d'.' -f1)";

/**
 * Version as it appears in package names and paths.
 *
 * A deferred version is only known once the llvm repository is indexed,
 * so it is bound to a shell variable inside the RUN step.
 */
export type VersionRef =
  | { kind: "literal"; value: string }
  | { kind: "deferred"; variable: string; lookup: string };

export function versionText(ref: VersionRef): string {
  return ref.kind === "literal" ? ref.value : `$${ref.variable}`;
}

/** True when the clang version must come from the apt.llvm.org repository. */
export function needsLlvmRepository(clang: string): boolean {
  if (clang === CLANG_DEV_VERSION) {
    return true;
  }
  const major = Number.parseInt(clang, 10);
  return Number.isFinite(major) && major >= CLANG_REPO_THRESHOLD;
}

interface InstallPlan {
  /** Shell steps run before `apt install`. */
  setup: string[];
  packages: string[];
  aliases: Array<[string, string]>;
}

function clangInstall(clang: string): InstallPlan & { version: VersionRef } {
  const setup: string[] = [];
  let version: VersionRef;

  if (needsLlvmRepository(clang)) {
    const toolchainSuffix = clang === CLANG_DEV_VERSION ? "" : `-${clang}`;
    version = { kind: "deferred", variable: LLVM_VERSION_VAR, lookup: LLVM_VERSION_LOOKUP };
    setup.push(
      "wget -qO - https://apt.llvm.org/llvm-snapshot.gpg.key | apt-key add -",
      `apt-add-repository -y -n "deb http://apt.llvm.org/$(lsb_release -cs)/ llvm-toolchain-$(lsb_release -cs)${toolchainSuffix} main"`,
      "apt update",
      `${version.variable}="${version.lookup}"`
    );
  } else {
    version = { kind: "literal", value: clang };
    setup.push("apt update");
  }

  const v = versionText(version);
  const packages = [`llvm-${v}`, `clang-${v}`, `clang-tidy-${v}`, `clang-format-${v}`];
  if (version.kind === "deferred") {
    packages.push(`libc++-${v}-dev`, `libc++abi-${v}-dev`);
  }

  return {
    setup,
    packages,
    version,
    aliases: [
      ["clang", `/usr/bin/clang-${v}`],
      ["clang++", `/usr/bin/clang++-${v}`],
      ["clang-tidy", `/usr/bin/clang-tidy-${v}`],
      ["clang-format", `/usr/bin/clang-format-${v}`],
      ["llvm-cov", `/usr/lib/llvm-${v}/bin/llvm-cov`],
      ["run-clang-tidy", `/usr/lib/llvm-${v}/bin/run-clang-tidy`],
    ],
  };
}

/** Generic gcc tool names pointed at clang, for clang-only images. */
function clangAsGccAliases(version: VersionRef): Array<[string, string]> {
  const v = versionText(version);
  return [
    ["gcc", `/usr/bin/clang-${v}`],
    ["g++", `/usr/bin/clang++-${v}`],
    ["gcov", `/usr/lib/llvm-${v}/bin/llvm-cov`],
  ];
}

function gccInstall(gcc: string): InstallPlan {
  return {
    setup: [],
    packages: [`g++-${gcc}`],
    aliases: [
      ["gcc", `/usr/bin/gcc-${gcc}`],
      ["g++", `/usr/bin/g++-${gcc}`],
      ["gcov", `/usr/bin/gcov-${gcc}`],
    ],
  };
}

/**
 * Compiler installation block.
 *
 * clang aliases are registered before gcc aliases; with the ordered-override
 * rule of AlternativesList, gcc owns any generic name both could claim.
 *
 * @param extraPackages - Appended verbatim to the package list.
 * @throws ConfigError when neither clang nor gcc is requested.
 */
export function generateCompilerBlock(compilers: CompilerSet, extraPackages = ""): string {
  const { clang, gcc } = compilers;
  if (clang === undefined && gcc === undefined) {
    throw new ConfigError("Compiler block needs at least one of clang or gcc");
  }

  const setup: string[] = [];
  const packages: string[] = [];
  const alternatives = new AlternativesList();

  if (clang !== undefined) {
    const plan = clangInstall(clang);
    setup.push(...plan.setup);
    packages.push(...plan.packages);
    alternatives.addAll(plan.aliases);
    if (gcc === undefined) {
      alternatives.addAll(clangAsGccAliases(plan.version));
    }
  } else {
    setup.push("apt update");
  }

  if (gcc !== undefined) {
    const plan = gccInstall(gcc);
    packages.push(...plan.packages);
    alternatives.addAll(plan.aliases);
  }

  const extra = extraPackages.trim();
  if (extra) {
    packages.push(extra);
  }

  return `
# Compilers and tools
RUN set -xe; \\
${setup.map((step) => `    ${step}; \\`).join("\n")}
    apt install -y --no-install-recommends \\
${packages.map((pkg) => `        ${pkg} \\`).join("\n")}
    ; \\
    rm -rf /var/lib/apt/lists/*; \\
    ${alternatives.render()}
`;
}

/** Inputs for one Dockerfile. */
export interface DockerfileSpec {
  baseImage: string;
  compilers: CompilerSet;
  extraPackages?: string;
}

/** Generate Dockerfile content. */
export function generateDockerfile(spec: DockerfileSpec): string {
  return [
    `FROM ${spec.baseImage}\n`,
    PROLOGUE,
    INSTALL_BASE,
    generateCompilerBlock(spec.compilers, spec.extraPackages),
    EPILOGUE,
  ].join("");
}
