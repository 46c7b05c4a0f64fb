/**
 * Settings resolution for cxxmatrix.
 *
 * Precedence (lowest to highest): defaults, project config file,
 * environment, CLI flags. Relative paths from the config file resolve
 * against the directory that holds it.
 *
 * Dependency direction:
 *   This module imports from: constants.ts, config-file.ts, validation.ts
 *   It should NOT import from: cli, generator, build
 */

import { dirname, resolve } from "node:path";

import { loadFileConfig, type FileConfig } from "./config-file.js";
import {
  DEFAULT_CATALOG_PATH,
  DEFAULT_COMPOSE_COMMAND,
  DEFAULT_OUT_DIR,
  DEFAULT_REPO,
  REPO_ENV_VAR,
} from "./constants.js";
import { parseFailurePolicy, validateImageRepo, type FailurePolicy } from "./validation.js";

/** Fully resolved settings for one run. */
export interface Settings {
  repo: string;
  catalogPath: string;
  outDir: string;
  composeCommand: string;
  failurePolicy: FailurePolicy;
}

/** Values given on the command line; undefined means "not given". */
export interface CliSettings {
  repo?: string;
  catalog?: string;
  outDir?: string;
  compose?: string;
  policy?: string;
}

export interface ResolveInput {
  cli?: CliSettings;
  env?: NodeJS.ProcessEnv;
  file?: FileConfig;
  /** Directory relative file paths resolve against. */
  fileDir?: string;
  cwd?: string;
}

/**
 * Merge the configuration layers.
 *
 * @throws ValidationError on an invalid repository or failure policy.
 */
export function resolveSettings(input: ResolveInput = {}): Settings {
  const { cli = {}, env = {}, file = {} } = input;
  const cwd = input.cwd ?? process.cwd();
  const fileDir = input.fileDir ?? cwd;

  const fromFile = (path: string | undefined) => (path === undefined ? undefined : resolve(fileDir, path));
  const fromCli = (path: string | undefined) => (path === undefined ? undefined : resolve(cwd, path));

  const envRepo = env[REPO_ENV_VAR];
  const repo = cli.repo ?? (envRepo ? envRepo : undefined) ?? file.repo ?? DEFAULT_REPO;

  return {
    repo: validateImageRepo(repo),
    catalogPath: fromCli(cli.catalog) ?? fromFile(file.catalog) ?? DEFAULT_CATALOG_PATH,
    outDir: fromCli(cli.outDir) ?? fromFile(file.outDir) ?? resolve(cwd, DEFAULT_OUT_DIR),
    composeCommand: cli.compose ?? file.compose ?? DEFAULT_COMPOSE_COMMAND,
    failurePolicy: parseFailurePolicy(cli.policy ?? file.failurePolicy ?? "abort"),
  };
}

/** Load the project config file from `cwd` and resolve settings against it. */
export function loadSettings(cli: CliSettings, cwd: string = process.cwd()): Settings {
  const loaded = loadFileConfig(cwd);
  const input: ResolveInput = { cli, env: process.env, cwd };
  if (loaded) {
    input.file = loaded.config;
    input.fileDir = dirname(loaded.path);
  }
  return resolveSettings(input);
}
