/**
 * Configuration file support for cxxmatrix.
 *
 * Loads settings from cxxmatrix.yaml or .cxxmatrixrc in the working
 * directory (first one found wins).
 *
 * Example:
 *   repo: myorg/cxx-toolkit
 *   catalog: ./catalog.json
 *   outDir: ./images
 *   compose: docker compose
 *   failurePolicy: continue
 *
 * Dependency direction:
 *   This module imports from: constants.ts, logger.ts
 *   It should NOT import from: cli, generator, build
 */

import { existsSync, readFileSync } from "node:fs";
import { join } from "node:path";

import { PROJECT_CONFIG_FILES } from "./constants.js";
import { ConfigError } from "./errors.js";
import { log } from "./logger.js";

/**
 * cxxmatrix file configuration.
 * All fields are optional - environment and CLI flags take precedence.
 */
export interface FileConfig {
  repo?: string;
  catalog?: string;
  outDir?: string;
  compose?: string;
  failurePolicy?: string;
}

/**
 * Parse YAML-like config (flat key: value format).
 * Values are kept as strings; quotes around a value are stripped.
 */
export function parseSimpleYaml(content: string): Record<string, string> {
  const result: Record<string, string> = {};

  for (const line of content.split("\n")) {
    const trimmed = line.trim();
    if (trimmed.startsWith("#") || trimmed === "") {
      continue;
    }

    const match = trimmed.match(/^([a-zA-Z_][a-zA-Z0-9_-]*):\s*(.*)$/);
    if (match) {
      const [, key, value] = match;
      if (key && value !== undefined) {
        const cleanValue = value.trim().replace(/^["']|["']$/g, "").trim();
        if (cleanValue !== "") {
          result[key] = cleanValue;
        }
      }
    }
  }

  return result;
}

/** Map parsed values to FileConfig, ignoring unknown keys. */
export function toFileConfig(parsed: Record<string, string>): FileConfig {
  const config: FileConfig = {};
  if (parsed.repo !== undefined) {config.repo = parsed.repo;}
  if (parsed.catalog !== undefined) {config.catalog = parsed.catalog;}
  if (parsed.outDir !== undefined) {config.outDir = parsed.outDir;}
  if (parsed.compose !== undefined) {config.compose = parsed.compose;}
  if (parsed.failurePolicy !== undefined) {config.failurePolicy = parsed.failurePolicy;}
  return config;
}

/**
 * Load the project config file from `dir`.
 *
 * @returns The config and the file it came from, or null if there is none.
 * @throws ConfigError if the file exists but cannot be read.
 */
export function loadFileConfig(dir: string): { config: FileConfig; path: string } | null {
  for (const filename of PROJECT_CONFIG_FILES) {
    const path = join(dir, filename);
    if (!existsSync(path)) {
      continue;
    }

    let content: string;
    try {
      content = readFileSync(path, "utf-8");
    } catch (e) {
      throw new ConfigError(`Cannot read ${path}: ${e instanceof Error ? e.message : String(e)}`);
    }

    log.debug(`Loaded project config: ${path}`);
    return { config: toFileConfig(parseSimpleYaml(content)), path };
  }
  return null;
}
