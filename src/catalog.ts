/**
 * Build matrix catalog for cxxmatrix.
 *
 * The catalog lists, per OS version, the clang and gcc versions and the
 * GPU toolkit versions to build images for. It is loaded once from JSON,
 * validated, then frozen for the rest of the run.
 *
 * Dependency direction:
 *   This module imports from: constants.ts, errors.ts, validation.ts, logger.ts
 */

import { readFileSync } from "node:fs";
import { z } from "zod";

import { DEFAULT_CATALOG_PATH, DEFAULT_EXTRA_PACKAGES } from "./constants.js";
import { ConfigError } from "./errors.js";
import { log } from "./logger.js";
import { isValidClangVersion, isValidVersionToken } from "./validation.js";

/** NVHPC release paired with the CUDA runtime it ships ("_multi" for all). */
export interface NvhpcPair {
  readonly hpc: string;
  readonly cuda: string;
}

/** Everything built for one OS version. Compiler lists are ordered oldest to latest. */
export interface OsCatalog {
  readonly osVersion: string;
  readonly clang: readonly string[];
  readonly gcc: readonly string[];
  readonly cuda: readonly string[];
  readonly nvhpc: readonly NvhpcPair[];
}

export interface Catalog {
  /** Packages added to the primary image of each OS. */
  readonly extraPackages: string;
  readonly osVersions: readonly OsCatalog[];
}

const versionToken = z
  .union([z.number().int().nonnegative(), z.string()])
  .transform((v) => String(v))
  .refine(isValidVersionToken, { message: "Version must match [A-Za-z0-9._]+" });

const clangVersion = versionToken.refine(isValidClangVersion, {
  message: "clang version must be a major number or 'dev'",
});

function uniqueList<T extends z.ZodTypeAny>(item: T) {
  return z
    .array(item)
    .default([])
    .refine((list) => new Set(list).size === list.length, { message: "Duplicate versions" });
}

const NvhpcPairSchema = z
  .object({
    hpc: versionToken,
    cuda: versionToken,
  })
  .strict();

const OsEntrySchema = z
  .object({
    clang: uniqueList(clangVersion),
    gcc: uniqueList(versionToken),
    cuda: uniqueList(versionToken),
    nvhpc: z
      .array(NvhpcPairSchema)
      .default([])
      .refine((pairs) => new Set(pairs.map((p) => `${p.hpc}/${p.cuda}`)).size === pairs.length, {
        message: "Duplicate NVHPC pairs",
      }),
  })
  .strict()
  .refine((entry) => entry.clang.length > 0 || entry.gcc.length > 0, {
    message: "At least one of clang or gcc must list a version",
  });

const CatalogSchema = z
  .object({
    extraPackages: z.string().default(DEFAULT_EXTRA_PACKAGES),
    osVersions: z
      .record(z.string(), OsEntrySchema)
      .refine((entries) => Object.keys(entries).length > 0, { message: "No OS versions listed" })
      .refine((entries) => Object.keys(entries).every(isValidVersionToken), {
        message: "OS version must match [A-Za-z0-9._]+",
      })
      // Integer-like keys would be reordered ahead of the others by the JSON object
      .refine((entries) => Object.keys(entries).every((key) => !/^\d+$/.test(key)), {
        message: "OS version must contain a '.' or a letter (e.g. 22.04)",
      }),
  })
  .strict();

function formatIssues(error: z.ZodError): string {
  return error.issues
    .map((issue) => `${issue.path.length > 0 ? issue.path.join(".") : "(root)"}: ${issue.message}`)
    .join("; ");
}

function freezeCatalog(catalog: Catalog): Catalog {
  for (const os of catalog.osVersions) {
    Object.freeze(os.clang);
    Object.freeze(os.gcc);
    Object.freeze(os.cuda);
    os.nvhpc.forEach((pair) => Object.freeze(pair));
    Object.freeze(os.nvhpc);
    Object.freeze(os);
  }
  Object.freeze(catalog.osVersions);
  return Object.freeze(catalog);
}

/**
 * Validate a raw catalog object and return the frozen catalog.
 *
 * OS versions keep the order they have in the source object.
 *
 * @throws ConfigError if the structure or any version token is invalid.
 */
export function parseCatalog(raw: unknown, source = "catalog"): Catalog {
  const result = CatalogSchema.safeParse(raw);
  if (!result.success) {
    throw new ConfigError(`Invalid ${source}: ${formatIssues(result.error)}`);
  }

  const osVersions: OsCatalog[] = Object.entries(result.data.osVersions).map(([osVersion, entry]) => ({
    osVersion,
    clang: entry.clang,
    gcc: entry.gcc,
    cuda: entry.cuda,
    nvhpc: entry.nvhpc,
  }));

  return freezeCatalog({ extraPackages: result.data.extraPackages.trim(), osVersions });
}

/**
 * Load the catalog from a JSON file (the bundled one by default).
 *
 * @throws ConfigError if the file is missing, not JSON, or invalid.
 */
export function loadCatalog(path: string = DEFAULT_CATALOG_PATH): Catalog {
  let content: string;
  try {
    content = readFileSync(path, "utf-8");
  } catch (e) {
    throw new ConfigError(`Cannot read catalog ${path}: ${e instanceof Error ? e.message : String(e)}`);
  }

  let raw: unknown;
  try {
    raw = JSON.parse(content);
  } catch (e) {
    throw new ConfigError(`Catalog ${path} is not valid JSON: ${e instanceof Error ? e.message : String(e)}`);
  }

  const catalog = parseCatalog(raw, `catalog ${path}`);
  log.debug(`Loaded catalog: ${path} (${catalog.osVersions.length} OS version(s))`);
  return catalog;
}

/** Latest (last listed) entry of a compiler list. */
export function latestVersion(versions: readonly string[]): string | undefined {
  return versions[versions.length - 1];
}
