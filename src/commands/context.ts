/**
 * Shared setup for cxxmatrix commands.
 *
 * Resolves settings, loads the catalog once and applies target filters.
 */

import { loadCatalog, type Catalog } from "../catalog.js";
import { loadSettings, type CliSettings, type Settings } from "../config.js";
import { log } from "../logger.js";
import { enumerateTargets, filterTargets, type BuildTarget } from "../matrix.js";
import { ValidationError } from "../errors.js";
import { parseTargetKind } from "../validation.js";

/** Options shared by every command (see cli.ts). */
export interface CommandOptions extends CliSettings {
  os?: string[];
  kind?: string[];
  dryRun?: boolean;
}

export interface RunContext {
  settings: Settings;
  catalog: Catalog;
  /** Every target in the catalog; the compose manifest lists all of them. */
  allTargets: BuildTarget[];
  /** Targets after --os / --kind filtering. */
  targets: BuildTarget[];
}

function checkOsVersions(osVersions: readonly string[], catalog: Catalog): void {
  const known = catalog.osVersions.map((os) => os.osVersion);
  for (const osVersion of osVersions) {
    if (!known.includes(osVersion)) {
      throw new ValidationError(`Unknown OS version '${osVersion}'. Catalog lists: ${known.join(", ")}`);
    }
  }
}

/**
 * Build the run context for a command.
 *
 * @throws ConfigError / ValidationError on invalid configuration.
 */
export function createContext(options: CommandOptions, cwd: string = process.cwd()): RunContext {
  const settings = loadSettings(options, cwd);
  const catalog = loadCatalog(settings.catalogPath);
  const kinds = (options.kind ?? []).map(parseTargetKind);
  const osVersions = options.os ?? [];
  checkOsVersions(osVersions, catalog);

  const all = enumerateTargets(catalog);
  const targets = filterTargets(all, { osVersions, kinds });

  if (targets.length < all.length) {
    log.dim(`Selected ${targets.length} of ${all.length} target(s)`);
  }
  if (targets.length === 0) {
    log.yellow("No targets match the given filters.");
  }
  return { settings, catalog, allTargets: all, targets };
}
