/**
 * Unit tests for catalog loading and validation.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { latestVersion, loadCatalog, parseCatalog } from "../../src/catalog.js";
import { DEFAULT_EXTRA_PACKAGES } from "../../src/constants.js";
import { ConfigError } from "../../src/errors.js";

describe("loadCatalog", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "cxxmatrix-catalog-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("loads the bundled catalog in file order", () => {
    const catalog = loadCatalog();

    expect(catalog.osVersions.map((os) => os.osVersion)).toEqual(["20.04", "22.04"]);
    expect(catalog.extraPackages).toBe("curl git cppcheck iwyu lcov");

    const [focal] = catalog.osVersions;
    expect(focal?.clang[0]).toBe("7");
    expect(focal && latestVersion(focal.clang)).toBe("dev");
    expect(focal?.nvhpc[1]).toEqual({ hpc: "22.7", cuda: "_multi" });
  });

  it("freezes the loaded catalog", () => {
    const catalog = loadCatalog();

    expect(Object.isFrozen(catalog)).toBe(true);
    expect(Object.isFrozen(catalog.osVersions)).toBe(true);
    expect(Object.isFrozen(catalog.osVersions[0]?.gcc)).toBe(true);
  });

  it("reads a catalog file from disk", () => {
    const path = join(dir, "catalog.json");
    writeFileSync(path, JSON.stringify({ osVersions: { "24.04": { gcc: [13] } } }));

    const catalog = loadCatalog(path);

    expect(catalog.extraPackages).toBe(DEFAULT_EXTRA_PACKAGES);
    expect(catalog.osVersions).toEqual([{ osVersion: "24.04", clang: [], gcc: ["13"], cuda: [], nvhpc: [] }]);
  });

  it("fails on a missing file", () => {
    expect(() => loadCatalog(join(dir, "nope.json"))).toThrow(ConfigError);
    expect(() => loadCatalog(join(dir, "nope.json"))).toThrow("Cannot read catalog");
  });

  it("fails on malformed JSON", () => {
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ osVersions: ");

    expect(() => loadCatalog(path)).toThrow("is not valid JSON");
  });
});

describe("parseCatalog", () => {
  it("requires at least one compiler family per OS", () => {
    expect(() => parseCatalog({ osVersions: { "22.04": { cuda: ["11.8.0"] } } })).toThrow(
      "At least one of clang or gcc must list a version"
    );
  });

  it("rejects duplicate versions", () => {
    expect(() => parseCatalog({ osVersions: { "22.04": { gcc: [11, "11"] } } })).toThrow("Duplicate versions");
  });

  it("rejects version tokens that would break target names", () => {
    expect(() => parseCatalog({ osVersions: { "22.04": { gcc: ["11-x"] } } })).toThrow(
      "Version must match [A-Za-z0-9._]+"
    );
  });

  it("only accepts numeric or dev clang versions", () => {
    expect(() => parseCatalog({ osVersions: { "22.04": { clang: ["latest"] } } })).toThrow(
      "clang version must be a major number or 'dev'"
    );
  });

  it("rejects unknown keys", () => {
    expect(() => parseCatalog({ osVersions: { "22.04": { gcc: [11], icc: [2021] } } })).toThrow(ConfigError);
  });

  it("rejects integer-like OS versions", () => {
    expect(() => parseCatalog({ osVersions: { "22.04": { gcc: [12] }, "2404": { gcc: [13] } } })).toThrow(
      "OS version must contain a '.' or a letter (e.g. 22.04)"
    );
  });

  it("rejects an empty OS list", () => {
    expect(() => parseCatalog({ osVersions: {} })).toThrow("No OS versions listed");
  });
});
