/**
 * Unit tests for configuration file parsing and settings precedence.
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { loadFileConfig, parseSimpleYaml, toFileConfig } from "../../src/config-file.js";
import { loadSettings, resolveSettings } from "../../src/config.js";
import { DEFAULT_CATALOG_PATH } from "../../src/constants.js";
import { ValidationError } from "../../src/errors.js";

describe("parseSimpleYaml", () => {
  it("reads flat key/value pairs and strips quotes", () => {
    const parsed = parseSimpleYaml(
      ["# images", "repo: 'acme/cxx'", "compose: \"docker compose\"", "", "outDir: ./out", "empty:"].join("\n")
    );

    expect(parsed).toEqual({ repo: "acme/cxx", compose: "docker compose", outDir: "./out" });
  });

  it("keeps only known keys", () => {
    expect(toFileConfig({ repo: "acme/cxx", stack: "go" })).toEqual({ repo: "acme/cxx" });
  });
});

describe("resolveSettings", () => {
  it("falls back to defaults", () => {
    const settings = resolveSettings({ cwd: "/work" });

    expect(settings).toEqual({
      repo: "lucteo/action-cxx-toolkit",
      catalogPath: DEFAULT_CATALOG_PATH,
      outDir: "/work",
      composeCommand: "docker-compose",
      failurePolicy: "abort",
    });
  });

  it("applies file < env < CLI for the repository", () => {
    const file = { repo: "file/repo" };
    const env = { ACTION_CXX_TOOLKIT_REPO: "env/repo" };

    expect(resolveSettings({ cwd: "/work", file }).repo).toBe("file/repo");
    expect(resolveSettings({ cwd: "/work", file, env }).repo).toBe("env/repo");
    expect(resolveSettings({ cwd: "/work", file, env, cli: { repo: "cli/repo" } }).repo).toBe("cli/repo");
  });

  it("ignores an empty environment variable", () => {
    expect(resolveSettings({ cwd: "/work", env: { ACTION_CXX_TOOLKIT_REPO: "" } }).repo).toBe(
      "lucteo/action-cxx-toolkit"
    );
  });

  it("resolves file paths against the config directory and CLI paths against cwd", () => {
    const settings = resolveSettings({
      cwd: "/work",
      fileDir: "/work/ci",
      file: { catalog: "matrix.json", outDir: "images" },
      cli: { outDir: "out" },
    });

    expect(settings.catalogPath).toBe("/work/ci/matrix.json");
    expect(settings.outDir).toBe("/work/out");
  });

  it("rejects an invalid repository", () => {
    expect(() => resolveSettings({ cli: { repo: "Not A Repo" } })).toThrow(ValidationError);
  });

  it("rejects an unknown failure policy", () => {
    expect(() => resolveSettings({ file: { failurePolicy: "retry" } })).toThrow("Invalid failure policy 'retry'");
  });
});

describe("loadSettings", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "cxxmatrix-config-"));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns null when no config file exists", () => {
    expect(loadFileConfig(dir)).toBeNull();
  });

  it("reads cxxmatrix.yaml from the working directory", () => {
    writeFileSync(join(dir, "cxxmatrix.yaml"), "failurePolicy: continue\noutDir: images\n");

    const settings = loadSettings({}, dir);

    expect(settings.failurePolicy).toBe("continue");
    expect(settings.outDir).toBe(join(dir, "images"));
  });

  it("prefers cxxmatrix.yaml over .cxxmatrixrc", () => {
    writeFileSync(join(dir, "cxxmatrix.yaml"), "compose: docker compose\n");
    writeFileSync(join(dir, ".cxxmatrixrc"), "compose: podman-compose\n");

    expect(loadFileConfig(dir)?.config.compose).toBe("docker compose");
  });
});
