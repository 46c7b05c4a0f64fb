/**
 * Unit tests for the generate/build command flow.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { existsSync, mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";

import { build } from "../../src/commands/build.js";
import { createContext } from "../../src/commands/context.js";
import { generate } from "../../src/commands/generate.js";
import { BatchBuildError, ConfigError, ValidationError } from "../../src/errors.js";
import { targetName } from "../../src/matrix.js";
import { ComposeMockRecorder } from "../mocks/compose-mock.js";

describe("commands", () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "cxxmatrix-cmd-"));
    writeFileSync(
      join(dir, "matrix.json"),
      JSON.stringify({ osVersions: { "22.04": { clang: [15], gcc: [11, 12], cuda: ["11.8.0"] } } })
    );
    writeFileSync(join(dir, "cxxmatrix.yaml"), "catalog: matrix.json\noutDir: images\nrepo: acme/cxx\n");
    vi.spyOn(console, "log").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation(() => {});
    vi.stubEnv("ACTION_CXX_TOOLKIT_REPO", "");
  });

  afterEach(() => {
    vi.unstubAllEnvs();
    vi.restoreAllMocks();
    rmSync(dir, { recursive: true, force: true });
  });

  it("builds the context from the project config", () => {
    const ctx = createContext({}, dir);

    expect(ctx.settings.repo).toBe("acme/cxx");
    expect(ctx.settings.outDir).toBe(join(dir, "images"));
    // 1 main + 1 clang + 2 gcc + 2 cuda
    expect(ctx.targets).toHaveLength(6);
  });

  it("applies kind filters", () => {
    const ctx = createContext({ kind: ["cuda"] }, dir);

    expect(ctx.targets.map(targetName)).toEqual(["gcc11-cuda11.8.0-ubuntu22.04", "gcc12-cuda11.8.0-ubuntu22.04"]);
  });

  it("rejects unknown kinds", () => {
    expect(() => createContext({ kind: ["icc"] }, dir)).toThrow(ValidationError);
  });

  it("rejects OS versions missing from the catalog", () => {
    expect(() => createContext({ os: ["24.04"] }, dir)).toThrow(ValidationError);
    expect(() => createContext({ os: ["22.04", "24.04"] }, dir)).toThrow(
      "Unknown OS version '24.04'. Catalog lists: 22.04"
    );
  });

  it("lets the environment override the configured repository", () => {
    vi.stubEnv("ACTION_CXX_TOOLKIT_REPO", "env/repo");

    expect(createContext({}, dir).settings.repo).toBe("env/repo");
  });

  it("refuses to build before generating", async () => {
    const ctx = createContext({}, dir);

    await expect(build(ctx, { runner: new ComposeMockRecorder() })).rejects.toThrow(ConfigError);
  });

  it("generates then builds every batch", async () => {
    const ctx = createContext({}, dir);
    const runner = new ComposeMockRecorder();

    generate(ctx);
    const report = await build(ctx, { runner });

    expect(existsSync(join(dir, "images", "docker-compose.yml"))).toBe(true);
    expect(runner.calls.map((c) => c.label)).toEqual([
      "main ubuntu22.04",
      "clang ubuntu22.04",
      "gcc ubuntu22.04",
      "cuda ubuntu22.04",
    ]);
    expect(runner.calls.every((c) => c.workDir === join(dir, "images"))).toBe(true);
    expect(report.succeeded).toHaveLength(4);
  });

  it("keeps every service in the manifest after a filtered generate", async () => {
    generate(createContext({}, dir));
    const filtered = generate(createContext({ kind: ["cuda"] }, dir));
    const runner = new ComposeMockRecorder();

    const report = await build(createContext({}, dir), { runner });

    expect(filtered.dockerfiles).toHaveLength(2);
    const manifest = readFileSync(join(dir, "images", "docker-compose.yml"), "utf-8");
    for (const service of runner.calls.flatMap((c) => c.services)) {
      expect(manifest).toContain(`\n  ${service}:\n`);
    }
    expect(runner.calls.flatMap((c) => c.services)).toHaveLength(6);
    expect(report.succeeded).toHaveLength(4);
  });

  it("refuses to build targets whose Dockerfile was never generated", async () => {
    generate(createContext({ kind: ["cuda"] }, dir));
    const runner = new ComposeMockRecorder();

    await expect(build(createContext({}, dir), { runner })).rejects.toThrow(
      "4 Dockerfile(s) missing from " + join(dir, "images")
    );
    expect(runner.calls).toEqual([]);
  });

  it("fails the build when a batch fails", async () => {
    const ctx = createContext({ policy: "continue" }, dir);
    const runner = new ComposeMockRecorder({ "clang ubuntu22.04": 1 });
    generate(ctx);

    await expect(build(ctx, { runner })).rejects.toThrow(BatchBuildError);
    expect(runner.calls).toHaveLength(4);
  });
});
