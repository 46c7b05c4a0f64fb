/**
 * Unit tests for compose invocation building.
 */

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { tmpdir } from "node:os";

import {
  ComposeRunner,
  DryRunRunner,
  buildComposeArgs,
  formatComposeCommand,
  parseComposeCommand,
} from "../../src/docker/compose-runner.js";
import { DockerNotFoundError, ValidationError } from "../../src/errors.js";

describe("compose command line", () => {
  it("splits multi-word compose commands", () => {
    expect(parseComposeCommand("docker compose")).toEqual({ file: "docker", args: ["compose"] });
    expect(parseComposeCommand("  docker-compose ")).toEqual({ file: "docker-compose", args: [] });
  });

  it("rejects an empty command", () => {
    expect(() => parseComposeCommand("   ")).toThrow(ValidationError);
  });

  it("always forces a rebuild and parallel builds", () => {
    expect(buildComposeArgs(["a", "b"])).toEqual(["build", "--force-rm", "--parallel", "a", "b"]);
  });

  it("formats the invocation with BuildKit enabled", () => {
    expect(formatComposeCommand("docker-compose", ["main-ubuntu22.04"])).toBe(
      "DOCKER_BUILDKIT=1 docker-compose build --force-rm --parallel main-ubuntu22.04"
    );
  });
});

describe("runners", () => {
  beforeEach(() => {
    vi.spyOn(console, "log").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("prints instead of running in dry-run mode", async () => {
    const runner = new DryRunRunner("docker compose");

    const result = await runner.run({ label: "gcc ubuntu22.04", services: ["gcc12-ubuntu22.04"], workDir: "/work" });

    expect(result).toEqual({ success: true, exitCode: 0 });
    expect(console.log).toHaveBeenCalledWith(
      "DOCKER_BUILDKIT=1 docker compose build --force-rm --parallel gcc12-ubuntu22.04"
    );
  });

  it("reports a missing compose executable", async () => {
    const runner = new ComposeRunner("cxxmatrix-no-such-compose-binary");

    await expect(
      runner.run({ label: "main ubuntu22.04", services: ["main-ubuntu22.04"], workDir: tmpdir() })
    ).rejects.toThrow(DockerNotFoundError);
  });
});
