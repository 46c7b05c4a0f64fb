/**
 * Unit tests for compose manifest rendering.
 */

import { describe, it, expect } from "vitest";

import { imageTag, renderComposeManifest, renderComposeService } from "../../src/compose.js";
import { enumerateTargets, type BuildTarget } from "../../src/matrix.js";
import { gccCudaCatalog } from "../helpers/catalogs.js";

describe("renderComposeService", () => {
  const target: BuildTarget = { kind: "cuda", osVersion: "22.04", gcc: "12", cuda: "11.8.0" };

  it("renders service, image tag and build file", () => {
    expect(renderComposeService(target, "acme/cxx")).toBe(
      [
        "  gcc12-cuda11.8.0-ubuntu22.04:",
        "    image: acme/cxx:gcc12-cuda11.8.0-ubuntu22.04",
        "    build:",
        "      context: .",
        "      dockerfile: Dockerfile.gcc12-cuda11.8.0-ubuntu22.04",
        "",
      ].join("\n")
    );
  });

  it("tags images under the repository root", () => {
    expect(imageTag(target, "registry.local:5000/ci/cxx")).toBe(
      "registry.local:5000/ci/cxx:gcc12-cuda11.8.0-ubuntu22.04"
    );
  });
});

describe("renderComposeManifest", () => {
  it("contains one stanza per target under services", () => {
    const manifest = renderComposeManifest(enumerateTargets(gccCudaCatalog()), "acme/cxx");

    expect(manifest.startsWith("services:\n\n  main-ubuntu22.04:\n")).toBe(true);
    expect(manifest.match(/^ {2}\S+:$/gm)).toHaveLength(5);
    expect(manifest.match(/^ {4}image: /gm)).toHaveLength(5);
  });

  it("renders an empty service map for no targets", () => {
    expect(renderComposeManifest([], "acme/cxx")).toBe("services:\n");
  });
});
