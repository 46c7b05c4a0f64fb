/**
 * Compose manifest rendering.
 *
 * One service per target; the service name doubles as the image tag so
 * `docker-compose build <name>` and `docker pull <repo>:<name>` agree.
 */

import { dockerfileName, targetName, type BuildTarget } from "./matrix.js";

export function imageTag(target: BuildTarget, repo: string): string {
  return `${repo}:${targetName(target)}`;
}

/** Service stanza, indented for the top-level `services:` key. */
export function renderComposeService(target: BuildTarget, repo: string): string {
  return `  ${targetName(target)}:
    image: ${imageTag(target, repo)}
    build:
      context: .
      dockerfile: ${dockerfileName(target)}
`;
}

export function renderComposeManifest(targets: readonly BuildTarget[], repo: string): string {
  return ["services:\n", ...targets.map((t) => `\n${renderComposeService(t, repo)}`)].join("");
}
