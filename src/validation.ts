/**
 * Input validation utilities for cxxmatrix.
 *
 * Centralized checks for version tokens, image repositories and the
 * enumerated CLI choices.
 *
 * Dependency direction:
 *   This module imports from: errors.ts, constants.ts
 *   It should NOT import from: cli, generator, build
 */

import { CLANG_DEV_VERSION } from "./constants.js";
import { ValidationError } from "./errors.js";

/**
 * Version tokens end up inside file names, service names and package names.
 * No "-" allowed: it separates the parts of a target name.
 */
const VERSION_TOKEN_PATTERN = /^[A-Za-z0-9._]+$/;

/** Docker image repository: lowercase path components, optional registry host:port. */
const IMAGE_REPO_PATTERN = /^(?:[a-z0-9.-]+(?::\d+)?\/)?[a-z0-9]+(?:[._-][a-z0-9]+)*(?:\/[a-z0-9]+(?:[._-][a-z0-9]+)*)*$/;

export const FAILURE_POLICIES = ["abort", "continue"] as const;
export type FailurePolicy = (typeof FAILURE_POLICIES)[number];

export const TARGET_KINDS = ["main", "clang", "gcc", "cuda", "nvhpc"] as const;
export type TargetKind = (typeof TARGET_KINDS)[number];

export function isValidVersionToken(token: string): boolean {
  return VERSION_TOKEN_PATTERN.test(token);
}

/** clang versions are a major number or the development sentinel. */
export function isValidClangVersion(token: string): boolean {
  return token === CLANG_DEV_VERSION || /^\d+$/.test(token);
}

export function isValidImageRepo(repo: string): boolean {
  return IMAGE_REPO_PATTERN.test(repo);
}

/**
 * Validate an image repository root and throw if invalid.
 *
 * @throws ValidationError if the repository is not a valid reference.
 */
export function validateImageRepo(repo: string): string {
  if (!isValidImageRepo(repo)) {
    throw new ValidationError(
      `Invalid image repository '${repo}'. Expected e.g. 'org/name' or 'registry:5000/org/name'.`
    );
  }
  return repo;
}

/**
 * Parse a failure policy name.
 *
 * @throws ValidationError on anything other than abort/continue.
 */
export function parseFailurePolicy(value: string): FailurePolicy {
  const match = FAILURE_POLICIES.find((p) => p === value);
  if (!match) {
    throw new ValidationError(`Invalid failure policy '${value}'. Expected one of: ${FAILURE_POLICIES.join(", ")}`);
  }
  return match;
}

/**
 * Parse a target kind name.
 *
 * @throws ValidationError on unknown kinds.
 */
export function parseTargetKind(value: string): TargetKind {
  const match = TARGET_KINDS.find((k) => k === value);
  if (!match) {
    throw new ValidationError(`Invalid target kind '${value}'. Expected one of: ${TARGET_KINDS.join(", ")}`);
  }
  return match;
}
