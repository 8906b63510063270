import semver from "semver";
import { InvalidVersionError } from "../types/errors";
import { formatVersion, parseVersion, type Version } from "./version";

export type BumpLevel = "patch" | "minor" | "major";

export const BUMP_LEVELS: readonly BumpLevel[] = ["patch", "minor", "major"];

export function isBumpLevel(input: string): input is BumpLevel {
  return (BUMP_LEVELS as readonly string[]).includes(input);
}

/**
 * Next release for `level`:
 *  - patch: (M, m, p) -> (M, m, p + 1)
 *  - minor: (M, m, p) -> (M, m + 1, 0)
 *  - major: (M, m, p) -> (M + 1, 0, 0)
 */
export function nextVersion(current: Version, level: BumpLevel): Version {
  const next = semver.inc(formatVersion(current), level);
  if (!next) {
    throw new InvalidVersionError(`semver could not increment ${formatVersion(current)}`);
  }
  return parseVersion(next);
}

export const nextPatch = (v: Version) => nextVersion(v, "patch");
export const nextMinor = (v: Version) => nextVersion(v, "minor");
export const nextMajor = (v: Version) => nextVersion(v, "major");
