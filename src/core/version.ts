import { InvalidVersionError } from "../types/errors";

export interface Version {
  major: number;
  minor: number;
  patch: number;
}

const COMPONENT = /^(0|[1-9]\d*)$/;

/**
 * True when `input` has exactly three dot-separated components, each a
 * non-empty unsigned decimal integer without leading zeros that fits in a
 * safe integer. Prerelease and build suffixes are rejected: the manifest
 * only ever carries a plain release.
 */
export function validateVersion(input: string): boolean {
  const parts = input.split(".");
  if (parts.length !== 3) return false;
  return parts.every(
    (p) => COMPONENT.test(p) && Number(p) <= Number.MAX_SAFE_INTEGER,
  );
}

export function parseVersion(input: string): Version {
  if (!validateVersion(input)) {
    throw new InvalidVersionError(
      `Invalid version "${input}". Expected MAJOR.MINOR.PATCH`,
    );
  }
  const [major, minor, patch] = input.split(".").map((p) => Number(p));
  return { major, minor, patch };
}

export function formatVersion(v: Version): string {
  return `${v.major}.${v.minor}.${v.patch}`;
}

export function compareVersions(a: Version, b: Version): -1 | 0 | 1 {
  for (const key of ["major", "minor", "patch"] as const) {
    if (a[key] > b[key]) return 1;
    if (a[key] < b[key]) return -1;
  }
  return 0;
}
