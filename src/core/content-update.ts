// Combines manifest version bump + changelog regeneration
import type { ChangelogBuilder, ChangelogResult } from "./changelog";
import { formatVersion, validateVersion, type Version } from "./version";
import { InvalidVersionError } from "../types/errors";
import type { VersionStore } from "./version-store";

export interface ContentUpdateInput {
  version: Version | string | undefined;
  newTag: string;
  sinceTag: string;
  init?: boolean;
  now?: Date;
}

export interface ContentUpdateResult {
  version: string;
  changelog: ChangelogResult;
}

export function applyContentUpdate(
  store: VersionStore,
  changelog: ChangelogBuilder,
  input: ContentUpdateInput,
): ContentUpdateResult | undefined {
  if (input.version === undefined) {
    // No release scenario, skip content updates.
    return undefined;
  }
  const value =
    typeof input.version === "string" ? input.version : formatVersion(input.version);
  if (!validateVersion(value)) {
    throw new InvalidVersionError(`Refusing to release invalid version "${value}"`);
  }
  // Everything that can fail in the changelog step runs before the manifest
  // is written; a failed write puts the previous manifest back.
  const pending = changelog.prepare({
    newTag: input.newTag,
    sinceTag: input.sinceTag,
    init: input.init,
    now: input.now,
  });
  const previous = store.readManifest();
  store.setRelease(value);
  try {
    pending.write();
  } catch (err: unknown) {
    store.restore(previous);
    throw err;
  }
  return { version: value, changelog: pending.result };
}
