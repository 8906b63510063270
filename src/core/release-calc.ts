import { nextVersion, type BumpLevel } from "./bump";
import type { TagInspector } from "./tags";
import { formatVersion, type Version } from "./version";
import type { VersionStore } from "./version-store";

export interface ReleaseContext {
  store: VersionStore;
  tags: TagInspector;
}

export interface ReleaseCalcResult {
  current: Version;
  next: Version;
  tag: string;
  sinceTag: string;
}

/**
 * Display version for the working tree:
 *  - `1.2.3` on a clean checkout of tag v1.2.3
 *  - `1.2.3-<hash>` when the tree differs from that tag (or it is missing)
 *  - `-dirty` appended when there are uncommitted changes
 */
export function resolveCurrentVersion(ctx: ReleaseContext): string {
  const release = ctx.store.getRelease();
  let out = formatVersion(release);
  if (ctx.tags.differsFromRelease(release)) {
    out += "-" + ctx.tags.shortHash("HEAD");
  }
  if (ctx.tags.hasUncommittedChanges()) {
    out += "-dirty";
  }
  return out;
}

/**
 * Works out the target of a `level` bump and the tag the changelog range
 * starts from. Nothing is written.
 */
export function calculateRelease(
  ctx: ReleaseContext,
  level: BumpLevel,
): ReleaseCalcResult {
  const current = ctx.store.getRelease();
  const next = nextVersion(current, level);
  return {
    current,
    next,
    tag: ctx.tags.tagFor(next),
    sinceTag: ctx.tags.lastTag(),
  };
}
