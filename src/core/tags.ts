import type { SourceControl } from "./git";
import { formatVersion, type Version } from "./version";
import { MissingTagError, TagExistsError } from "../types/errors";

export class TagInspector {
  constructor(
    private readonly git: SourceControl,
    readonly tagPrefix: string = "v",
  ) {}

  tagFor(version: Version): string {
    return this.tagPrefix + formatVersion(version);
  }

  listTags(): string[] {
    return lines(this.git.run(["tag", "--list"]));
  }

  tagExists(tag: string): boolean {
    return this.listTags().includes(tag);
  }

  /** Closest tag reachable from HEAD, without the distance/hash suffix. */
  lastTag(): string {
    if (this.listTags().length === 0) {
      throw new MissingTagError("Repository has no tags");
    }
    return this.git.run(["describe", "--tags", "--abbrev=0"]).trim();
  }

  hasUncommittedChanges(): boolean {
    return this.git.run(["status", "--porcelain"]).trim().length > 0;
  }

  /** True when the release has no tag, or the working tree differs from it. */
  differsFromRelease(version: Version): boolean {
    const tag = this.tagFor(version);
    if (!this.tagExists(tag)) return true;
    return this.git.run(["diff", "--stat", tag]).trim().length > 0;
  }

  shortHash(rev = "HEAD"): string {
    return this.git.run(["rev-parse", "--short", rev]).trim();
  }

  createTag(tag: string, message: string): void {
    if (this.tagExists(tag)) throw new TagExistsError(tag);
    this.git.run(["tag", "-a", tag, "-m", message]);
  }

  commitFiles(files: string[], message: string): void {
    this.git.run(["add", "--", ...files]);
    this.git.run(["commit", "-m", message, "--", ...files]);
  }
}

function lines(output: string): string[] {
  return output
    .split("\n")
    .map((l) => l.trim())
    .filter(Boolean);
}
