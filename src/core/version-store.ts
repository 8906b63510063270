import * as fs from "node:fs";
import { writeFileAtomic } from "./atomic-write";
import { formatVersion, parseVersion, validateVersion, type Version } from "./version";
import { InvalidVersionError, ManifestError } from "../types/errors";

// First `version = "..."` line; the package table precedes dependency tables.
const VERSION_LINE = /^(version\s*=\s*")([^"]*)(")/m;

/** Owns the version declaration of a single manifest file. */
export class VersionStore {
  constructor(readonly manifestFile: string) {}

  getRelease(): Version {
    const match = VERSION_LINE.exec(this.read());
    if (!match) {
      throw new InvalidVersionError(
        `No version declaration found in ${this.manifestFile}`,
      );
    }
    return parseVersion(match[2]);
  }

  setRelease(version: Version | string): void {
    const value = typeof version === "string" ? version : formatVersion(version);
    if (!validateVersion(value)) {
      throw new InvalidVersionError(
        `Refusing to write invalid version "${value}" to ${this.manifestFile}`,
      );
    }
    const text = this.read();
    if (!VERSION_LINE.test(text)) {
      throw new InvalidVersionError(
        `No version declaration found in ${this.manifestFile}`,
      );
    }
    writeFileAtomic(
      this.manifestFile,
      text.replace(VERSION_LINE, (_m, head: string, _old: string, tail: string) => head + value + tail),
    );
  }

  /** Raw manifest text, for {@link restore}. */
  readManifest(): string {
    return this.read();
  }

  restore(text: string): void {
    writeFileAtomic(this.manifestFile, text);
  }

  private read(): string {
    try {
      return fs.readFileSync(this.manifestFile, "utf8");
    } catch (err: unknown) {
      throw new ManifestError(
        `Cannot read manifest ${this.manifestFile}: ` +
          (err instanceof Error ? err.message : String(err)),
      );
    }
  }
}
