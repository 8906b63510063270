import { parseArgs } from "node:util";
import * as path from "node:path";
import type { ReleaseConfig } from "../config";
import { isBumpLevel, nextVersion, BUMP_LEVELS } from "../core/bump";
import { ChangelogBuilder, type ChangelogResult } from "../core/changelog";
import { applyContentUpdate } from "../core/content-update";
import type { SourceControl } from "../core/git";
import { calculateRelease, resolveCurrentVersion } from "../core/release-calc";
import { TagInspector } from "../core/tags";
import { compareVersions, formatVersion, parseVersion, type Version } from "../core/version";
import { VersionStore } from "../core/version-store";
import { ConfigError, TagExistsError } from "../types/errors";

export const LOG_PREFIX = "[release-ledger]";

export const USAGE = `usage:
  release-ledger current
  release-ledger next <patch|minor|major>
  release-ledger bump <patch|minor|major> [--init] [--commit] [--tag]
  release-ledger set <x.y.z> [--init] [--commit] [--tag]
  release-ledger changelog <newTag> [sinceTag] [--init]`;

export interface CliIO {
  /** Machine-readable result, unprefixed. */
  stdout(line: string): void;
  log(message: string): void;
  warn(message: string): void;
}

export const consoleIO: CliIO = {
  stdout: (line) => console.log(line),
  log: (message) => console.log(`${LOG_PREFIX} ${message}`),
  warn: (message) => console.error(`${LOG_PREFIX} warning: ${message}`),
};

export interface CommandDeps {
  config: ReleaseConfig;
  git: SourceControl;
  io?: CliIO;
  now?: Date;
}

interface Flags {
  init: boolean;
  commit: boolean;
  tag: boolean;
}

export function runReleaseCommand(argv: string[], deps: CommandDeps): void {
  const io = deps.io ?? consoleIO;
  const { values, positionals } = parseArgs({
    args: argv,
    allowPositionals: true,
    strict: true,
    options: {
      init: { type: "boolean", default: false },
      commit: { type: "boolean", default: false },
      tag: { type: "boolean", default: false },
    },
  });
  const flags: Flags = {
    init: values.init ?? false,
    commit: values.commit ?? false,
    tag: values.tag ?? false,
  };
  const [command, ...args] = positionals;

  const store = new VersionStore(deps.config.manifestFile);
  const tags = new TagInspector(deps.git, deps.config.tagPrefix);
  const changelog = new ChangelogBuilder(deps.git, deps.config.changelogFile);
  const ctx = { store, tags };

  switch (command) {
    case "current":
      io.stdout(resolveCurrentVersion(ctx));
      return;
    case "next": {
      const level = requireLevel(args[0]);
      io.stdout(formatVersion(nextVersion(store.getRelease(), level)));
      return;
    }
    case "bump": {
      const calc = calculateRelease(ctx, requireLevel(args[0]));
      release(calc.next, calc.sinceTag);
      return;
    }
    case "set": {
      const target = parseVersion(requireArg(args[0], "version"));
      const current = store.getRelease();
      if (compareVersions(target, current) <= 0) {
        io.warn(
          `${formatVersion(target)} is not newer than ${formatVersion(current)}`,
        );
      }
      release(target, tags.lastTag());
      return;
    }
    case "changelog": {
      const newTag = requireArg(args[0], "newTag");
      const sinceTag = args[1] ?? tags.lastTag();
      report(changelog.generate({ newTag, sinceTag, init: flags.init, now: deps.now }));
      return;
    }
    default:
      throw new ConfigError(
        (command ? `Unknown command "${command}"\n` : "") + USAGE,
      );
  }

  function release(target: Version, sinceTag: string): void {
    const tag = tags.tagFor(target);
    if (tags.tagExists(tag)) throw new TagExistsError(tag);

    const result = applyContentUpdate(store, changelog, {
      version: target,
      newTag: tag,
      sinceTag,
      init: flags.init,
      now: deps.now,
    });
    if (!result) return;
    io.log(`${path.basename(store.manifestFile)} set to ${result.version}`);
    report(result.changelog);

    if (flags.commit) {
      tags.commitFiles(
        [store.manifestFile, changelog.file],
        `chore(release): ${tag}`,
      );
      io.log(`committed release ${tag}`);
    }
    if (flags.tag) {
      tags.createTag(tag, `Release ${tag}`);
      io.log(`created tag ${tag}`);
    }
    io.stdout(result.version);
  }

  function report(result: ChangelogResult): void {
    io.log(
      `${path.basename(result.file)} updated with ${result.entries.length} entries`,
    );
    for (const line of result.skipped) {
      io.warn(`skipped commit without [Category] prefix: ${line}`);
    }
  }
}

function requireArg(value: string | undefined, name: string): string {
  if (!value) throw new ConfigError(`Missing <${name}>\n${USAGE}`);
  return value;
}

function requireLevel(value: string | undefined) {
  const level = requireArg(value, "level");
  if (!isBumpLevel(level)) {
    throw new ConfigError(
      `Unknown level "${level}", expected one of ${BUMP_LEVELS.join("|")}`,
    );
  }
  return level;
}
