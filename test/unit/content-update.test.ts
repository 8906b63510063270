import { expect } from "chai";
import * as fs from "node:fs";
import * as path from "node:path";
import { ChangelogBuilder, CHANGELOG_HEADER } from "../../src/core/changelog";
import { applyContentUpdate } from "../../src/core/content-update";
import { VersionStore } from "../../src/core/version-store";
import { InvalidVersionError, MalformedChangelogError } from "../../src/types/errors";
import { CARGO_MANIFEST, FakeGit, logCommand, logLine, makeTempDir } from "../helpers/fake-git";

describe("applyContentUpdate", () => {
  let dir: string;
  let store: VersionStore;
  let changelogFile: string;

  beforeEach(() => {
    dir = makeTempDir();
    store = new VersionStore(path.join(dir, "Cargo.toml"));
    changelogFile = path.join(dir, "CHANGELOG.md");
    fs.writeFileSync(store.manifestFile, CARGO_MANIFEST);
    fs.writeFileSync(changelogFile, CHANGELOG_HEADER);
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("skips content updates when there is no release", () => {
    const git = new FakeGit();
    const result = applyContentUpdate(store, new ChangelogBuilder(git, changelogFile), {
      version: undefined,
      newTag: "v1.2.4",
      sinceTag: "v1.2.3",
    });
    expect(result).to.equal(undefined);
    expect(git.calls).to.deep.equal([]);
    expect(fs.readFileSync(store.manifestFile, "utf8")).to.equal(CARGO_MANIFEST);
  });

  it("writes the version, then the changelog", () => {
    const git = new FakeGit({
      [logCommand("v1.2.3")]: logLine("abc123", "[Fix] typo", "Alice", "2026-10-01") + "\n",
    });
    const result = applyContentUpdate(store, new ChangelogBuilder(git, changelogFile), {
      version: { major: 1, minor: 2, patch: 4 },
      newTag: "v1.2.4",
      sinceTag: "v1.2.3",
      now: new Date(2026, 9, 19, 12),
    });
    expect(result?.version).to.equal("1.2.4");
    expect(result?.changelog.section).to.equal(
      "## [v1.2.4] 2026-10-19\n\n### Fix:\n- typo, Alice, 2026-10-01, abc123\n\n",
    );
    expect(store.getRelease()).to.deep.equal({ major: 1, minor: 2, patch: 4 });
  });

  it("does not bump the manifest when the changelog cannot be built", () => {
    fs.writeFileSync(changelogFile, "# Notes\n");
    expect(() =>
      applyContentUpdate(store, new ChangelogBuilder(new FakeGit(), changelogFile), {
        version: "1.2.4",
        newTag: "v1.2.4",
        sinceTag: "v1.2.3",
      }),
    ).to.throw(MalformedChangelogError);
    expect(fs.readFileSync(store.manifestFile, "utf8")).to.equal(CARGO_MANIFEST);
  });

  it("does not touch the changelog when the version is invalid", () => {
    const git = new FakeGit();
    expect(() =>
      applyContentUpdate(store, new ChangelogBuilder(git, changelogFile), {
        version: "1.2.x",
        newTag: "v1.2.x",
        sinceTag: "v1.2.3",
      }),
    ).to.throw(InvalidVersionError);
    expect(git.calls).to.deep.equal([]);
    expect(fs.readFileSync(changelogFile, "utf8")).to.equal(CHANGELOG_HEADER);
  });
});
