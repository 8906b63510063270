import { expect } from "chai";
import {
  compareVersions,
  formatVersion,
  parseVersion,
  validateVersion,
} from "../../src/core/version";
import { nextMajor, nextMinor, nextPatch, nextVersion, isBumpLevel } from "../../src/core/bump";
import { InvalidVersionError } from "../../src/types/errors";

describe("validateVersion", () => {
  it("accepts three numeric components", () => {
    expect(validateVersion("1.2.3")).to.equal(true);
    expect(validateVersion("0.0.0")).to.equal(true);
    expect(validateVersion("10.20.30")).to.equal(true);
  });

  it("rejects missing or empty components", () => {
    expect(validateVersion("1.2")).to.equal(false);
    expect(validateVersion("")).to.equal(false);
    expect(validateVersion("1..3")).to.equal(false);
    expect(validateVersion("1.2.3.4")).to.equal(false);
  });

  it("rejects non-numeric, signed and suffixed components", () => {
    expect(validateVersion("1.a.3")).to.equal(false);
    expect(validateVersion("1.-2.3")).to.equal(false);
    expect(validateVersion("v1.2.3")).to.equal(false);
    expect(validateVersion("1.2.3-rc.1")).to.equal(false);
  });

  it("rejects leading zeros and components beyond a safe integer", () => {
    expect(validateVersion("01.02.03")).to.equal(false);
    expect(validateVersion("1.0.00")).to.equal(false);
    expect(validateVersion("1.2.99999999999999999999")).to.equal(false);
    expect(validateVersion(`1.2.${Number.MAX_SAFE_INTEGER}`)).to.equal(true);
  });
});

describe("parseVersion / formatVersion", () => {
  it("parses into a tuple and formats back", () => {
    const v = parseVersion("4.5.6");
    expect(v).to.deep.equal({ major: 4, minor: 5, patch: 6 });
    expect(formatVersion(v)).to.equal("4.5.6");
  });

  it("throws InvalidVersionError on malformed input", () => {
    expect(() => parseVersion("1.2")).to.throw(InvalidVersionError, 'Invalid version "1.2"');
  });

  it("orders versions component by component", () => {
    expect(compareVersions(parseVersion("1.2.3"), parseVersion("1.2.4"))).to.equal(-1);
    expect(compareVersions(parseVersion("2.0.0"), parseVersion("1.9.9"))).to.equal(1);
    expect(compareVersions(parseVersion("1.2.3"), parseVersion("1.2.3"))).to.equal(0);
  });
});

describe("level bumps", () => {
  const v = { major: 1, minor: 4, patch: 7 };

  it("patch increments only the patch component", () => {
    expect(nextPatch(v)).to.deep.equal({ major: 1, minor: 4, patch: 8 });
  });

  it("minor increments minor and resets patch", () => {
    expect(nextMinor(v)).to.deep.equal({ major: 1, minor: 5, patch: 0 });
  });

  it("major increments major and resets minor and patch", () => {
    expect(nextMajor(v)).to.deep.equal({ major: 2, minor: 0, patch: 0 });
  });

  it("does not mutate its input", () => {
    nextVersion(v, "major");
    expect(v).to.deep.equal({ major: 1, minor: 4, patch: 7 });
  });

  it("recognises bump levels", () => {
    expect(isBumpLevel("minor")).to.equal(true);
    expect(isBumpLevel("prerelease")).to.equal(false);
  });
});
