import { InstallerError } from "../errors/InstallerError";
import {
  isValidReleaseVersion,
  parseReleaseTag,
  parseReleaseVersion,
} from "./parseReleaseVersion";

describe("parseReleaseVersion", () => {
  it("should accept latest and tagged releases", () => {
    for (const token of ["latest", "v1.2.3", "v1.2.3-beta.4", "v1.2.3-rc.1", "v1.2.3-alpha.2"]) {
      expect(isValidReleaseVersion(token)).toBe(true);
    }
  });

  it("should reject malformed tokens", () => {
    for (const token of ["1.2.3", "v1.2", "v1.2.3-beta", "", "v1.2.3-preview.1", " v1.2.3"]) {
      expect(isValidReleaseVersion(token)).toBe(false);
    }
  });

  it("should parse the latest marker", () => {
    expect(parseReleaseVersion("latest")).toEqual({ type: "latest" });
  });

  it("should parse a stable tag", () => {
    expect(parseReleaseVersion("v0.3.25")).toEqual({
      type: "tag",
      tag: "v0.3.25",
      major: 0,
      minor: 3,
      patch: 25,
      prerelease: undefined,
    });
  });

  it("should parse a pre-release tag", () => {
    expect(parseReleaseTag("v1.2.3-beta.4")?.prerelease).toEqual({ channel: "beta", number: 4 });
  });

  it("should throw an input error listing valid examples", () => {
    let thrown: unknown;
    try {
      parseReleaseVersion("1.2.3");
    } catch (error) {
      thrown = error;
    }

    expect(thrown).toBeInstanceOf(InstallerError);
    expect(thrown).toMatchObject({
      kind: "input",
      message: 'Invalid version format: "1.2.3"',
    });
    expect(thrown instanceof InstallerError && thrown.hints).toContain("  - v0.2.8-beta.1");
  });
});
