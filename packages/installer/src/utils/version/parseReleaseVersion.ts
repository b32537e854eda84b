import { InstallerError } from "../errors/InstallerError";

export type PrereleaseChannel = "alpha" | "beta" | "rc";

export type ReleaseTag = {
  type: "tag";
  tag: string;
  major: number;
  minor: number;
  patch: number;
  prerelease: { channel: PrereleaseChannel; number: number } | undefined;
};

export type ReleaseVersion = { type: "latest" } | ReleaseTag;

const LATEST = "latest";
const TAG_PATTERN = /^v(\d+)\.(\d+)\.(\d+)(?:-(beta|rc|alpha)\.(\d+))?$/;

export const VALID_VERSION_EXAMPLES = [
  "v0.2.8",
  "v0.2.8-beta.1",
  "v0.2.8-rc.1",
  "v0.2.8-alpha.1",
  "latest",
];

export function parseReleaseTag(token: string): ReleaseTag | undefined {
  const match = TAG_PATTERN.exec(token);
  if (!match) {
    return undefined;
  }

  const [, major, minor, patch, channel, prereleaseNumber] = match;

  return {
    type: "tag",
    tag: token,
    major: Number(major),
    minor: Number(minor),
    patch: Number(patch),
    prerelease: isPrereleaseChannel(channel)
      ? { channel, number: Number(prereleaseNumber) }
      : undefined,
  };
}

export function parseReleaseVersion(token: string): ReleaseVersion {
  if (token === LATEST) {
    return { type: "latest" };
  }

  const tag = parseReleaseTag(token);
  if (!tag) {
    throw new InstallerError(
      "input",
      `Invalid version format: "${token}"`,
      ["Examples of valid versions:", ...VALID_VERSION_EXAMPLES.map(example => `  - ${example}`)]
    );
  }

  return tag;
}

export function isValidReleaseVersion(token: string): boolean {
  return token === LATEST || TAG_PATTERN.test(token);
}

export function formatReleaseVersion(version: ReleaseVersion): string {
  return version.type === "latest" ? LATEST : version.tag;
}

function isPrereleaseChannel(value: string | undefined): value is PrereleaseChannel {
  return value === "alpha" || value === "beta" || value === "rc";
}
