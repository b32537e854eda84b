import { OsId } from "../platform/types";

export type RuntimeId = "node" | "python";

export type RuntimeRequirement = {
  id: RuntimeId;
  displayName: string;
  // Lowest acceptable version (semver)
  floor: string;
  // Exact version installed when nothing on the machine meets the floor
  pinnedVersion: string;
  downloadPage: string;
  getCandidates: (options: { env: NodeJS.ProcessEnv; os: OsId }) => string[];
};

export type ResolvedRuntime = {
  command: string;
  requirement: RuntimeRequirement;
  version: string;
};

export type RuntimeProbe = {
  runtime: ResolvedRuntime | undefined;
  // Installed candidates that were found but are older than the floor
  outdated: Array<{ command: string; version: string }>;
};
