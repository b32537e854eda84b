export { executeInstall } from "./utils/installer/executeInstall";
export type { InstallOptions } from "./utils/installer/executeInstall";
export { runInstaller } from "./utils/installer/runInstaller";
export type { InstallerDependencies, InstallResult } from "./utils/installer/types";
export { detectPlatformTarget } from "./utils/platform/detectPlatformTarget";
export type { PlatformTarget } from "./utils/platform/types";
export { createGitHubRegistry } from "./utils/registry/createGitHubRegistry";
export type { ReleaseRegistry } from "./utils/registry/types";
export { isValidReleaseVersion, parseReleaseVersion } from "./utils/version/parseReleaseVersion";
export type { ReleaseVersion } from "./utils/version/parseReleaseVersion";
export { InstallerError } from "./utils/errors/InstallerError";
export type { InstallerErrorKind } from "./utils/errors/InstallerError";
