export const releaseRepository =
  process.env.BUGSTER_INSTALLER_REPOSITORY || "Bugsterapp/bugster-cli";
export const githubApiHost = process.env.BUGSTER_INSTALLER_GITHUB_API || "https://api.github.com";
export const githubDownloadHost =
  process.env.BUGSTER_INSTALLER_GITHUB_HOST || "https://github.com";
export const githubToken = process.env.GITHUB_TOKEN || undefined;

// Used when the latest release can't be looked up; bump alongside releases
export const fallbackVersion = "v0.3.25";

export const binaryName = "bugster";

export const installDirectoryOverride = process.env.BUGSTER_INSTALL_DIR || undefined;
export const requiredRuntimeIds = process.env.BUGSTER_REQUIRED_RUNTIMES || "node";
export const skipBrowserInstall = !!process.env.BUGSTER_SKIP_BROWSER_INSTALL;
export const isUpgradeInProgress = !!process.env.BUGSTER_UPGRADE_IN_PROGRESS;

export const registryTimeoutMs = 10_000;
export const downloadTimeoutMs = 5 * 60_000;
export const maxNetworkAttempts = 3;
export const verificationTimeoutMs = 30_000;
export const staleTempDirectoryAgeMs = 24 * 60 * 60_000;
