import { logInfo, logWarning } from "@bugster-installer/shared/logger";
import { highlight, statusWarning } from "@bugster-installer/shared/theme";
import { fallbackVersion, githubDownloadHost, releaseRepository } from "../../config";
import { InstallerError } from "../errors/InstallerError";
import { ReleaseVersion } from "../version/parseReleaseVersion";
import { ReleaseRegistry } from "./types";

export type ResolvedReleaseVersion = {
  // Set when the latest release could not be looked up and the fallback was used instead
  degraded: boolean;
  tag: string;
};

export async function resolveReleaseVersion(
  version: ReleaseVersion,
  registry: ReleaseRegistry
): Promise<ResolvedReleaseVersion> {
  if (version.type === "tag") {
    const exists = await registry.hasRelease(version.tag);
    if (!exists) {
      logInfo("ResolveReleaseVersion:NotFound", { tag: version.tag });

      throw new InstallerError("registry", `Version ${version.tag} does not exist`, [
        `Available versions are listed at ${githubDownloadHost}/${releaseRepository}/releases`,
      ]);
    }

    return { degraded: false, tag: version.tag };
  }

  try {
    const tag = await registry.getLatestTag();

    return { degraded: false, tag };
  } catch (error) {
    logWarning("ResolveReleaseVersion:UsingFallback", { error, fallbackVersion });

    console.log(
      statusWarning(
        `Could not determine the latest version; installing ${highlight(fallbackVersion)} instead`
      )
    );

    return { degraded: true, tag: fallbackVersion };
  }
}
