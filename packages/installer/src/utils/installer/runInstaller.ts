import { logAsyncOperation } from "@bugster-installer/shared/async/logAsyncOperation";
import { logInfo } from "@bugster-installer/shared/logger";
import { highlight, statusWarning } from "@bugster-installer/shared/theme";
import { join } from "path";
import { installBrowserDependencies } from "../browser/installBrowserDependencies";
import { InstallerError, getErrorMessage } from "../errors/InstallerError";
import {
  createTempDirectory,
  removeStaleTempDirectories,
} from "../installation/createTempDirectory";
import { extractArchive, findExtractedExecutable } from "../installation/extractArchive";
import { installExecutable } from "../installation/installExecutable";
import { verifyInstallation } from "../installation/verifyInstallation";
import { getOsCapabilities } from "../os/getOsCapabilities";
import { InstallationTarget, ShellConfigTarget } from "../os/types";
import { detectPlatformTarget } from "../platform/detectPlatformTarget";
import { PlatformTarget } from "../platform/types";
import { resolveReleaseVersion } from "../registry/resolveReleaseVersion";
import { provisionRuntime } from "../runtime/provisionRuntime";
import { ResolvedRuntime } from "../runtime/types";
import { patchShellConfig } from "../shell/patchShellConfig";
import { formatReleaseVersion, ReleaseVersion } from "../version/parseReleaseVersion";
import { InstallResult, InstallerDependencies } from "./types";

export async function runInstaller(
  version: ReleaseVersion,
  dependencies: InstallerDependencies
): Promise<InstallResult> {
  const { commands, env, homeDirectory, installDirectory, registry, tempRoot } = dependencies;

  const target = detectPlatformTarget(dependencies.host);
  if (target.isFallback) {
    console.log(
      statusWarning(
        `No build exists for ${target.os} (${target.hostArchitecture}); installing ${highlight(
          target.assetName
        )}, which may not run on this machine`
      )
    );
  }

  logInfo("RunInstaller:Started", { target, version: formatReleaseVersion(version) });

  await removeStaleTempDirectories({ root: tempRoot });

  const capabilities = getOsCapabilities(target, {
    commands,
    env,
    homeDirectory,
    installDirectory,
  });

  const runtimes: ResolvedRuntime[] = [];
  for (const requirement of dependencies.requiredRuntimes) {
    runtimes.push(
      await provisionRuntime(requirement, {
        capabilities,
        commands,
        confirm: dependencies.confirm,
        env,
        isInteractive: dependencies.isInteractive,
        os: target.os,
      })
    );
  }

  const node = runtimes.find(({ requirement }) => requirement.id === "node");
  if (dependencies.installBrowserDependencies && node) {
    await installBrowserDependencies(commands, { env, node, os: target.os });
  }

  const { degraded, tag } = await resolveReleaseVersion(version, registry);

  const installationTarget = capabilities.getInstallationTarget(target.binaryName);
  const tempDirectory = await createTempDirectory(tempRoot);

  // Removed on success and failure; an exit task covers Ctrl+C
  const { pathPatch, verifiedVersion } = await installRelease({
    dependencies,
    installationTarget,
    shellConfig: capabilities.resolveShellConfigPath(),
    tag,
    target,
    tempDirectory: tempDirectory.path,
  }).finally(() => tempDirectory.remove());

  const result: InstallResult = {
    degraded,
    executablePath: installationTarget.executablePath,
    pathPatch,
    runtimes,
    tag,
    target,
    verifiedVersion,
  };

  logInfo("RunInstaller:Finished", {
    degraded,
    executablePath: result.executablePath,
    pathStatus: pathPatch.status,
    tag,
  });

  return result;
}

async function installRelease({
  dependencies: { commands, registry, skipVerification },
  installationTarget,
  shellConfig,
  tag,
  target,
  tempDirectory,
}: {
  dependencies: InstallerDependencies;
  installationTarget: InstallationTarget;
  shellConfig: ShellConfigTarget;
  tag: string;
  target: PlatformTarget;
  tempDirectory: string;
}) {
  const archivePath = join(tempDirectory, target.assetName);

  const progress = logAsyncOperation(`Downloading ${target.assetName} (${tag})...`);
  try {
    await registry.downloadAsset(tag, target.assetName, archivePath, {
      onRetry: (attemptNumber, maxAttempts) =>
        progress.setPending(
          `Downloading ${target.assetName} (${tag}), attempt ${attemptNumber} of ${maxAttempts}...`
        ),
    });
    progress.setSuccess(`Downloaded ${target.assetName} (${tag})`);
  } catch (error) {
    progress.setFailed(`Download failed: ${getErrorMessage(error)}`);
    throw error;
  }

  const extracted = await extractArchive(archivePath, join(tempDirectory, "extracted"));
  const executable = findExtractedExecutable(extracted, target.binaryName);
  if (!executable) {
    throw new InstallerError(
      "download",
      `${target.assetName} (${tag}) does not contain ${target.binaryName}`
    );
  }

  await installExecutable(executable, installationTarget);

  const pathPatch = await patchShellConfig(shellConfig, installationTarget.directory);

  let verifiedVersion: string | undefined;
  if (skipVerification) {
    // An upgrade started by the CLI itself, which is still running
    logInfo("RunInstaller:VerificationSkipped", { tag });
  } else {
    verifiedVersion = verifyInstallation(installationTarget.executablePath, commands);
  }

  return { pathPatch, verifiedVersion };
}
