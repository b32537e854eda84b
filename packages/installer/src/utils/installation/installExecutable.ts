import { logInfo, logWarning } from "@bugster-installer/shared/logger";
import { chmod, copy, ensureDir, pathExists, remove, rename } from "fs-extra";
import { InstallerError, getErrorMessage } from "../errors/InstallerError";
import { InstallationTarget } from "../os/types";

export async function installExecutable(
  sourcePath: string,
  { directory, executablePath }: InstallationTarget
) {
  const newPath = `${executablePath}.new`;
  const oldPath = `${executablePath}.old`;

  try {
    await ensureDir(directory);

    // Stage next to the target so the final rename never crosses file systems
    await copy(sourcePath, newPath, { overwrite: true });
    await chmod(newPath, 0o755);

    const replacing = await pathExists(executablePath);
    if (replacing) {
      await remove(oldPath);
      await rename(executablePath, oldPath);
    }

    try {
      await rename(newPath, executablePath);
    } catch (error) {
      if (replacing) {
        await rename(oldPath, executablePath);
      }
      throw error;
    }

    if (replacing) {
      // Windows won't delete an executable that is still running; the next install retries
      await remove(oldPath).catch(error => {
        logWarning("InstallExecutable:RemoveOldFailed", { error, oldPath });
      });
    }

    logInfo("InstallExecutable:Installed", { executablePath, replaced: replacing });
  } catch (error) {
    await remove(newPath).catch(cleanupError => {
      logWarning("InstallExecutable:CleanupFailed", { error: cleanupError, newPath });
    });

    throw new InstallerError(
      "install",
      `Could not install ${executablePath}: ${getErrorMessage(error)}`,
      [
        `Check that you can write to ${directory}`,
        "Set BUGSTER_INSTALL_DIR to install into a different directory.",
      ],
      error
    );
  }
}
