import { logDebug, logInfo, logWarning } from "@bugster-installer/shared/logger";
import { registerExitTask } from "@bugster-installer/shared/process/exitTasks";
import { mkdtemp, readdir, remove, stat } from "fs-extra";
import { tmpdir } from "os";
import { join } from "path";
import { staleTempDirectoryAgeMs } from "../../config";

export const TEMP_DIRECTORY_PREFIX = "bugster-install-";

export type TempDirectory = {
  path: string;
  remove: () => Promise<void>;
};

// Runs that were killed before their cleanup leave directories behind
export async function removeStaleTempDirectories({
  maxAgeMs = staleTempDirectoryAgeMs,
  now = Date.now(),
  root = tmpdir(),
}: {
  maxAgeMs?: number;
  now?: number;
  root?: string;
} = {}): Promise<string[]> {
  const removed: string[] = [];

  let names: string[];
  try {
    names = await readdir(root);
  } catch (error) {
    logWarning("RemoveStaleTempDirectories:ReadFailed", { error, root });
    return removed;
  }

  for (const name of names) {
    if (!name.startsWith(TEMP_DIRECTORY_PREFIX)) {
      continue;
    }

    const path = join(root, name);
    try {
      const stats = await stat(path);
      if (stats.isDirectory() && now - stats.mtimeMs > maxAgeMs) {
        await remove(path);
        removed.push(path);
      }
    } catch (error) {
      logWarning("RemoveStaleTempDirectories:RemoveFailed", { error, path });
    }
  }

  if (removed.length > 0) {
    logInfo("RemoveStaleTempDirectories:Removed", { removed });
  }

  return removed;
}

export async function createTempDirectory(root: string = tmpdir()): Promise<TempDirectory> {
  const path = await mkdtemp(join(root, TEMP_DIRECTORY_PREFIX));

  const removeDirectory = async () => {
    logDebug("CreateTempDirectory:Removing", { path });
    await remove(path);
  };

  // Also covers Ctrl+C, which skips the caller's finally block
  const unregister = registerExitTask(removeDirectory);

  logDebug("CreateTempDirectory:Created", { path });

  return {
    path,
    remove: async () => {
      unregister();
      await removeDirectory();
    },
  };
}
