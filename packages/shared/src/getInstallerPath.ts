import assert from "node:assert/strict";
import { join, resolve } from "path";

export function getInstallerPath(...path: string[]) {
  let basePath;
  if (process.env.BUGSTER_INSTALLER_DIRECTORY) {
    basePath = process.env.BUGSTER_INSTALLER_DIRECTORY;
  } else {
    const homeDirectory = process.env.HOME || process.env.USERPROFILE;
    assert(homeDirectory, "HOME or USERPROFILE environment variable must be set");

    basePath = join(homeDirectory, ".bugster");
  }

  return resolve(join(basePath, ...path));
}
