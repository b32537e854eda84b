import { logError, logInfo } from "@bugster-installer/shared/logger";
import {
  dim,
  emphasize,
  highlight,
  statusFailed,
  statusSuccess,
} from "@bugster-installer/shared/theme";
import { InstallerError, getErrorMessage } from "../errors/InstallerError";
import { parseReleaseVersion } from "../version/parseReleaseVersion";
import { getDefaultDependencies } from "./getDefaultDependencies";
import { runInstaller } from "./runInstaller";
import { InstallResult, InstallerDependencies } from "./types";

export type InstallOptions = {
  version: string;
  yes: boolean;
};

function printResult({ executablePath, pathPatch, tag, verifiedVersion }: InstallResult) {
  console.log(
    `${statusSuccess("✔")} Installed ${emphasize(`bugster ${tag}`)} to ${highlight(executablePath)}`
  );

  if (verifiedVersion) {
    console.log(dim(`  ${verifiedVersion}`));
  }

  if (pathPatch.status === "added") {
    console.log(`Added to PATH in ${highlight(pathPatch.configPath)}`);
    console.log(dim("Restart your terminal (or reload that file) to use the bugster command."));
  }
}

function printError(error: unknown) {
  console.error(`${statusFailed("✘")} ${getErrorMessage(error)}`);

  if (error instanceof InstallerError) {
    error.hints.forEach(hint => console.error(dim(hint)));
  }
}

// Resolves to the process exit code
export async function executeInstall(
  options: InstallOptions,
  overrides: Partial<InstallerDependencies> = {}
): Promise<number> {
  try {
    // Rejected before anything is touched
    const version = parseReleaseVersion(options.version);

    const dependencies = { ...getDefaultDependencies(options), ...overrides };
    const result = await runInstaller(version, dependencies);

    printResult(result);

    logInfo("Install:Succeeded", { degraded: result.degraded, tag: result.tag });

    return 0;
  } catch (error) {
    logError("Install:Failed", { error });

    printError(error);

    return 1;
  }
}
