import { logInfo, logWarning } from "@bugster-installer/shared/logger";
import { existsSync } from "fs-extra";
import { verificationTimeoutMs } from "../../config";
import { InstallerError } from "../errors/InstallerError";
import { CommandRunner } from "../system/types";

export function verifyInstallation(executablePath: string, commands: CommandRunner): string {
  if (!existsSync(executablePath)) {
    throw new InstallerError("verification", `${executablePath} does not exist after installing`);
  }

  const { error, status, stderr, stdout } = commands.capture(executablePath, ["--version"], {
    timeoutMs: verificationTimeoutMs,
  });

  if (error || status !== 0) {
    logWarning("VerifyInstallation:Failed", { error, executablePath, status, stderr });

    const reason = error ? error.message : `exit code ${status}`;
    throw new InstallerError(
      "verification",
      `${executablePath} --version failed (${reason})`,
      [
        stderr.trim(),
        `Try running ${executablePath} --version yourself to see what went wrong.`,
      ].filter(Boolean),
      error
    );
  }

  const output = stdout.trim();

  logInfo("VerifyInstallation:Verified", { executablePath, output });

  return output;
}
