import { logDebug } from "@bugster-installer/shared/logger";
import { spawnProcess } from "@bugster-installer/shared/spawnProcess";
import { spawnSync } from "child_process";
import { existsSync } from "fs-extra";
import { isAbsolute } from "path";
import { CommandResult, CommandRunner } from "./types";

const isWindows = process.platform === "win32";

// Commands run through cmd.exe on Windows, which splits unquoted paths at spaces
function toShellCommand(command: string) {
  return isWindows && command.includes(" ") ? `"${command}"` : command;
}

export const systemCommandRunner: CommandRunner = {
  capture(command, args, { timeoutMs = 10_000 } = {}): CommandResult {
    const result = spawnSync(toShellCommand(command), args, {
      encoding: "utf8",
      // npm, npx and friends are .cmd shims on Windows
      shell: isWindows,
      timeout: timeoutMs,
      windowsHide: true,
    });

    logDebug("CommandRunner:Captured", { args, command, status: result.status });

    return {
      error: result.error,
      status: result.status,
      stderr: result.stderr ?? "",
      stdout: result.stdout ?? "",
    };
  },

  isAvailable(command) {
    if (isAbsolute(command)) {
      return existsSync(command);
    }

    const result = spawnSync(isWindows ? "where" : "which", [command], {
      stdio: "ignore",
      windowsHide: true,
    });
    return result.status === 0;
  },

  async run(command, args, { env } = {}) {
    logDebug("CommandRunner:Running", { args, command });

    await spawnProcess(toShellCommand(command), args, { env, shell: isWindows }).promise;
  },
};
