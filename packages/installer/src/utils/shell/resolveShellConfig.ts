import { existsSync } from "fs-extra";
import { basename, join, win32 } from "path";
import { OsFamily } from "../platform/types";
import { ShellConfigTarget, ShellKind } from "../os/types";

type Options = {
  env: NodeJS.ProcessEnv;
  exists?: (path: string) => boolean;
  family: OsFamily;
  homeDirectory: string;
};

export function getShellKind(shellPath: string | undefined): ShellKind {
  switch (shellPath ? basename(shellPath) : "") {
    case "zsh":
      return "zsh";
    case "bash":
      return "bash";
    case "fish":
      return "fish";
    default:
      return "sh";
  }
}

export function resolveShellConfig({
  env,
  exists = existsSync,
  family,
  homeDirectory,
}: Options): ShellConfigTarget {
  if (family === "windows") {
    // PowerShell 7 sets this; Windows PowerShell 5 does not
    const profileDirectory = env.POWERSHELL_DISTRIBUTION_CHANNEL
      ? "PowerShell"
      : "WindowsPowerShell";

    return {
      configPath: win32.join(
        homeDirectory,
        "Documents",
        profileDirectory,
        "Microsoft.PowerShell_profile.ps1"
      ),
      shell: "powershell",
    };
  }

  const shell = getShellKind(env.SHELL);
  switch (shell) {
    case "zsh": {
      const zshrc = join(homeDirectory, ".zshrc");
      return {
        configPath: exists(zshrc) ? zshrc : join(homeDirectory, ".zprofile"),
        shell,
      };
    }
    case "bash": {
      const bashProfile = join(homeDirectory, ".bash_profile");
      return {
        configPath: exists(bashProfile) ? bashProfile : join(homeDirectory, ".bashrc"),
        shell,
      };
    }
    case "fish":
      return {
        configPath: join(homeDirectory, ".config", "fish", "config.fish"),
        shell,
      };
    default:
      return {
        configPath: join(homeDirectory, ".profile"),
        shell,
      };
  }
}
