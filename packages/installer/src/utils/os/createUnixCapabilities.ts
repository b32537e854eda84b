import { join } from "path";
import { Architecture } from "../platform/types";
import { formatMinimumVersion, getMajorVersion } from "../runtime/requirements";
import { RuntimeRequirement } from "../runtime/types";
import { resolveShellConfig } from "../shell/resolveShellConfig";
import { CommandRunner } from "../system/types";
import { runProvisionSteps } from "./runProvisionSteps";
import { OsCapabilities, PackageManager, PackageManagerId, ProvisionStep } from "./types";

const HOMEBREW_INSTALL_SCRIPT =
  "https://raw.githubusercontent.com/Homebrew/install/HEAD/install.sh";

const LINUX_PACKAGE_MANAGERS: PackageManagerId[] = ["apt-get", "dnf", "yum", "pacman", "zypper"];

export function createUnixCapabilities({
  architecture,
  commands,
  env,
  homeDirectory,
  installDirectory,
  os,
  useSudo = process.getuid?.() !== 0,
}: {
  architecture: Architecture;
  commands: CommandRunner;
  env: NodeJS.ProcessEnv;
  homeDirectory: string;
  installDirectory?: string;
  os: "macos" | "linux";
  useSudo?: boolean;
}): OsCapabilities {
  const elevated = (command: string, args: string[], description: string): ProvisionStep =>
    useSudo
      ? { args: [command, ...args], command: "sudo", description }
      : { args, command, description };

  const pipeToShell = (url: string, description: string): ProvisionStep => ({
    args: ["-c", `curl -fsSL ${url} | ${useSudo ? "sudo -E bash -" : "bash -"}`],
    command: "bash",
    description,
  });

  function planNodeInstall(
    { pinnedVersion }: RuntimeRequirement,
    packageManager: PackageManager
  ): ProvisionStep[] {
    const major = getMajorVersion(pinnedVersion);
    const { command } = packageManager;
    const install = `Install Node.js ${major}`;

    switch (packageManager.id) {
      case "brew":
        return [
          { args: ["install", `node@${major}`], command, description: install },
          {
            args: ["link", "--force", "--overwrite", `node@${major}`],
            command,
            description: `Link Node.js ${major}`,
          },
        ];
      case "apt-get":
        return [
          pipeToShell(
            `https://deb.nodesource.com/setup_${major}.x`,
            "Add the NodeSource repository"
          ),
          elevated("apt-get", ["install", "-y", "nodejs"], install),
        ];
      case "dnf":
      case "yum":
        return [
          pipeToShell(
            `https://rpm.nodesource.com/setup_${major}.x`,
            "Add the NodeSource repository"
          ),
          elevated(packageManager.id, ["install", "-y", "nodejs"], install),
        ];
      case "pacman":
        return [elevated("pacman", ["-Sy", "--noconfirm", "nodejs", "npm"], install)];
      case "zypper":
        return [
          elevated(
            "zypper",
            ["--non-interactive", "install", `nodejs${major}`, `npm${major}`],
            install
          ),
        ];
      default:
        return [];
    }
  }

  function planPythonInstall(
    { pinnedVersion }: RuntimeRequirement,
    packageManager: PackageManager
  ): ProvisionStep[] {
    const [major, minor] = pinnedVersion.split(".");
    const version = `${major}.${minor}`;
    const install = `Install Python ${version}`;

    switch (packageManager.id) {
      case "brew":
        return [
          {
            args: ["install", `python@${version}`],
            command: packageManager.command,
            description: install,
          },
        ];
      case "apt-get":
        return [
          elevated("apt-get", ["update"], "Update package lists"),
          elevated(
            "apt-get",
            ["install", "-y", "software-properties-common"],
            "Install software-properties-common"
          ),
          elevated(
            "add-apt-repository",
            ["-y", "ppa:deadsnakes/ppa"],
            "Add the deadsnakes repository"
          ),
          elevated("apt-get", ["update"], "Update package lists"),
          elevated(
            "apt-get",
            ["install", "-y", `python${version}`, `python${version}-venv`],
            install
          ),
        ];
      case "dnf":
      case "yum":
        return [elevated(packageManager.id, ["install", "-y", `python${version}`], install)];
      case "pacman":
        return [elevated("pacman", ["-Sy", "--noconfirm", "python"], install)];
      case "zypper":
        return [
          elevated("zypper", ["--non-interactive", "install", `python${major}${minor}`], install),
        ];
      default:
        return [];
    }
  }

  const capabilities: OsCapabilities = {
    family: "unix",

    detectPackageManager() {
      if (os === "macos") {
        const brewPaths = ["brew", "/opt/homebrew/bin/brew", "/usr/local/bin/brew"];
        const command = brewPaths.find(path => commands.isAvailable(path));
        if (command) {
          return { command, id: "brew" };
        }

        // Not on PATH yet when the bootstrap finishes, so call it by its absolute path
        return {
          command: architecture === "arm64" ? "/opt/homebrew/bin/brew" : "/usr/local/bin/brew",
          id: "brew",
          needsBootstrap: true,
        };
      }

      const id = LINUX_PACKAGE_MANAGERS.find(id => commands.isAvailable(id));
      return id ? { command: id, id } : undefined;
    },

    getInstallationTarget(binaryName) {
      const directory = installDirectory || join(homeDirectory, ".local", "bin");
      return {
        directory,
        executablePath: join(directory, binaryName),
      };
    },

    getManualInstructions(requirement) {
      const minimum = formatMinimumVersion(requirement.floor);
      const instructions = [
        `Install ${requirement.displayName} ${minimum} or newer manually, then run the installer again:`,
        `  ${requirement.downloadPage}`,
      ];
      if (os === "macos") {
        const formula =
          requirement.id === "node"
            ? `node@${getMajorVersion(requirement.pinnedVersion)}`
            : `python@${requirement.pinnedVersion.split(".").slice(0, 2).join(".")}`;
        instructions.push(`  or with Homebrew: brew install ${formula}`);
      }
      return instructions;
    },

    async installRuntime(requirement, packageManager) {
      await runProvisionSteps(
        requirement,
        capabilities.planRuntimeInstall(requirement, packageManager),
        commands,
        capabilities.getManualInstructions(requirement)
      );
    },

    planRuntimeInstall(requirement, packageManager) {
      const steps: ProvisionStep[] = [];
      if (packageManager.needsBootstrap) {
        steps.push({
          args: ["-c", `/bin/bash -c "$(curl -fsSL ${HOMEBREW_INSTALL_SCRIPT})"`],
          command: "/bin/bash",
          description: "Install Homebrew",
        });
      }

      switch (requirement.id) {
        case "node":
          steps.push(...planNodeInstall(requirement, packageManager));
          break;
        case "python":
          steps.push(...planPythonInstall(requirement, packageManager));
          break;
      }

      return steps;
    },

    resolveShellConfigPath() {
      return resolveShellConfig({ env, family: "unix", homeDirectory });
    },
  };

  return capabilities;
}
