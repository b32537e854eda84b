import { win32 } from "path";
import { formatMinimumVersion } from "../runtime/requirements";
import { RuntimeRequirement } from "../runtime/types";
import { resolveShellConfig } from "../shell/resolveShellConfig";
import { CommandRunner } from "../system/types";
import { runProvisionSteps } from "./runProvisionSteps";
import { OsCapabilities, PackageManagerId, ProvisionStep } from "./types";

type WindowsPackage = {
  // Returns the installer download URL and the arguments for a silent install
  directInstaller: (version: string) => { url: string; fileName: string; silentArgs: string[] };
  choco: string;
  scoop: string;
  winget: string;
};

const PACKAGES: Record<RuntimeRequirement["id"], WindowsPackage> = {
  node: {
    choco: "nodejs",
    directInstaller: version => ({
      fileName: `node-v${version}-x64.msi`,
      silentArgs: ["/qn"],
      url: `https://nodejs.org/dist/v${version}/node-v${version}-x64.msi`,
    }),
    scoop: "nodejs",
    winget: "OpenJS.NodeJS",
  },
  python: {
    choco: "python312",
    directInstaller: version => ({
      fileName: `python-${version}-amd64.exe`,
      silentArgs: ["/quiet", "InstallAllUsers=0", "PrependPath=1"],
      url: `https://www.python.org/ftp/python/${version}/python-${version}-amd64.exe`,
    }),
    scoop: "python",
    winget: "Python.Python.3.12",
  },
};

const PACKAGE_MANAGERS: Exclude<PackageManagerId, "powershell">[] = ["winget", "choco", "scoop"];

function quote(value: string) {
  return `'${value.replace(/'/g, "''")}'`;
}

export function createWindowsCapabilities({
  commands,
  env,
  homeDirectory,
  installDirectory,
}: {
  commands: CommandRunner;
  env: NodeJS.ProcessEnv;
  homeDirectory: string;
  installDirectory?: string;
}): OsCapabilities {
  const capabilities: OsCapabilities = {
    family: "windows",

    detectPackageManager() {
      const id = PACKAGE_MANAGERS.find(id => commands.isAvailable(id));

      // PowerShell ships with every supported Windows version
      return id ? { command: id, id } : { command: "powershell", id: "powershell" };
    },

    getInstallationTarget(binaryName) {
      const localAppData = env.LOCALAPPDATA || win32.join(homeDirectory, "AppData", "Local");
      const directory = installDirectory || win32.join(localAppData, "Programs", "bugster");

      return {
        directory,
        executablePath: win32.join(directory, binaryName),
      };
    },

    getManualInstructions(requirement) {
      const minimum = formatMinimumVersion(requirement.floor);
      return [
        `Install ${requirement.displayName} ${minimum} or newer manually, then run the installer again:`,
        `  ${requirement.downloadPage}`,
        `  or with winget: winget install --exact --id ${PACKAGES[requirement.id].winget}`,
      ];
    },

    async installRuntime(requirement, packageManager) {
      await runProvisionSteps(
        requirement,
        capabilities.planRuntimeInstall(requirement, packageManager),
        commands,
        capabilities.getManualInstructions(requirement)
      );
    },

    planRuntimeInstall(requirement, packageManager): ProvisionStep[] {
      const { pinnedVersion } = requirement;
      const windowsPackage = PACKAGES[requirement.id];
      const description = `Install ${requirement.displayName} ${pinnedVersion}`;

      switch (packageManager.id) {
        case "winget":
          return [
            {
              args: [
                "install",
                "--exact",
                "--id",
                windowsPackage.winget,
                "--version",
                pinnedVersion,
                "--silent",
                "--accept-package-agreements",
                "--accept-source-agreements",
              ],
              command: packageManager.command,
              description,
            },
          ];
        case "choco":
          return [
            {
              args: ["install", windowsPackage.choco, `--version=${pinnedVersion}`, "-y"],
              command: packageManager.command,
              description,
            },
          ];
        case "scoop":
          return [
            {
              args: ["install", `${windowsPackage.scoop}@${pinnedVersion}`],
              command: packageManager.command,
              description,
            },
          ];
        case "powershell":
          return [
            {
              args: [
                "-NoProfile",
                "-ExecutionPolicy",
                "Bypass",
                "-Command",
                getDirectInstallScript(requirement),
              ],
              command: packageManager.command,
              description,
            },
          ];
        default:
          return [];
      }
    },

    resolveShellConfigPath() {
      return resolveShellConfig({ env, family: "windows", homeDirectory });
    },
  };

  return capabilities;
}

function getDirectInstallScript(requirement: RuntimeRequirement) {
  const { fileName, silentArgs, url } = PACKAGES[requirement.id].directInstaller(
    requirement.pinnedVersion
  );
  const argumentList = silentArgs.map(quote).join(",");

  const start =
    requirement.id === "node"
      ? `Start-Process msiexec.exe -ArgumentList '/i',$installer,${argumentList} -Wait`
      : `Start-Process $installer -ArgumentList ${argumentList} -Wait`;

  return [
    "$ErrorActionPreference = 'Stop'",
    `$installer = Join-Path $env:TEMP ${quote(fileName)}`,
    `Invoke-WebRequest -UseBasicParsing -Uri ${quote(url)} -OutFile $installer`,
    start,
    "Remove-Item $installer",
  ].join("; ");
}
