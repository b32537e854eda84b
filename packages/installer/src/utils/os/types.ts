import { OsFamily } from "../platform/types";
import { RuntimeRequirement } from "../runtime/types";

export type PackageManagerId =
  | "brew"
  | "apt-get"
  | "dnf"
  | "yum"
  | "pacman"
  | "zypper"
  | "winget"
  | "choco"
  | "scoop"
  | "powershell";

export type PackageManager = {
  id: PackageManagerId;
  // Command or absolute path used to invoke it
  command: string;
  // Homebrew is missing and will be installed first
  needsBootstrap?: boolean;
};

export type ProvisionStep = {
  args: string[];
  command: string;
  description: string;
};

export type ShellKind = "zsh" | "bash" | "fish" | "sh" | "powershell";

export type ShellConfigTarget = {
  configPath: string;
  shell: ShellKind;
};

export type InstallationTarget = {
  directory: string;
  executablePath: string;
};

export interface OsCapabilities {
  family: OsFamily;
  detectPackageManager(): PackageManager | undefined;
  getInstallationTarget(binaryName: string): InstallationTarget;
  getManualInstructions(requirement: RuntimeRequirement): string[];
  installRuntime(requirement: RuntimeRequirement, packageManager: PackageManager): Promise<void>;
  planRuntimeInstall(
    requirement: RuntimeRequirement,
    packageManager: PackageManager
  ): ProvisionStep[];
  resolveShellConfigPath(): ShellConfigTarget;
}
