import { ConfirmPolicy } from "@bugster-installer/shared/prompt/confirm";
import { ShellConfigPatch } from "../shell/patchShellConfig";
import { HostPlatform, PlatformTarget } from "../platform/types";
import { ReleaseRegistry } from "../registry/types";
import { ResolvedRuntime, RuntimeRequirement } from "../runtime/types";
import { CommandRunner } from "../system/types";

// Everything the pipeline touches outside of the file system; tests swap these for fakes
export type InstallerDependencies = {
  commands: CommandRunner;
  confirm: ConfirmPolicy;
  env: NodeJS.ProcessEnv;
  homeDirectory: string;
  host: HostPlatform;
  installBrowserDependencies: boolean;
  installDirectory: string | undefined;
  isInteractive: boolean;
  registry: ReleaseRegistry;
  requiredRuntimes: RuntimeRequirement[];
  skipVerification: boolean;
  tempRoot: string;
};

export type InstallResult = {
  degraded: boolean;
  executablePath: string;
  pathPatch: ShellConfigPatch;
  runtimes: ResolvedRuntime[];
  tag: string;
  target: PlatformTarget;
  // Output of `bugster --version`; undefined when verification was skipped
  verifiedVersion: string | undefined;
};
