import { alwaysConfirm, askUser } from "@bugster-installer/shared/prompt/confirm";
import { homedir, tmpdir } from "os";
import {
  installDirectoryOverride,
  isUpgradeInProgress,
  requiredRuntimeIds,
  skipBrowserInstall,
} from "../../config";
import { createGitHubRegistry } from "../registry/createGitHubRegistry";
import { parseRuntimeRequirements } from "../runtime/requirements";
import { systemCommandRunner } from "../system/systemCommandRunner";
import { InstallerDependencies } from "./types";

export function getDefaultDependencies({ yes }: { yes: boolean }): InstallerDependencies {
  const isInteractive = !!process.stdin.isTTY;

  return {
    commands: systemCommandRunner,
    confirm: yes ? alwaysConfirm : askUser({ isInteractive }),
    env: process.env,
    homeDirectory: homedir(),
    host: { arch: process.arch, platform: process.platform },
    installBrowserDependencies: !skipBrowserInstall,
    installDirectory: installDirectoryOverride,
    isInteractive: yes || isInteractive,
    registry: createGitHubRegistry(),
    requiredRuntimes: parseRuntimeRequirements(requiredRuntimeIds),
    skipVerification: isUpgradeInProgress,
    tempRoot: tmpdir(),
  };
}
