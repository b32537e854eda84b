import { logInfo, logWarning } from "@bugster-installer/shared/logger";
import { ConfirmPolicy } from "@bugster-installer/shared/prompt/confirm";
import { emphasize, highlight, statusSuccess } from "@bugster-installer/shared/theme";
import { InstallerError } from "../errors/InstallerError";
import { OsCapabilities } from "../os/types";
import { OsId } from "../platform/types";
import { CommandRunner } from "../system/types";
import { findRuntime } from "./findRuntime";
import { formatMinimumVersion } from "./requirements";
import { ResolvedRuntime, RuntimeProbe, RuntimeRequirement } from "./types";

export type ProvisionContext = {
  capabilities: OsCapabilities;
  commands: CommandRunner;
  confirm: ConfirmPolicy;
  env: NodeJS.ProcessEnv;
  // False when the confirm policy could not ask anyone (no TTY and no --yes)
  isInteractive: boolean;
  os: OsId;
};

function describeProbe({ displayName, floor }: RuntimeRequirement, { outdated }: RuntimeProbe) {
  const required = `${displayName} ${formatMinimumVersion(floor)} or newer`;
  if (outdated.length === 0) {
    return `${required} is required but was not found.`;
  }

  const found = outdated.map(({ command, version }) => `${version} (${command})`).join(", ");
  return `${required} is required; found ${found}.`;
}

export async function provisionRuntime(
  requirement: RuntimeRequirement,
  { capabilities, commands, confirm, env, isInteractive, os }: ProvisionContext
): Promise<ResolvedRuntime> {
  const probe = findRuntime(requirement, { commands, env, os });
  if (probe.runtime) {
    return probe.runtime;
  }

  const manualInstructions = capabilities.getManualInstructions(requirement);

  console.log(highlight(describeProbe(requirement, probe)));

  const confirmed = await confirm(
    `Install ${requirement.displayName} ${requirement.pinnedVersion} now?`
  );
  if (!confirmed) {
    logInfo("ProvisionRuntime:Declined", { runtime: requirement.id });

    throw new InstallerError(
      "environment",
      `${requirement.displayName} ${formatMinimumVersion(requirement.floor)} or newer is required`,
      isInteractive
        ? manualInstructions
        : [...manualInstructions, "To install it automatically, re-run the installer with --yes"]
    );
  }

  const packageManager = capabilities.detectPackageManager();
  if (!packageManager) {
    logWarning("ProvisionRuntime:NoPackageManager", { runtime: requirement.id });

    throw new InstallerError(
      "environment",
      `No supported package manager found to install ${requirement.displayName}`,
      manualInstructions
    );
  }

  logInfo("ProvisionRuntime:Installing", {
    packageManager: packageManager.id,
    runtime: requirement.id,
    version: requirement.pinnedVersion,
  });

  await capabilities.installRuntime(requirement, packageManager);

  const reprobe = findRuntime(requirement, { commands, env, os });
  if (!reprobe.runtime) {
    throw new InstallerError(
      "provisioning",
      `${requirement.displayName} was installed but no suitable version could be found afterwards`,
      [
        "Open a new terminal so PATH changes take effect, then run the installer again.",
        ...manualInstructions,
      ]
    );
  }

  console.log(
    `${statusSuccess("✔")} Installed ${emphasize(
      `${requirement.displayName} ${reprobe.runtime.version}`
    )}`
  );

  return reprobe.runtime;
}
