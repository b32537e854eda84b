import { logError, logInfo } from "@bugster-installer/shared/logger";
import { dim } from "@bugster-installer/shared/theme";
import { InstallerError, getErrorMessage } from "../errors/InstallerError";
import { RuntimeRequirement } from "../runtime/types";
import { CommandRunner } from "../system/types";
import { ProvisionStep } from "./types";

export async function runProvisionSteps(
  requirement: RuntimeRequirement,
  steps: ProvisionStep[],
  commands: CommandRunner,
  manualInstructions: string[]
) {
  for (const step of steps) {
    console.log(dim(`› ${step.description}`));

    logInfo("RunProvisionSteps:Step", {
      args: step.args,
      command: step.command,
      runtime: requirement.id,
    });

    try {
      await commands.run(step.command, step.args);
    } catch (error) {
      logError("RunProvisionSteps:Failed", { error, runtime: requirement.id, step });

      throw new InstallerError(
        "provisioning",
        `${step.description} failed: ${getErrorMessage(error)}`,
        manualInstructions,
        error
      );
    }
  }
}
