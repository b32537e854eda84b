import { logDebug, logInfo } from "@bugster-installer/shared/logger";
import { gte } from "semver";
import { OsId } from "../platform/types";
import { CommandRunner } from "../system/types";
import { RuntimeProbe, RuntimeRequirement } from "./types";

// "v20.11.1", "Python 3.12.2", "3.11" (some builds print only major.minor)
export function parseRuntimeVersion(output: string): string | undefined {
  const match = output.match(/(\d+)\.(\d+)(?:\.(\d+))?/);
  if (!match) {
    return undefined;
  }

  const [, major, minor, patch = "0"] = match;
  return `${Number(major)}.${Number(minor)}.${Number(patch)}`;
}

export function findRuntime(
  requirement: RuntimeRequirement,
  { commands, env, os }: { commands: CommandRunner; env: NodeJS.ProcessEnv; os: OsId }
): RuntimeProbe {
  const outdated: RuntimeProbe["outdated"] = [];

  for (const command of requirement.getCandidates({ env, os })) {
    const result = commands.capture(command, ["--version"]);
    if (result.error || result.status !== 0) {
      continue;
    }

    // Python 2 printed its version to stderr
    const version = parseRuntimeVersion(`${result.stdout}\n${result.stderr}`);
    if (!version) {
      logDebug("FindRuntime:UnparseableVersion", { command, stdout: result.stdout });
      continue;
    }

    if (gte(version, requirement.floor)) {
      logInfo("FindRuntime:Found", { command, runtime: requirement.id, version });

      return {
        outdated,
        runtime: { command, requirement, version },
      };
    }

    outdated.push({ command, version });
  }

  logInfo("FindRuntime:NotFound", { outdated, runtime: requirement.id });

  return { outdated, runtime: undefined };
}
