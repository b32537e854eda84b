import { PlatformTarget } from "../platform/types";
import { CommandRunner } from "../system/types";
import { createUnixCapabilities } from "./createUnixCapabilities";
import { createWindowsCapabilities } from "./createWindowsCapabilities";
import { OsCapabilities } from "./types";

export function getOsCapabilities(
  target: PlatformTarget,
  options: {
    commands: CommandRunner;
    env: NodeJS.ProcessEnv;
    homeDirectory: string;
    installDirectory?: string;
  }
): OsCapabilities {
  if (target.os === "windows") {
    return createWindowsCapabilities(options);
  }

  return createUnixCapabilities({
    ...options,
    architecture: target.architecture,
    os: target.os,
  });
}
