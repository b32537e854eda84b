import { logInfo, logWarning } from "@bugster-installer/shared/logger";
import { dim, highlight, statusFailed, statusSuccess } from "@bugster-installer/shared/theme";
import { posix, win32 } from "path";
import { getErrorMessage } from "../errors/InstallerError";
import { OsId } from "../platform/types";
import { ResolvedRuntime } from "../runtime/types";
import { CommandRunner } from "../system/types";

const PLAYWRIGHT_VERSION = "1.54.1";

export const BROWSER_INSTALL_STEPS: Array<{ args: string[]; label: string }> = [
  {
    args: ["-y", `playwright@${PLAYWRIGHT_VERSION}`, "install", "--with-deps", "chromium"],
    label: "Chromium",
  },
  {
    args: ["-y", "@playwright/mcp@latest", "--version"],
    label: "Playwright MCP",
  },
];

// npx and its `#!/usr/bin/env node` shebang look Node.js up on PATH, which may not list it yet
export function getNpxEnvironment(
  env: NodeJS.ProcessEnv,
  node: ResolvedRuntime,
  os: OsId
): NodeJS.ProcessEnv | undefined {
  const paths = os === "windows" ? win32 : posix;
  if (!paths.isAbsolute(node.command)) {
    return undefined;
  }

  // Windows spells it "Path"
  const key = Object.keys(env).find(name => name.toUpperCase() === "PATH") ?? "PATH";
  const directory = paths.dirname(node.command);
  const current = env[key];

  return { ...env, [key]: current ? `${directory}${paths.delimiter}${current}` : directory };
}

// Tests need a browser, but a missing one can be installed later, so this never fails the run
export async function installBrowserDependencies(
  commands: CommandRunner,
  { env, node, os }: { env: NodeJS.ProcessEnv; node: ResolvedRuntime; os: OsId }
): Promise<boolean> {
  const npxEnv = getNpxEnvironment(env, node, os);
  if (npxEnv) {
    logInfo("InstallBrowserDependencies:UsingNodeDirectory", { node: node.command });
  }

  let succeeded = true;

  for (const { args, label } of BROWSER_INSTALL_STEPS) {
    // npx prints its own progress, so there is no spinner here
    console.log(dim(`› Installing ${label}`));

    try {
      await commands.run("npx", args, { env: npxEnv });

      console.log(`${statusSuccess("✔")} ${label} installed`);
      logInfo("InstallBrowserDependencies:Installed", { label });
    } catch (error) {
      succeeded = false;

      console.log(
        `${statusFailed("✘")} ${label} could not be installed: ${getErrorMessage(error)}`
      );
      logWarning("InstallBrowserDependencies:Failed", { error, label });
    }
  }

  if (!succeeded) {
    console.log(
      dim(`Run ${highlight(`npx playwright@${PLAYWRIGHT_VERSION} install chromium`)} to retry.`)
    );
  }

  return succeeded;
}
