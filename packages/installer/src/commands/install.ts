import { exitProcess } from "@bugster-installer/shared/process/exitProcess";
import { program } from "commander";
import { executeInstall, InstallOptions } from "../utils/installer/executeInstall";

program
  .name("bugster-install")
  .description("Install the Bugster CLI and the runtimes it needs")
  .option(
    "-v, --version <version>",
    'Version to install: "latest", "vX.Y.Z" or "vX.Y.Z-{beta|rc|alpha}.N"',
    "latest"
  )
  .option("-y, --yes", "Non-interactive mode; confirm every prompt", false)
  .action(install);

async function install({ version, yes }: InstallOptions) {
  const exitCode = await executeInstall({ version, yes });

  await exitProcess(exitCode);
}
