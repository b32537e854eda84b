#!/usr/bin/env node

import { logError } from "@bugster-installer/shared/logger";
import { exitProcess } from "@bugster-installer/shared/process/exitProcess";
import { finalizeCommander } from "./utils/commander/finalizeCommander";

// Registers the root action with "commander"
import "./commands/install";

finalizeCommander().catch(async error => {
  logError("Bin:Failed", { error });
  console.error(error);

  await exitProcess(1);
});

// Ctrl+C (e.g. during a prompt or a package manager install) still removes temp files
process.on("SIGINT", async () => {
  await exitProcess(130);
});

process.on("uncaughtException", async error => {
  logError("UncaughtException", { error });
  console.error(error);

  await exitProcess(1);
});
