import { logWarning } from "../logger";
import { getExitTasks } from "./exitTasks";

export async function waitForExitTasks() {
  for (const task of getExitTasks()) {
    // A failing task must not keep the process alive or stop the others
    await task().catch(error => {
      logWarning("WaitForExitTasks:TaskFailed", { error });
    });
  }
}
