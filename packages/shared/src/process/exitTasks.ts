import { flushLog } from "../logger";

export type ExitTask = () => Promise<void>;

// Log flushing stays last so that the other tasks can still log
const exitTasks: ExitTask[] = [];

export function getExitTasks(): ExitTask[] {
  return [...exitTasks, flushLog];
}

export function registerExitTask(exitTask: ExitTask) {
  exitTasks.push(exitTask);

  return () => {
    const index = exitTasks.indexOf(exitTask);
    if (index >= 0) {
      exitTasks.splice(index, 1);
    }
  };
}
