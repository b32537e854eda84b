import { ChildProcess, spawn, SpawnOptions } from "child_process";
import { createDeferred, Deferred } from "./async/createDeferred";
import { ProcessError } from "./ProcessError";

// Output goes straight to the terminal unless options.stdio says otherwise
export function spawnProcess(
  executablePath: string,
  args: string[] = [],
  options: SpawnOptions = {}
): Deferred<void, ChildProcess> {
  const spawned = spawn(executablePath, args, {
    stdio: "inherit",
    ...options,
    env: {
      ...process.env,
      ...options.env,
    },
  });

  const deferred = createDeferred<void, ChildProcess>(spawned);

  spawned.on("error", error => {
    deferred.rejectIfPending(error);
  });

  let stderr = "";
  spawned.stderr?.setEncoding("utf8");
  spawned.stderr?.on("data", (data: string) => {
    stderr += data;
  });

  spawned.on("exit", (code, signal) => {
    if (code || signal) {
      const message = `Process failed (${code ? `code: ${code}` : `signal: ${signal}`})`;

      deferred.rejectIfPending(new ProcessError(message, stderr, code));
    } else {
      deferred.resolveIfPending();
    }
  });

  return deferred;
}
