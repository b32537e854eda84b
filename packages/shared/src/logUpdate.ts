import logUpdateExternal from "log-update";
import { disableAnimatedLog } from "./config";

export type LogUpdate = {
  (...text: string[]): void;
  clear(): void;
  done(): void;
};

function logUpdateDebugging(...text: string[]) {
  console.log(...text);
}
logUpdateDebugging.clear = () => {};
logUpdateDebugging.done = () => {};

// log-update rewrites the previous lines, which garbles CI logs and verbose DEBUG output
export const logUpdate: LogUpdate = disableAnimatedLog ? logUpdateDebugging : logUpdateExternal;
