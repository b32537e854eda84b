export type CommandResult = {
  error: Error | undefined;
  status: number | null;
  stderr: string;
  stdout: string;
};

export interface CommandRunner {
  // Runs to completion and captures output; used for probes that must not print anything
  capture(command: string, args: string[], options?: { timeoutMs?: number }): CommandResult;
  isAvailable(command: string): boolean;
  // Streams output to the terminal; rejects with a ProcessError on a non-zero exit
  run(command: string, args: string[], options?: { env?: NodeJS.ProcessEnv }): Promise<void>;
}
