export class ProcessError extends Error {
  exitCode: number | null;
  stderr: string;

  constructor(message: string, stderr: string, exitCode: number | null = null) {
    super(message);

    this.exitCode = exitCode;
    this.stderr = stderr;
  }
}
