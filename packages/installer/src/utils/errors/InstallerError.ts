export type InstallerErrorKind =
  | "input"
  | "environment"
  | "provisioning"
  | "registry"
  | "download"
  | "install"
  | "verification";

export class InstallerError extends Error {
  kind: InstallerErrorKind;
  hints: string[];

  constructor(kind: InstallerErrorKind, message: string, hints: string[] = [], cause?: unknown) {
    super(message, { cause });

    this.name = "InstallerError";
    this.kind = kind;
    this.hints = hints;
  }
}

export function getErrorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
