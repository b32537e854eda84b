import { logInfo } from "@bugster-installer/shared/logger";
import { copy, ensureDir, pathExists, readFile, writeFile } from "fs-extra";
import { dirname } from "path";
import { InstallerError, getErrorMessage } from "../errors/InstallerError";
import { ShellConfigTarget, ShellKind } from "../os/types";

export const PATH_MARKER = "# Added by Bugster CLI installer";

export type ShellConfigPatch = ShellConfigTarget & {
  addedLines: string[];
  after: string;
  backupPath?: string;
  before: string;
  status: "added" | "already-present";
};

export function getPathLine(shell: ShellKind, directory: string) {
  switch (shell) {
    case "fish":
      return `fish_add_path "${directory}"`;
    case "powershell":
      return `$env:Path += ";${directory}"`;
    default:
      return `export PATH="$PATH:${directory}"`;
  }
}

function escapeRegExp(text: string) {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

// A longer directory that merely starts with this one doesn't count
export function hasPathEntry(content: string, shell: ShellKind, directory: string) {
  if (content.includes(`${PATH_MARKER}\n${getPathLine(shell, directory)}`)) {
    return true;
  }

  const entry = new RegExp(`(?<![^\\s"'=:;])${escapeRegExp(directory)}/?(?=[\\s"':;]|$)`, "m");
  return entry.test(content);
}

export function planShellConfigPatch(
  target: ShellConfigTarget,
  directory: string,
  before: string
): ShellConfigPatch {
  if (hasPathEntry(before, target.shell, directory)) {
    return { ...target, addedLines: [], after: before, before, status: "already-present" };
  }

  const addedLines = [PATH_MARKER, getPathLine(target.shell, directory)];

  let separator = "";
  if (before) {
    separator = before.endsWith("\n") ? "\n" : "\n\n";
  }

  return {
    ...target,
    addedLines,
    after: `${before}${separator}${addedLines.join("\n")}\n`,
    before,
    status: "added",
  };
}

export async function patchShellConfig(
  target: ShellConfigTarget,
  directory: string
): Promise<ShellConfigPatch> {
  const { configPath } = target;

  try {
    const exists = await pathExists(configPath);
    const before = exists ? await readFile(configPath, "utf8") : "";

    const patch = planShellConfigPatch(target, directory, before);
    if (patch.status === "already-present") {
      logInfo("PatchShellConfig:AlreadyPresent", { configPath, directory });
      return patch;
    }

    let backupPath: string | undefined;
    if (exists) {
      backupPath = `${configPath}.bak`;
      await copy(configPath, backupPath);
    } else {
      await ensureDir(dirname(configPath));
    }

    await writeFile(configPath, patch.after, "utf8");

    logInfo("PatchShellConfig:Added", { backupPath, configPath, directory });

    return { ...patch, backupPath };
  } catch (error) {
    throw new InstallerError(
      "install",
      `Could not update ${configPath}: ${getErrorMessage(error)}`,
      [`Add ${directory} to your PATH manually.`],
      error
    );
  }
}
