import { win32 } from "path";
import { InstallerError } from "../errors/InstallerError";
import { RuntimeId, RuntimeRequirement } from "./types";

export const nodeRequirement: RuntimeRequirement = {
  id: "node",
  displayName: "Node.js",
  floor: "18.0.0",
  pinnedVersion: "20.18.0",
  downloadPage: "https://nodejs.org/en/download/",
  getCandidates: ({ env, os }) => {
    switch (os) {
      case "macos":
        return [
          "node",
          "/opt/homebrew/opt/node@20/bin/node",
          "/usr/local/opt/node@20/bin/node",
          "/opt/homebrew/bin/node",
          "/usr/local/bin/node",
        ];
      case "linux":
        return ["node", "nodejs", "/usr/local/bin/node", "/usr/bin/node"];
      case "windows":
        return ["node", win32.join(env.ProgramFiles || "C:\\Program Files", "nodejs", "node.exe")];
    }
  },
};

export const pythonRequirement: RuntimeRequirement = {
  id: "python",
  displayName: "Python",
  floor: "3.10.0",
  pinnedVersion: "3.12.7",
  downloadPage: "https://www.python.org/downloads/",
  getCandidates: ({ env, os }) => {
    const commands = ["python3.12", "python3.11", "python3.10", "python3", "python"];
    switch (os) {
      case "macos":
        return [
          ...commands,
          "/opt/homebrew/opt/python@3.12/bin/python3.12",
          "/usr/local/opt/python@3.12/bin/python3.12",
        ];
      case "linux":
        return [...commands, "/usr/local/bin/python3.12", "/usr/bin/python3.12"];
      case "windows": {
        const localAppData =
          env.LOCALAPPDATA || win32.join(env.USERPROFILE || "C:\\", "AppData", "Local");
        return [
          "python",
          "python3",
          win32.join(localAppData, "Programs", "Python", "Python312", "python.exe"),
        ];
      }
    }
  },
};

const requirements: Record<RuntimeId, RuntimeRequirement> = {
  node: nodeRequirement,
  python: pythonRequirement,
};

export function getMajorVersion(version: string): string {
  return version.split(".")[0];
}

// "18.0.0" -> "18", "3.10.0" -> "3.10"
export function formatMinimumVersion(version: string): string {
  const [major, minor = "0"] = version.split(".");
  return minor === "0" ? major : `${major}.${minor}`;
}

export function parseRuntimeRequirements(list: string): RuntimeRequirement[] {
  const ids = list
    .split(",")
    .map(id => id.trim().toLowerCase())
    .filter(Boolean);

  return Array.from(new Set(ids)).map(id => {
    if (id !== "node" && id !== "python") {
      throw new InstallerError("input", `Unknown runtime "${id}"`, [
        `Supported runtimes: ${Object.keys(requirements).join(", ")}`,
      ]);
    }

    return requirements[id];
  });
}
