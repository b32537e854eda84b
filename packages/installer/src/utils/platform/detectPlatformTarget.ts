import { logWarning } from "@bugster-installer/shared/logger";
import { binaryName } from "../../config";
import { InstallerError } from "../errors/InstallerError";
import { Architecture, HostPlatform, OsFamily, OsId, PlatformTarget } from "./types";

type OsAssets = {
  family: OsFamily;
  assets: Partial<Record<Architecture, string>>;
  defaultArchitecture: Architecture;
};

const ASSETS: Record<OsId, OsAssets> = {
  macos: {
    family: "unix",
    assets: {
      arm64: "bugster-macos-arm64.zip",
      x86_64: "bugster-macos-intel.zip",
    },
    defaultArchitecture: "x86_64",
  },
  linux: {
    family: "unix",
    assets: {
      x86_64: "bugster-linux.zip",
    },
    defaultArchitecture: "x86_64",
  },
  windows: {
    family: "windows",
    assets: {
      x86_64: "bugster-windows.exe.zip",
    },
    defaultArchitecture: "x86_64",
  },
};

export function getOsId(platform: string): OsId | undefined {
  switch (platform) {
    case "darwin":
    case "macos":
      return "macos";
    case "linux":
      return "linux";
    case "win32":
    case "windows":
      return "windows";
  }
}

export function normalizeArchitecture(arch: string): Architecture | undefined {
  switch (arch.toLowerCase()) {
    case "x64":
    case "amd64":
    case "x86_64":
      return "x86_64";
    case "arm64":
    case "aarch64":
      return "arm64";
  }
}

export function detectPlatformTarget(
  host: HostPlatform = { platform: process.platform, arch: process.arch }
): PlatformTarget {
  const os = getOsId(host.platform);
  if (!os) {
    throw new InstallerError("environment", `Unsupported operating system: ${host.platform}`, [
      "Bugster CLI supports macOS, Linux and Windows.",
    ]);
  }

  const { assets, defaultArchitecture, family } = ASSETS[os];
  const executableName = family === "windows" ? `${binaryName}.exe` : binaryName;

  const architecture = normalizeArchitecture(host.arch);
  const assetName = architecture ? assets[architecture] : undefined;
  if (architecture && assetName) {
    return {
      os,
      family,
      architecture,
      hostArchitecture: host.arch,
      assetName,
      binaryName: executableName,
      isFallback: false,
    };
  }

  const fallbackAssetName = assets[defaultArchitecture];
  if (!fallbackAssetName) {
    throw new InstallerError("environment", `Unsupported platform: ${os} (${host.arch})`);
  }

  logWarning("DetectPlatformTarget:FallbackArchitecture", {
    assetName: fallbackAssetName,
    hostArchitecture: host.arch,
    os,
  });

  return {
    os,
    family,
    architecture: defaultArchitecture,
    hostArchitecture: host.arch,
    assetName: fallbackAssetName,
    binaryName: executableName,
    isFallback: true,
  };
}
