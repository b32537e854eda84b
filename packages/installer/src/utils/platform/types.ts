export type OsId = "macos" | "linux" | "windows";
export type OsFamily = "unix" | "windows";
export type Architecture = "x86_64" | "arm64";

export type PlatformTarget = {
  os: OsId;
  family: OsFamily;
  // The architecture the asset was built for; differs from the host's when isFallback is set
  architecture: Architecture;
  hostArchitecture: string;
  assetName: string;
  binaryName: string;
  isFallback: boolean;
};

export type HostPlatform = {
  platform: string;
  arch: string;
};
