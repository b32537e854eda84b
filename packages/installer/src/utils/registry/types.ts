import { OnRetry } from "./fetchWithRetry";

export interface ReleaseRegistry {
  // Writes the asset of the given release to destinationPath
  downloadAsset(
    tag: string,
    assetName: string,
    destinationPath: string,
    options?: { onRetry?: OnRetry }
  ): Promise<void>;
  getLatestTag(): Promise<string>;
  hasRelease(tag: string): Promise<boolean>;
}
