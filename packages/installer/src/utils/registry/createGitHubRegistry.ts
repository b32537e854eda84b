import { logInfo } from "@bugster-installer/shared/logger";
import { writeFile } from "fs-extra";
import { assert, refine, string, type } from "superstruct";
import {
  downloadTimeoutMs,
  githubApiHost,
  githubDownloadHost,
  githubToken,
  registryTimeoutMs,
  releaseRepository,
} from "../../config";
import { name, version } from "../../package";
import { InstallerError, getErrorMessage } from "../errors/InstallerError";
import { parseReleaseTag } from "../version/parseReleaseVersion";
import { fetchWithRetry, HttpError } from "./fetchWithRetry";
import { ReleaseRegistry } from "./types";

const ReleaseStruct = type({
  tag_name: refine(string(), "ReleaseTag", value =>
    parseReleaseTag(value) ? true : `Expected a release tag like v1.2.3 but received "${value}"`
  ),
});

function isNotFound(error: unknown) {
  return error instanceof HttpError && error.status === 404;
}

export function createGitHubRegistry({
  apiHost = githubApiHost,
  downloadHost = githubDownloadHost,
  repository = releaseRepository,
  token = githubToken,
}: {
  apiHost?: string;
  downloadHost?: string;
  repository?: string;
  token?: string;
} = {}): ReleaseRegistry {
  const userAgent = `${name}/${version}`;
  const apiHeaders: Record<string, string> = {
    Accept: "application/vnd.github+json",
    "User-Agent": userAgent,
  };
  if (token) {
    apiHeaders.Authorization = `Bearer ${token}`;
  }

  const releasesPage = `${downloadHost}/${repository}/releases`;

  return {
    async downloadAsset(tag, assetName, destinationPath, { onRetry } = {}) {
      const url = `${downloadHost}/${repository}/releases/download/${tag}/${assetName}`;

      logInfo("GitHubRegistry:Downloading", { assetName, tag, url });

      try {
        const data = await fetchWithRetry(
          url,
          { headers: { "User-Agent": userAgent }, onRetry, timeoutMs: downloadTimeoutMs },
          async response => Buffer.from(await response.arrayBuffer())
        );

        await writeFile(destinationPath, data);

        logInfo("GitHubRegistry:Downloaded", { assetName, bytes: data.length, tag });
      } catch (error) {
        if (isNotFound(error)) {
          throw new InstallerError(
            "download",
            `Asset ${assetName} was not found in release ${tag}`,
            [`Available assets are listed at ${releasesPage}/tag/${tag}`],
            error
          );
        }

        throw new InstallerError(
          "download",
          `Could not download ${assetName} (${tag}): ${getErrorMessage(error)}`,
          ["Check your network connection and try again."],
          error
        );
      }
    },

    async getLatestTag() {
      const url = `${apiHost}/repos/${repository}/releases/latest`;

      try {
        const json = await fetchWithRetry(
          url,
          { headers: apiHeaders, timeoutMs: registryTimeoutMs },
          response => response.json()
        );
        assert(json, ReleaseStruct);

        logInfo("GitHubRegistry:LatestTag", { tag: json.tag_name });

        return json.tag_name;
      } catch (error) {
        throw new InstallerError(
          "registry",
          `Could not look up the latest release: ${getErrorMessage(error)}`,
          [],
          error
        );
      }
    },

    async hasRelease(tag) {
      const url = `${apiHost}/repos/${repository}/releases/tags/${encodeURIComponent(tag)}`;

      try {
        await fetchWithRetry(url, { headers: apiHeaders, timeoutMs: registryTimeoutMs }, response =>
          response.text()
        );

        return true;
      } catch (error) {
        if (isNotFound(error)) {
          return false;
        }

        throw new InstallerError(
          "registry",
          `Could not check whether release ${tag} exists: ${getErrorMessage(error)}`,
          ["Check your network connection and try again."],
          error
        );
      }
    },
  };
}
