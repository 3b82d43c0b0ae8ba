/**
 * GitHub releases API client.
 */

import { z } from "zod";
import type { Logger } from "../logging/index.js";
import type { HttpClient } from "../platform/network.js";
import { ReleaseError, getErrorMessage } from "../errors.js";
import type { ReleaseManifest } from "./types.js";

/**
 * GitHub repository the application is published from.
 */
export const RELEASE_REPOSITORY = "madeindigio/remembrances-mcp";

/**
 * Version selector meaning "the newest published release".
 */
export const LATEST_VERSION = "latest";

const GITHUB_API_BASE = "https://api.github.com";

/**
 * The parts of a GitHub release response the installer reads.
 * Unknown fields are ignored.
 */
const ReleaseResponseSchema = z.object({
  tag_name: z.string().optional(),
  assets: z
    .array(
      z.object({
        name: z.string(),
        browser_download_url: z.string().url(),
      })
    )
    .default([]),
});

/**
 * Fetches release metadata.
 */
export interface ReleaseClient {
  /**
   * Fetch a release.
   *
   * @param version - "latest" or a release tag such as "v1.16.4"
   * @throws ReleaseError NETWORK_ERROR on connection failures and non-2xx responses
   * @throws ReleaseError INVALID_RESPONSE when the body is not a release or has no tag
   */
  fetchRelease(version: string): Promise<ReleaseManifest>;
}

/**
 * API URL of a release.
 *
 * @example
 * releaseApiUrl("latest"); // "https://api.github.com/repos/madeindigio/remembrances-mcp/releases/latest"
 * releaseApiUrl("v1.16.4"); // ".../releases/tags/v1.16.4"
 */
export function releaseApiUrl(version: string, repository = RELEASE_REPOSITORY): string {
  const base = `${GITHUB_API_BASE}/repos/${repository}/releases`;
  if (version === LATEST_VERSION || version === "") {
    return `${base}/latest`;
  }
  return `${base}/tags/${encodeURIComponent(version)}`;
}

export class GitHubReleaseClient implements ReleaseClient {
  constructor(
    private readonly httpClient: HttpClient,
    private readonly logger: Logger,
    private readonly repository: string = RELEASE_REPOSITORY
  ) {}

  async fetchRelease(version: string): Promise<ReleaseManifest> {
    const url = releaseApiUrl(version, this.repository);
    this.logger.debug("Fetching release", { version, url });

    let response: Response;
    try {
      response = await this.httpClient.fetch(url, {
        headers: { Accept: "application/vnd.github+json" },
      });
    } catch (error) {
      throw new ReleaseError(
        `Failed to fetch release metadata from GitHub: ${getErrorMessage(error)}`,
        "NETWORK_ERROR"
      );
    }

    if (!response.ok) {
      throw new ReleaseError(
        `Failed to fetch release metadata from GitHub: HTTP ${response.status}`,
        "NETWORK_ERROR"
      );
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      throw new ReleaseError(
        `Invalid release metadata from GitHub: ${getErrorMessage(error)}`,
        "INVALID_RESPONSE"
      );
    }

    const parsed = ReleaseResponseSchema.safeParse(body);
    if (!parsed.success) {
      const issues = parsed.error.issues
        .map((issue) => `${issue.path.join(".")}: ${issue.message}`)
        .join("; ");
      throw new ReleaseError(`Invalid release metadata from GitHub: ${issues}`, "INVALID_RESPONSE");
    }

    const tag = parsed.data.tag_name;
    if (tag === undefined || tag === "") {
      throw new ReleaseError(
        "Could not determine latest release tag from GitHub API response.",
        "INVALID_RESPONSE"
      );
    }

    const manifest: ReleaseManifest = {
      tag,
      assets: parsed.data.assets.map((asset) => ({
        filename: asset.name,
        downloadUrl: asset.browser_download_url,
      })),
    };
    this.logger.info("Release fetched", { tag, assets: manifest.assets.length });
    return manifest;
  }
}
