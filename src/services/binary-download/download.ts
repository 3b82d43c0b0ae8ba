/**
 * Buffered HTTP download to a file, shared by the application, model and
 * CUDA bundle downloads.
 */

import { BinaryDownloadError } from "./errors.js";
import type { DownloadProgressCallback } from "./types.js";
import type { HttpClient } from "../platform/network.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import { getErrorMessage } from "../errors.js";

/**
 * Timeout until response headers arrive for large downloads.
 */
export const DOWNLOAD_TIMEOUT_MS = 300_000;

export interface DownloadDeps {
  readonly httpClient: HttpClient;
  readonly fileSystem: FileSystemLayer;
}

/**
 * Download a URL into a file.
 * The body is buffered in memory and written with FileSystemLayer.
 *
 * @returns Number of bytes written
 * @throws BinaryDownloadError NETWORK_ERROR for request, status and read failures
 * @throws BinaryDownloadError EXTRACTION_FAILED when the file cannot be written
 */
export async function downloadToFile(
  deps: DownloadDeps,
  url: string,
  destPath: string,
  onProgress?: DownloadProgressCallback
): Promise<number> {
  let response: Response;
  try {
    response = await deps.httpClient.fetch(url, { timeout: DOWNLOAD_TIMEOUT_MS });
  } catch (error) {
    throw new BinaryDownloadError(
      `Network error downloading from ${url}: ${getErrorMessage(error)}`,
      "NETWORK_ERROR"
    );
  }

  if (!response.ok) {
    throw new BinaryDownloadError(`HTTP ${response.status} downloading from ${url}`, "NETWORK_ERROR");
  }
  if (!response.body) {
    throw new BinaryDownloadError("Response body is null", "NETWORK_ERROR");
  }

  const totalBytes = response.headers.get("content-length");
  const total = totalBytes ? Number.parseInt(totalBytes, 10) : null;

  const chunks: Uint8Array[] = [];
  let bytesDownloaded = 0;
  const reader = response.body.getReader();
  try {
    for (;;) {
      const { done, value } = await reader.read();
      if (done) break;
      chunks.push(value);
      bytesDownloaded += value.byteLength;
      onProgress?.({ bytesDownloaded, totalBytes: total });
    }
  } catch (error) {
    throw new BinaryDownloadError(
      `Failed to read download from ${url}: ${getErrorMessage(error)}`,
      "NETWORK_ERROR"
    );
  }

  try {
    await deps.fileSystem.writeFileBuffer(destPath, Buffer.concat(chunks));
  } catch (error) {
    throw new BinaryDownloadError(
      `Failed to write download to ${destPath}: ${getErrorMessage(error)}`,
      "EXTRACTION_FAILED"
    );
  }
  return bytesDownloaded;
}
