/**
 * Tests for the buffered download helper.
 */

import { describe, it, expect, vi } from "vitest";
import { DOWNLOAD_TIMEOUT_MS, downloadToFile } from "./download.js";
import { BinaryDownloadError } from "./errors.js";
import { createMockHttpClient } from "../platform/network.test-utils.js";
import { createMockFileSystemLayer, directory } from "../platform/filesystem.test-utils.js";

const URL = "https://example.test/remembrances-mcp-darwin-aarch64-embedded.zip";

describe("downloadToFile", () => {
  it("writes the body and reports progress", async () => {
    const httpClient = createMockHttpClient({
      responses: { [URL]: { body: Buffer.from("zip-bytes"), headers: { "Content-Length": "9" } } },
    });
    const fileSystem = createMockFileSystemLayer({ entries: { "/tmp/dl": directory() } });
    const onProgress = vi.fn();

    const bytes = await downloadToFile({ httpClient, fileSystem }, URL, "/tmp/dl/a.zip", onProgress);

    expect(bytes).toBe(9);
    expect(fileSystem.$.readText("/tmp/dl/a.zip")).toBe("zip-bytes");
    expect(onProgress).toHaveBeenLastCalledWith({ bytesDownloaded: 9, totalBytes: 9 });
    expect(httpClient.fetch).toHaveBeenCalledWith(URL, { timeout: DOWNLOAD_TIMEOUT_MS });
  });

  it("reports an unknown total without Content-Length", async () => {
    const httpClient = createMockHttpClient({ responses: { [URL]: { body: "abc" } } });
    const fileSystem = createMockFileSystemLayer({ entries: { "/tmp/dl": directory() } });
    const onProgress = vi.fn();

    await downloadToFile({ httpClient, fileSystem }, URL, "/tmp/dl/a.zip", onProgress);

    expect(onProgress).toHaveBeenLastCalledWith({ bytesDownloaded: 3, totalBytes: null });
  });

  it("fails with NETWORK_ERROR on HTTP errors", async () => {
    const httpClient = createMockHttpClient({ responses: { [URL]: { status: 503 } } });

    await expect(
      downloadToFile({ httpClient, fileSystem: createMockFileSystemLayer() }, URL, "/tmp/a.zip")
    ).rejects.toMatchObject({
      errorCode: "NETWORK_ERROR",
      message: `HTTP 503 downloading from ${URL}`,
    });
  });

  it("fails with NETWORK_ERROR when the request throws", async () => {
    const httpClient = createMockHttpClient({
      responses: { [URL]: { error: new TypeError("fetch failed") } },
    });

    const error = await downloadToFile(
      { httpClient, fileSystem: createMockFileSystemLayer() },
      URL,
      "/tmp/a.zip"
    ).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(BinaryDownloadError);
    expect(error).toMatchObject({
      errorCode: "NETWORK_ERROR",
      message: `Network error downloading from ${URL}: fetch failed`,
    });
  });

  it("fails with EXTRACTION_FAILED when the file cannot be written", async () => {
    const httpClient = createMockHttpClient({ responses: { [URL]: { body: "abc" } } });

    await expect(
      downloadToFile({ httpClient, fileSystem: createMockFileSystemLayer() }, URL, "/missing/a.zip")
    ).rejects.toMatchObject({
      errorCode: "EXTRACTION_FAILED",
      message: "Failed to write download to /missing/a.zip: ENOENT: open '/missing/a.zip'",
    });
  });
});
