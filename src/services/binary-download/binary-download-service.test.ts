/**
 * Unit tests for BinaryDownloadService.
 */

import { describe, it, expect } from "vitest";
import { DefaultBinaryDownloadService, isSharedLibrary } from "./binary-download-service.js";
import { BinaryDownloadError } from "./errors.js";
import { createMockArchiveExtractor } from "./archive-extractor.test-utils.js";
import { createMockHttpClient } from "../platform/network.test-utils.js";
import {
  createMockFileSystemLayer,
  file,
  type Entry,
  type MockFileSystemLayer,
} from "../platform/filesystem.test-utils.js";
import { createMockPathProvider } from "../platform/path-provider.test-utils.js";
import { createMockLogger } from "../logging/logging.test-utils.js";
import type { ReleaseAsset } from "../release/types.js";

const ASSET: ReleaseAsset = {
  filename: "remembrances-mcp-embedded-cpu-linux-x86_64.zip",
  downloadUrl:
    "https://github.com/madeindigio/remembrances-mcp/releases/download/v1.16.4/remembrances-mcp-embedded-cpu-linux-x86_64.zip",
};

const TEMP_DIR = "/tmp/remembrances-release-1";
const BIN_DIR = "/home/test/.local/share/remembrances/bin";
const CONFIG_DIR = "/home/test/.config/remembrances";

function createService(options: {
  contents?: Record<string, Entry>;
  fileSystem?: MockFileSystemLayer;
  extractError?: boolean;
  status?: number;
}) {
  const fileSystem = options.fileSystem ?? createMockFileSystemLayer();
  const httpClient = createMockHttpClient({
    responses: { [ASSET.downloadUrl]: { body: "zip-bytes", status: options.status ?? 200 } },
  });
  const extractor = createMockArchiveExtractor({
    fileSystem,
    contents: options.contents ?? {},
    ...(options.extractError && {
      error: { message: "Invalid or corrupt archive", code: "INVALID_ARCHIVE" as const },
    }),
  });
  const logger = createMockLogger();
  const service = new DefaultBinaryDownloadService(
    httpClient,
    fileSystem,
    extractor,
    createMockPathProvider(),
    logger
  );
  return { service, fileSystem, extractor, httpClient, logger };
}

describe("isSharedLibrary", () => {
  it.each([
    ["libllama.so", true],
    ["libggml-cuda.so.0.1", true],
    ["libllama.dylib", true],
    ["remembrances-mcp", false],
    ["config.sample.yaml", false],
  ])("%s -> %s", (name, expected) => {
    expect(isSharedLibrary(name)).toBe(expected);
  });
});

describe("DefaultBinaryDownloadService", () => {
  describe("download", () => {
    it("downloads into a temp dir and returns the top-level directory", async () => {
      const { service, fileSystem, extractor } = createService({
        contents: { "remembrances-mcp-linux/remembrances-mcp": file("bin") },
      });

      const release = await service.download(ASSET);

      expect(release).toEqual({
        tempDir: TEMP_DIR,
        extractedDir: `${TEMP_DIR}/extracted/remembrances-mcp-linux`,
      });
      expect(fileSystem.$.readText(`${TEMP_DIR}/${ASSET.filename}`)).toBe("zip-bytes");
      expect(extractor.extract).toHaveBeenCalledWith(
        `${TEMP_DIR}/${ASSET.filename}`,
        `${TEMP_DIR}/extracted`
      );
    });

    it("uses the extraction directory when the archive has no top-level folder", async () => {
      const { service } = createService({ contents: { "remembrances-mcp": file("bin") } });

      const release = await service.download(ASSET);

      expect(release.extractedDir).toBe(`${TEMP_DIR}/extracted`);
    });

    it("removes the temp dir and rethrows when the download fails", async () => {
      const { service, fileSystem } = createService({ status: 404 });

      await expect(service.download(ASSET)).rejects.toMatchObject({ errorCode: "NETWORK_ERROR" });
      expect(fileSystem.rm).toHaveBeenCalledWith(TEMP_DIR, { recursive: true, force: true });
      expect(fileSystem.$.entries.has(TEMP_DIR)).toBe(false);
    });

    it("removes the temp dir and rethrows when extraction fails", async () => {
      const { service, fileSystem } = createService({ extractError: true });

      await expect(service.download(ASSET)).rejects.toMatchObject({ errorCode: "INVALID_ARCHIVE" });
      expect(fileSystem.$.entries.has(TEMP_DIR)).toBe(false);
    });
  });

  describe("install", () => {
    const EXTRACTED = `${TEMP_DIR}/extracted/pkg`;

    it("installs the binary, sibling libraries and sample configs", async () => {
      const fileSystem = createMockFileSystemLayer({
        entries: {
          [`${EXTRACTED}/remembrances-mcp`]: file("bin"),
          [`${EXTRACTED}/libllama.so`]: file("llama"),
          [`${EXTRACTED}/libggml.so.0`]: file("ggml"),
          [`${EXTRACTED}/config.sample.yaml`]: file("sample"),
          [`${EXTRACTED}/config.sample.gguf.yaml`]: file("gguf sample"),
          [`${EXTRACTED}/README.md`]: file("readme"),
        },
      });
      const { service } = createService({ fileSystem });

      const installed = await service.install(EXTRACTED);

      expect(installed).toEqual({
        binaryPath: `${BIN_DIR}/remembrances-mcp`,
        libraries: expect.arrayContaining([`${BIN_DIR}/libllama.so`, `${BIN_DIR}/libggml.so.0`]),
        sampleConfigs: [`${CONFIG_DIR}/config.sample.yaml`, `${CONFIG_DIR}/config.sample.gguf.yaml`],
      });
      expect(installed.libraries).toHaveLength(2);
      expect(fileSystem.$.filesUnder(BIN_DIR)).toEqual([
        `${BIN_DIR}/libggml.so.0`,
        `${BIN_DIR}/libllama.so`,
        `${BIN_DIR}/remembrances-mcp`,
      ]);
      expect(fileSystem.$.entries.get(`${BIN_DIR}/remembrances-mcp`)).toMatchObject({
        executable: true,
      });
    });

    it("creates the install directories", async () => {
      const fileSystem = createMockFileSystemLayer({
        entries: { [`${EXTRACTED}/remembrances-mcp`]: file("bin") },
      });
      const { service } = createService({ fileSystem });

      await service.install(EXTRACTED);

      for (const dir of [
        BIN_DIR,
        CONFIG_DIR,
        "/home/test/.local/share/remembrances",
        "/home/test/.local/share/remembrances/models",
      ]) {
        expect(fileSystem.$.entries.get(dir)).toEqual({ type: "directory" });
      }
    });

    it("finds a nested binary and takes libraries from its directory", async () => {
      const fileSystem = createMockFileSystemLayer({
        entries: {
          [`${EXTRACTED}/build/linux/remembrances-mcp`]: file("bin"),
          [`${EXTRACTED}/build/linux/libllama.so`]: file("llama"),
          [`${EXTRACTED}/libstray.so`]: file("stray"),
          [`${EXTRACTED}/docs/config.sample.yaml`]: file("sample"),
        },
      });
      const { service } = createService({ fileSystem });

      const installed = await service.install(EXTRACTED);

      expect(installed).toEqual({
        binaryPath: `${BIN_DIR}/remembrances-mcp`,
        libraries: [`${BIN_DIR}/libllama.so`],
        sampleConfigs: [`${CONFIG_DIR}/config.sample.yaml`],
      });
      expect(fileSystem.$.readText(`${CONFIG_DIR}/config.sample.yaml`)).toBe("sample");
    });

    it("fails with BINARY_NOT_FOUND and lists the contents", async () => {
      const fileSystem = createMockFileSystemLayer({
        entries: { [`${EXTRACTED}/README.md`]: file("readme"), [`${EXTRACTED}/docs/a.md`]: file("a") },
      });
      const { service } = createService({ fileSystem });

      const error = await service.install(EXTRACTED).catch((e: unknown) => e);

      expect(error).toBeInstanceOf(BinaryDownloadError);
      expect(error).toMatchObject({
        errorCode: "BINARY_NOT_FOUND",
        message: `Binary not found in release (extracted dir: ${EXTRACTED}, contents: README.md, docs)`,
      });
    });
  });

  describe("cleanup", () => {
    it("removes the temp dir", async () => {
      const { service, fileSystem } = createService({});
      const release = await service.download(ASSET);

      await service.cleanup(release);

      expect(fileSystem.$.entries.has(TEMP_DIR)).toBe(false);
    });

    it("logs instead of throwing when removal fails", async () => {
      const { service, fileSystem, logger } = createService({});
      fileSystem.rm.mockRejectedValueOnce(new Error("EBUSY"));

      await service.cleanup({ tempDir: TEMP_DIR, extractedDir: TEMP_DIR });

      expect(logger.warn).toHaveBeenCalledWith("Failed to remove temporary directory", {
        dir: TEMP_DIR,
        error: "EBUSY",
      });
    });
  });
});
