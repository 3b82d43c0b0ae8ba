/**
 * Unit tests for CUDA runtime remediation.
 */

import { describe, it, expect } from "vitest";
import {
  CUDA_BUNDLE_URL,
  DefaultRuntimeLibraryInstaller,
  isSharedObject,
  planRemediation,
  type InstallBundlePlan,
} from "./remediation.js";
import { createMockArchiveExtractor } from "../binary-download/archive-extractor.test-utils.js";
import { createMockHttpClient } from "../platform/network.test-utils.js";
import {
  createMockFileSystemLayer,
  file,
  type Entry,
} from "../platform/filesystem.test-utils.js";
import { createMockPathProvider } from "../platform/path-provider.test-utils.js";
import { createMockProcessRunner, exitedWith } from "../platform/process.test-utils.js";
import { createMockLogger } from "../logging/logging.test-utils.js";
import { ArchiveError, RemediationError } from "../errors.js";
import type { ArchiveErrorCode } from "../errors.js";

const LIB_DIR = "/home/test/.local/lib";
const TEMP_DIR = "/tmp/remembrances-cuda-1";

const PLAN: InstallBundlePlan = {
  kind: "install-bundle",
  libraries: ["libcudart.so.12"],
  bundleUrl: CUDA_BUNDLE_URL,
};

describe("planRemediation", () => {
  it("does nothing when the runtime resolves", () => {
    expect(
      planRemediation({ kind: "resolvable", strategy: "loader-resolution" }, { skipCudaLibs: false })
    ).toEqual({ kind: "none" });
  });

  it("installs the bundle for missing libraries", () => {
    const plan = planRemediation(
      { kind: "missing-libraries", strategy: "library-presence", libraries: ["libcublas.so.12"] },
      { skipCudaLibs: false }
    );

    expect(plan).toEqual({
      kind: "install-bundle",
      libraries: ["libcublas.so.12"],
      bundleUrl: CUDA_BUNDLE_URL,
    });
  });

  it("treats an indeterminate outcome as every library missing", () => {
    const plan = planRemediation(
      { kind: "indeterminate", strategy: "loader-resolution", reason: "ldd not found" },
      { skipCudaLibs: false }
    );

    expect(plan).toEqual({
      kind: "install-bundle",
      libraries: ["libcudart.so.12", "libcublas.so.12", "libcublasLt.so.12"],
      bundleUrl: CUDA_BUNDLE_URL,
    });
  });

  it("skips when the bundle download is disabled", () => {
    const plan = planRemediation(
      { kind: "missing-libraries", strategy: "library-presence", libraries: ["libcudart.so.12"] },
      { skipCudaLibs: true }
    );

    expect(plan).toEqual({ kind: "skipped", libraries: ["libcudart.so.12"] });
  });
});

describe("isSharedObject", () => {
  it.each([
    ["libcudart.so", true],
    ["libcudart.so.12", true],
    ["libcublasLt.so.12.4.5", true],
    ["LICENSE", false],
    ["libcudart.a", false],
  ])("%s -> %s", (name, expected) => {
    expect(isSharedObject(name)).toBe(expected);
  });
});

describe("DefaultRuntimeLibraryInstaller", () => {
  function createInstaller(options: {
    contents?: Record<string, Entry>;
    tar?: "installed" | "missing";
    status?: number;
    extractError?: ArchiveErrorCode;
  }) {
    const fileSystem = createMockFileSystemLayer();
    const processRunner = createMockProcessRunner(
      options.tar === "missing" ? {} : { tar: exitedWith(0, "tar (GNU tar) 1.35") }
    );
    const httpClient = createMockHttpClient({
      responses: { [CUDA_BUNDLE_URL]: { body: "xz-bytes", status: options.status ?? 200 } },
    });
    const extractor = createMockArchiveExtractor({
      fileSystem,
      contents: options.contents ?? {},
      ...(options.extractError !== undefined && {
        error: { message: "tar: Unexpected EOF in archive", code: options.extractError },
      }),
    });
    const logger = createMockLogger();
    const installer = new DefaultRuntimeLibraryInstaller(
      processRunner,
      httpClient,
      fileSystem,
      extractor,
      createMockPathProvider(),
      logger
    );
    return { installer, fileSystem, extractor, processRunner, logger };
  }

  it("copies shared objects found anywhere in the bundle", async () => {
    const { installer, fileSystem, extractor } = createInstaller({
      contents: {
        "cuda-libs/lib/libcudart.so.12": file("cudart"),
        "cuda-libs/lib/nested/libcublas.so.12": file("cublas"),
        "cuda-libs/README.md": file("readme"),
      },
    });

    const result = await installer.install(PLAN);

    expect(result).toEqual({ copied: 2, libraryDir: LIB_DIR, needsLibraryPath: true });
    expect(fileSystem.$.filesUnder(LIB_DIR)).toEqual([
      `${LIB_DIR}/libcublas.so.12`,
      `${LIB_DIR}/libcudart.so.12`,
    ]);
    expect(fileSystem.$.readText(`${LIB_DIR}/libcudart.so.12`)).toBe("cudart");
    expect(extractor.extract).toHaveBeenCalledWith(
      `${TEMP_DIR}/cuda-libs-linux-x64.tar.xz`,
      `${TEMP_DIR}/extracted`
    );
  });

  it("removes the temporary directory afterwards", async () => {
    const { installer, fileSystem } = createInstaller({
      contents: { "libcudart.so.12": file("cudart") },
    });

    await installer.install(PLAN);

    expect(fileSystem.$.entries.has(TEMP_DIR)).toBe(false);
  });

  it("reports an empty bundle without requiring a library path", async () => {
    const { installer, logger } = createInstaller({ contents: { "README.md": file("readme") } });

    const result = await installer.install(PLAN);

    expect(result).toEqual({ copied: 0, libraryDir: LIB_DIR, needsLibraryPath: false });
    expect(logger.warn).toHaveBeenCalledWith("No shared objects in CUDA bundle", {
      url: CUDA_BUNDLE_URL,
    });
  });

  it("requires tar", async () => {
    const { installer, processRunner } = createInstaller({ tar: "missing" });

    const error = await installer.install(PLAN).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(ArchiveError);
    expect(error).toMatchObject({
      errorCode: "TOOL_MISSING",
      message: "tar is required to install CUDA libraries (tar.xz). Please install tar.",
    });
    expect(processRunner.run).toHaveBeenCalledWith("tar", ["--version"]);
  });

  it("wraps download failures", async () => {
    const { installer, fileSystem } = createInstaller({ status: 404 });

    const error = await installer.install(PLAN).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RemediationError);
    expect(error).toMatchObject({
      errorCode: "DOWNLOAD_FAILED",
      message: `Failed to download CUDA runtime libraries: HTTP 404 downloading from ${CUDA_BUNDLE_URL}`,
    });
    expect(fileSystem.$.entries.has(TEMP_DIR)).toBe(false);
  });

  it("wraps extraction failures", async () => {
    const { installer } = createInstaller({ extractError: "EXTRACTION_FAILED" });

    const error = await installer.install(PLAN).catch((e: unknown) => e);

    expect(error).toBeInstanceOf(RemediationError);
    expect(error).toMatchObject({
      errorCode: "EXTRACTION_FAILED",
      message: "Failed to extract CUDA runtime libraries: tar: Unexpected EOF in archive",
    });
  });

  it("passes a missing extraction tool through", async () => {
    const { installer } = createInstaller({ extractError: "TOOL_MISSING" });

    await expect(installer.install(PLAN)).rejects.toMatchObject({
      name: "ArchiveError",
      errorCode: "TOOL_MISSING",
    });
  });
});

