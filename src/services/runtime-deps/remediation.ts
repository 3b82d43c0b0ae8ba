/**
 * Installs the CUDA runtime library bundle when validation finds the
 * system libraries missing.
 */

import { basename, join } from "node:path";
import type { Logger } from "../logging/index.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import type { HttpClient } from "../platform/network.js";
import type { PathProvider } from "../platform/path-provider.js";
import type { ProcessRunner } from "../platform/process.js";
import { isSpawnFailure } from "../platform/process.js";
import type { ArchiveExtractor } from "../binary-download/archive-extractor.js";
import { downloadToFile } from "../binary-download/download.js";
import type { DownloadProgressCallback } from "../binary-download/types.js";
import type { InstallerSettings } from "../config/installer-settings.js";
import { ArchiveError, RemediationError, getErrorMessage } from "../errors.js";
import { CUDA_RUNTIME_SONAMES, type ValidationOutcome } from "./dependency-validator.js";

/**
 * Bundle of CUDA 12 runtime libraries published with the application releases.
 */
export const CUDA_BUNDLE_URL =
  "https://github.com/madeindigio/remembrances-mcp/releases/download/v1.16.4/cuda-libs-linux-x64.tar.xz";

export type RemediationPlan =
  | { readonly kind: "none" }
  | { readonly kind: "install-bundle"; readonly libraries: readonly string[]; readonly bundleUrl: string }
  | { readonly kind: "skipped"; readonly libraries: readonly string[] };

export type InstallBundlePlan = Extract<RemediationPlan, { kind: "install-bundle" }>;

export interface RemediationResult {
  /** Number of library files copied */
  readonly copied: number;
  readonly libraryDir: string;
  /** True when the library directory must be added to LD_LIBRARY_PATH */
  readonly needsLibraryPath: boolean;
}

/**
 * Decide what to do about a validation outcome.
 * An indeterminate outcome is treated as every runtime library missing.
 */
export function planRemediation(
  outcome: ValidationOutcome,
  settings: Pick<InstallerSettings, "skipCudaLibs">
): RemediationPlan {
  if (outcome.kind === "resolvable") {
    return { kind: "none" };
  }
  const libraries =
    outcome.kind === "missing-libraries" ? outcome.libraries : [...CUDA_RUNTIME_SONAMES];
  if (settings.skipCudaLibs) {
    return { kind: "skipped", libraries };
  }
  return { kind: "install-bundle", libraries, bundleUrl: CUDA_BUNDLE_URL };
}

/**
 * True for `*.so` and versioned `*.so.*` files.
 */
export function isSharedObject(fileName: string): boolean {
  return fileName.endsWith(".so") || fileName.includes(".so.");
}

export interface RuntimeLibraryInstaller {
  /**
   * Download the bundle and copy its shared objects into the user library directory.
   *
   * @throws ArchiveError TOOL_MISSING when tar is not installed
   * @throws RemediationError DOWNLOAD_FAILED or EXTRACTION_FAILED
   */
  install(plan: InstallBundlePlan, onProgress?: DownloadProgressCallback): Promise<RemediationResult>;
}

export class DefaultRuntimeLibraryInstaller implements RuntimeLibraryInstaller {
  constructor(
    private readonly processRunner: ProcessRunner,
    private readonly httpClient: HttpClient,
    private readonly fileSystem: FileSystemLayer,
    private readonly archiveExtractor: ArchiveExtractor,
    private readonly pathProvider: PathProvider,
    private readonly logger: Logger
  ) {}

  async install(
    plan: InstallBundlePlan,
    onProgress?: DownloadProgressCallback
  ): Promise<RemediationResult> {
    const tar = await this.processRunner.run("tar", ["--version"]).wait();
    if (isSpawnFailure(tar)) {
      throw new ArchiveError(
        "tar is required to install CUDA libraries (tar.xz). Please install tar.",
        "TOOL_MISSING"
      );
    }

    const libraryDir = this.pathProvider.cudaLibDir;
    await this.fileSystem.mkdir(libraryDir);

    const tempDir = await this.fileSystem.makeTempDir("remembrances-cuda-");
    try {
      const archivePath = join(tempDir, basename(new URL(plan.bundleUrl).pathname));
      const extractDir = join(tempDir, "extracted");

      try {
        await downloadToFile(
          { httpClient: this.httpClient, fileSystem: this.fileSystem },
          plan.bundleUrl,
          archivePath,
          onProgress
        );
      } catch (error) {
        throw new RemediationError(
          `Failed to download CUDA runtime libraries: ${getErrorMessage(error)}`,
          "DOWNLOAD_FAILED"
        );
      }

      try {
        await this.archiveExtractor.extract(archivePath, extractDir);
      } catch (error) {
        if (error instanceof ArchiveError && error.errorCode === "TOOL_MISSING") throw error;
        throw new RemediationError(
          `Failed to extract CUDA runtime libraries: ${getErrorMessage(error)}`,
          "EXTRACTION_FAILED"
        );
      }

      const sources = await this.findSharedObjects(extractDir);
      for (const source of sources) {
        await this.fileSystem.copyTree(source, join(libraryDir, basename(source)));
      }

      if (sources.length === 0) {
        this.logger.warn("No shared objects in CUDA bundle", { url: plan.bundleUrl });
      } else {
        this.logger.info("CUDA libraries installed", { copied: sources.length, libraryDir });
      }
      return { copied: sources.length, libraryDir, needsLibraryPath: sources.length > 0 };
    } finally {
      await this.removeTempDir(tempDir);
    }
  }

  /**
   * Regular shared-object files anywhere under `dir`, sorted by path.
   * Symbolic links are not followed or copied.
   */
  private async findSharedObjects(dir: string): Promise<string[]> {
    const found: string[] = [];
    for (const entry of await this.fileSystem.readdir(dir)) {
      const entryPath = join(dir, entry.name);
      if (entry.isDirectory) {
        found.push(...(await this.findSharedObjects(entryPath)));
      } else if (entry.isFile && isSharedObject(entry.name)) {
        found.push(entryPath);
      }
    }
    return found.sort();
  }

  private async removeTempDir(tempDir: string): Promise<void> {
    try {
      await this.fileSystem.rm(tempDir, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn("Failed to remove temporary directory", {
        path: tempDir,
        error: getErrorMessage(error),
      });
    }
  }
}
