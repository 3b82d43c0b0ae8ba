/**
 * Binary download service: fetches a release archive and installs the
 * remembrances-mcp binary, its shared libraries and sample configs.
 */

import * as path from "node:path";
import { BinaryDownloadError } from "./errors.js";
import { downloadToFile } from "./download.js";
import type { DownloadProgressCallback, ExtractedRelease, InstalledFiles } from "./types.js";
import type { ArchiveExtractor } from "./archive-extractor.js";
import type { HttpClient } from "../platform/network.js";
import type { DirEntry, FileSystemLayer } from "../platform/filesystem.js";
import type { PathProvider } from "../platform/path-provider.js";
import type { ReleaseAsset } from "../release/types.js";
import type { Logger } from "../logging/index.js";
import { getErrorMessage } from "../errors.js";

export const BINARY_NAME = "remembrances-mcp";

/**
 * Sample configs shipped in release archives.
 */
export const SAMPLE_CONFIGS = ["config.sample.yaml", "config.sample.gguf.yaml"] as const;

const TEMP_PREFIX = "remembrances-release-";

/**
 * True for shared library file names: `*.so`, `*.so.*` and `*.dylib`.
 */
export function isSharedLibrary(fileName: string): boolean {
  return fileName.endsWith(".so") || fileName.includes(".so.") || fileName.endsWith(".dylib");
}

/**
 * Service for downloading and installing the application.
 */
export interface BinaryDownloadService {
  /**
   * Download an asset into a fresh temporary directory and extract it.
   *
   * @throws BinaryDownloadError NETWORK_ERROR when the download fails
   * @throws ArchiveError when extraction fails
   */
  download(asset: ReleaseAsset, onProgress?: DownloadProgressCallback): Promise<ExtractedRelease>;

  /**
   * Install the binary, its sibling shared libraries and the sample configs.
   *
   * @throws BinaryDownloadError BINARY_NOT_FOUND when the archive has no binary
   */
  install(extractedDir: string): Promise<InstalledFiles>;

  /**
   * Remove a temporary directory created by download(). Failures are logged.
   */
  cleanup(release: ExtractedRelease): Promise<void>;
}

/**
 * Default implementation of BinaryDownloadService.
 */
export class DefaultBinaryDownloadService implements BinaryDownloadService {
  constructor(
    private readonly httpClient: HttpClient,
    private readonly fileSystemLayer: FileSystemLayer,
    private readonly archiveExtractor: ArchiveExtractor,
    private readonly pathProvider: PathProvider,
    private readonly logger: Logger
  ) {}

  async download(
    asset: ReleaseAsset,
    onProgress?: DownloadProgressCallback
  ): Promise<ExtractedRelease> {
    const tempDir = await this.fileSystemLayer.makeTempDir(TEMP_PREFIX);
    // Keep the asset name so the extractor can tell the format
    const archivePath = path.join(tempDir, path.basename(asset.filename));
    const contentDir = path.join(tempDir, "extracted");

    this.logger.info("Downloading", { asset: asset.filename, url: asset.downloadUrl });
    try {
      const bytes = await downloadToFile(
        { httpClient: this.httpClient, fileSystem: this.fileSystemLayer },
        asset.downloadUrl,
        archivePath,
        onProgress
      );
      this.logger.debug("Download complete", { asset: asset.filename, bytes });

      await this.archiveExtractor.extract(archivePath, contentDir);
    } catch (error) {
      this.logger.warn("Download failed", { asset: asset.filename, error: getErrorMessage(error) });
      await this.cleanup({ tempDir, extractedDir: contentDir });
      throw error;
    }

    const entries = await this.fileSystemLayer.readdir(contentDir);
    const topLevel = entries.find((entry) => entry.isDirectory);
    const extractedDir = topLevel ? path.join(contentDir, topLevel.name) : contentDir;
    this.logger.debug("Extracted", { extractedDir });
    return { tempDir, extractedDir };
  }

  async install(extractedDir: string): Promise<InstalledFiles> {
    const { binDir, configDir, dataDir, modelsDir } = this.pathProvider;
    for (const dir of [binDir, configDir, dataDir, modelsDir]) {
      await this.fileSystemLayer.mkdir(dir);
    }

    const sourceBinary =
      (await this.findDirectChild(extractedDir, BINARY_NAME)) ??
      (await this.findFile(extractedDir, BINARY_NAME));
    if (sourceBinary === null) {
      const contents = await this.listNames(extractedDir);
      throw new BinaryDownloadError(
        `Binary not found in release (extracted dir: ${extractedDir}, contents: ${contents})`,
        "BINARY_NOT_FOUND"
      );
    }

    const releaseDir = path.dirname(sourceBinary);
    this.logger.debug("Using release directory", { releaseDir });

    const binaryPath = path.join(binDir, BINARY_NAME);
    await this.fileSystemLayer.copyTree(sourceBinary, binaryPath);
    await this.fileSystemLayer.makeExecutable(binaryPath);

    const libraries: string[] = [];
    for (const entry of await this.fileSystemLayer.readdir(releaseDir)) {
      if (entry.isDirectory || !isSharedLibrary(entry.name)) continue;
      const dest = path.join(binDir, entry.name);
      await this.fileSystemLayer.copyTree(path.join(releaseDir, entry.name), dest);
      libraries.push(dest);
    }

    const sampleConfigs: string[] = [];
    for (const name of SAMPLE_CONFIGS) {
      const source =
        (await this.findDirectChild(releaseDir, name)) ?? (await this.findFile(extractedDir, name));
      if (source === null) continue;
      const dest = path.join(configDir, name);
      await this.fileSystemLayer.copyTree(source, dest);
      sampleConfigs.push(dest);
    }

    this.logger.info("Installed", {
      binaryPath,
      libraries: libraries.length,
      sampleConfigs: sampleConfigs.length,
    });
    return { binaryPath, libraries, sampleConfigs };
  }

  async cleanup(release: ExtractedRelease): Promise<void> {
    try {
      await this.fileSystemLayer.rm(release.tempDir, { recursive: true, force: true });
    } catch (error) {
      this.logger.warn("Failed to remove temporary directory", {
        dir: release.tempDir,
        error: getErrorMessage(error),
      });
    }
  }

  private async findDirectChild(dir: string, name: string): Promise<string | null> {
    const entries = await this.fileSystemLayer.readdir(dir);
    return entries.some((entry) => entry.isFile && entry.name === name) ? path.join(dir, name) : null;
  }

  /**
   * Depth-first search for a regular file, visiting entries in name order.
   */
  private async findFile(dir: string, name: string): Promise<string | null> {
    const entries = [...(await this.fileSystemLayer.readdir(dir))].sort(byName);
    for (const entry of entries) {
      if (entry.isFile && entry.name === name) {
        return path.join(dir, entry.name);
      }
    }
    for (const entry of entries) {
      if (!entry.isDirectory) continue;
      const found = await this.findFile(path.join(dir, entry.name), name);
      if (found !== null) return found;
    }
    return null;
  }

  private async listNames(dir: string): Promise<string> {
    const entries = await this.fileSystemLayer.readdir(dir);
    return entries.map((entry) => entry.name).sort().join(", ") || "(empty)";
  }
}

function byName(a: DirEntry, b: DirEntry): number {
  return a.name.localeCompare(b.name);
}
