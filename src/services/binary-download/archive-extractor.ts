/**
 * Archive extraction interface and implementations.
 */

import yauzl, { type Entry, type ZipFile } from "yauzl";
import * as fs from "node:fs";
import * as path from "node:path";
import type { Readable } from "node:stream";
import { pipeline } from "node:stream/promises";
import { ArchiveError } from "./errors.js";
import type { ProcessRunner } from "../platform/process.js";
import { isSpawnFailure } from "../platform/process.js";
import { getErrorMessage } from "../errors.js";

/**
 * Interface for extracting archives.
 */
export interface ArchiveExtractor {
  /**
   * Extract an archive to a destination directory.
   *
   * @param archivePath - Path to the archive file
   * @param destDir - Directory to extract to (will be created if it doesn't exist)
   * @throws ArchiveError on extraction failure
   */
  extract(archivePath: string, destDir: string): Promise<void>;
}

/**
 * Map a library error to an ArchiveError.
 *
 * @param corruptMarkers - Message fragments (matched case-insensitively) that mean the archive itself is broken
 */
function toArchiveError(
  error: unknown,
  archivePath: string,
  destDir: string,
  corruptMarkers: readonly string[]
): ArchiveError {
  if (error instanceof ArchiveError) {
    return error;
  }
  const message = getErrorMessage(error);
  const lowerMessage = message.toLowerCase();
  if (message.includes("EACCES") || message.includes("EPERM")) {
    return new ArchiveError(
      `Permission denied extracting to ${destDir}: ${message}`,
      "PERMISSION_DENIED"
    );
  }
  if (corruptMarkers.some((marker) => lowerMessage.includes(marker.toLowerCase()))) {
    return new ArchiveError(
      `Invalid or corrupt archive at ${archivePath}: ${message}`,
      "INVALID_ARCHIVE"
    );
  }
  return new ArchiveError(`Failed to extract ${archivePath}: ${message}`, "EXTRACTION_FAILED");
}

const S_IFMT = 0o170000;
const S_IFLNK = 0o120000;

function openZip(archivePath: string): Promise<ZipFile> {
  return new Promise((resolve, reject) => {
    yauzl.open(archivePath, { lazyEntries: true }, (error, zipfile) => {
      if (error) {
        reject(error);
      } else {
        resolve(zipfile);
      }
    });
  });
}

/**
 * Read the next entry, or null at the end of the archive.
 */
function nextEntry(zipfile: ZipFile): Promise<Entry | null> {
  return new Promise((resolve, reject) => {
    const onEntry = (entry: Entry): void => {
      detach();
      resolve(entry);
    };
    const onEnd = (): void => {
      detach();
      resolve(null);
    };
    const onError = (error: Error): void => {
      detach();
      reject(error);
    };
    const detach = (): void => {
      zipfile.off("entry", onEntry);
      zipfile.off("end", onEnd);
      zipfile.off("error", onError);
    };
    zipfile.on("entry", onEntry);
    zipfile.on("end", onEnd);
    zipfile.on("error", onError);
    zipfile.readEntry();
  });
}

async function readEntryText(stream: Readable): Promise<string> {
  const chunks: Buffer[] = [];
  for await (const chunk of stream) {
    chunks.push(Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk)));
  }
  return Buffer.concat(chunks).toString("utf-8");
}

function openEntryStream(zipfile: ZipFile, entry: Entry): Promise<Readable> {
  return new Promise((resolve, reject) => {
    zipfile.openReadStream(entry, (error, stream) => {
      if (error) {
        reject(
          new ArchiveError(
            `Failed to read entry ${entry.fileName}: ${error.message}`,
            "EXTRACTION_FAILED"
          )
        );
      } else {
        resolve(stream);
      }
    });
  });
}

/**
 * Extractor for .zip archives using the `yauzl` package.
 * Unix file modes and symlinks stored in the archive are restored.
 */
export class ZipExtractor implements ArchiveExtractor {
  async extract(archivePath: string, destDir: string): Promise<void> {
    try {
      await fs.promises.mkdir(destDir, { recursive: true });
      const zipfile = await openZip(archivePath);
      try {
        await this.extractEntries(zipfile, path.resolve(destDir));
      } finally {
        zipfile.close();
      }
    } catch (error) {
      throw toArchiveError(error, archivePath, destDir, ["end of central directory", "invalid"]);
    }
  }

  private async extractEntries(zipfile: ZipFile, destRoot: string): Promise<void> {
    for (let entry = await nextEntry(zipfile); entry !== null; entry = await nextEntry(zipfile)) {
      const entryPath = path.resolve(destRoot, entry.fileName);
      if (!entryPath.startsWith(destRoot + path.sep)) {
        throw new ArchiveError(
          `Path traversal detected in archive: ${entry.fileName}`,
          "INVALID_ARCHIVE"
        );
      }

      if (entry.fileName.endsWith("/")) {
        await fs.promises.mkdir(entryPath, { recursive: true });
        continue;
      }

      await fs.promises.mkdir(path.dirname(entryPath), { recursive: true });
      const stream = await openEntryStream(zipfile, entry);

      // Unix mode lives in the upper 16 bits of the external attributes
      const unixMode = entry.externalFileAttributes >>> 16;
      if ((unixMode & S_IFMT) === S_IFLNK) {
        // Symlink entries store the link target as their content
        await fs.promises.symlink(await readEntryText(stream), entryPath);
        continue;
      }

      await pipeline(stream, fs.createWriteStream(entryPath));
      const mode = unixMode & 0o777;
      if (mode !== 0) {
        await fs.promises.chmod(entryPath, mode);
      }
    }
  }
}

/**
 * Extractor for .tar.xz archives using the system `tar` command.
 */
export class SystemTarXzExtractor implements ArchiveExtractor {
  constructor(private readonly processRunner: ProcessRunner) {}

  async extract(archivePath: string, destDir: string): Promise<void> {
    try {
      await fs.promises.mkdir(destDir, { recursive: true });
    } catch (error) {
      throw toArchiveError(error, archivePath, destDir, []);
    }

    const result = await this.processRunner.run("tar", ["-xJf", archivePath, "-C", destDir]).wait();
    if (isSpawnFailure(result)) {
      throw new ArchiveError(
        "tar is required to extract .tar.xz archives. Please install tar.",
        "TOOL_MISSING"
      );
    }
    if (result.exitCode !== 0) {
      throw toArchiveError(new Error(result.stderr.trim()), archivePath, destDir, [
        "not in xz format",
        "Unexpected EOF",
        "File format not recognized",
      ]);
    }
  }
}

/**
 * Archive extractor that selects the appropriate implementation based on file extension.
 */
export class DefaultArchiveExtractor implements ArchiveExtractor {
  private readonly zipExtractor = new ZipExtractor();
  private readonly tarXzExtractor: SystemTarXzExtractor;

  constructor(processRunner: ProcessRunner) {
    this.tarXzExtractor = new SystemTarXzExtractor(processRunner);
  }

  async extract(archivePath: string, destDir: string): Promise<void> {
    const lowerPath = archivePath.toLowerCase();

    if (lowerPath.endsWith(".tar.xz") || lowerPath.endsWith(".txz")) {
      return this.tarXzExtractor.extract(archivePath, destDir);
    }

    if (lowerPath.endsWith(".zip")) {
      return this.zipExtractor.extract(archivePath, destDir);
    }

    throw new ArchiveError(
      `Unsupported archive format: ${archivePath}. Supported formats: .zip, .tar.xz`,
      "INVALID_ARCHIVE"
    );
  }
}
