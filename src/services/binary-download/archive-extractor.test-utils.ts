/**
 * Test utilities for ArchiveExtractor.
 */

import { vi, type Mock } from "vitest";
import type { ArchiveExtractor } from "./archive-extractor.js";
import type { ArchiveErrorCode } from "./errors.js";
import { ArchiveError } from "./errors.js";
import type { Entry, MockFileSystemLayer } from "../platform/filesystem.test-utils.js";

/**
 * Options for creating a mock archive extractor.
 */
export interface MockArchiveExtractorOptions {
  /**
   * Archive contents, keyed by path relative to the destination.
   * Written into `fileSystem` on extract.
   */
  readonly contents?: Readonly<Record<string, Entry>>;
  /** In-memory filesystem receiving the contents */
  readonly fileSystem?: MockFileSystemLayer;
  /**
   * If provided, the extract method will reject with this error.
   */
  readonly error?: {
    message: string;
    code: ArchiveErrorCode;
  };
}

/**
 * Mock ArchiveExtractor type with spy on extract.
 */
export interface MockArchiveExtractor extends ArchiveExtractor {
  extract: Mock<(archivePath: string, destDir: string) => Promise<void>>;
}

/**
 * Create a mock ArchiveExtractor with controllable behavior.
 *
 * @example
 * const fs = createMockFileSystemLayer();
 * const extractor = createMockArchiveExtractor({
 *   fileSystem: fs,
 *   contents: { "remembrances-mcp-linux/remembrances-mcp": file("binary") },
 * });
 */
export function createMockArchiveExtractor(
  options: MockArchiveExtractorOptions = {}
): MockArchiveExtractor {
  return {
    extract: vi.fn(async (_archivePath: string, destDir: string): Promise<void> => {
      if (options.error) {
        throw new ArchiveError(options.error.message, options.error.code);
      }
      if (options.fileSystem) {
        options.fileSystem.$.setEntry(destDir, { type: "directory" });
        for (const [relativePath, entry] of Object.entries(options.contents ?? {})) {
          options.fileSystem.$.setEntry(`${destDir}/${relativePath}`, entry);
        }
      }
    }),
  };
}
