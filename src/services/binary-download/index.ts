/**
 * Binary download module public API.
 */

export type {
  DownloadProgress,
  DownloadProgressCallback,
  ExtractedRelease,
  InstalledFiles,
} from "./types.js";

export type { BinaryDownloadErrorCode, ArchiveErrorCode } from "./errors.js";
export { BinaryDownloadError, ArchiveError } from "./errors.js";

export type { ArchiveExtractor } from "./archive-extractor.js";
export { ZipExtractor, SystemTarXzExtractor, DefaultArchiveExtractor } from "./archive-extractor.js";

export { downloadToFile, DOWNLOAD_TIMEOUT_MS, type DownloadDeps } from "./download.js";

export type { BinaryDownloadService } from "./binary-download-service.js";
export { DefaultBinaryDownloadService, BINARY_NAME } from "./binary-download-service.js";
