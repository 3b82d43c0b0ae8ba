/**
 * Types for downloading and installing the application.
 */

/**
 * Progress information for downloads.
 */
export interface DownloadProgress {
  /** Number of bytes downloaded so far */
  bytesDownloaded: number;
  /** Total bytes to download, null if Content-Length not provided */
  totalBytes: number | null;
}

/**
 * Callback for download progress updates.
 */
export type DownloadProgressCallback = (progress: DownloadProgress) => void;

/**
 * A downloaded and extracted release archive.
 */
export interface ExtractedRelease {
  /** Temporary directory holding the archive and its contents; removed by cleanup() */
  readonly tempDir: string;
  /** Top-level directory of the extracted contents */
  readonly extractedDir: string;
}

/**
 * Files placed by an installation.
 */
export interface InstalledFiles {
  readonly binaryPath: string;
  /** Shared libraries copied next to the binary */
  readonly libraries: readonly string[];
  /** Sample configuration files copied into the config directory */
  readonly sampleConfigs: readonly string[];
}
