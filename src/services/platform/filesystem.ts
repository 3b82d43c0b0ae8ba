/**
 * FileSystemLayer - Abstraction over filesystem operations.
 *
 * Provides an injectable interface for filesystem access, enabling:
 * - Unit testing of services with mock FileSystemLayer
 * - Boundary testing of DefaultFileSystemLayer against real filesystem
 * - Consistent error handling via FileSystemError
 */

import * as fs from "node:fs/promises";
import { tmpdir } from "node:os";
import { basename, dirname, join } from "node:path";
import { FileSystemError, isFileSystemErrorWithCode } from "../errors.js";
import type { Logger } from "../logging/index.js";

/**
 * Directory entry returned by readdir.
 */
export interface DirEntry {
  /** Entry name (not full path) */
  readonly name: string;
  /** True if entry is a directory */
  readonly isDirectory: boolean;
  /** True if entry is a regular file */
  readonly isFile: boolean;
  /** True if entry is a symbolic link */
  readonly isSymbolicLink: boolean;
}

/**
 * Options for mkdir operation.
 */
export interface MkdirOptions {
  /** Create parent directories if they don't exist (default: true) */
  readonly recursive?: boolean;
}

/**
 * Options for rm operation.
 */
export interface RmOptions {
  /** Remove directories and their contents recursively (default: false) */
  readonly recursive?: boolean;
  /** Ignore errors if path doesn't exist (default: false) */
  readonly force?: boolean;
}

/**
 * Error codes for filesystem operations.
 */
export type FileSystemErrorCode =
  | "ENOENT" // File/directory not found
  | "EACCES" // Permission denied
  | "EEXIST" // File/directory already exists
  | "ENOTDIR" // Not a directory
  | "EISDIR" // Is a directory (when file expected)
  | "ENOTEMPTY" // Directory not empty
  | "UNKNOWN"; // Other errors (check originalCode)

/**
 * Abstraction over filesystem operations.
 *
 * All paths are absolute. All text operations use UTF-8 encoding.
 * Methods throw FileSystemError on failures.
 *
 * NOTE: No exists() method - use try/catch on actual operations, or {@link pathExists}
 * for pure presence probes.
 */
export interface FileSystemLayer {
  /**
   * Read entire file as UTF-8 string.
   *
   * @throws FileSystemError with code ENOENT if file not found
   * @throws FileSystemError with code EISDIR if path is a directory
   */
  readFile(path: string): Promise<string>;

  /**
   * Write content to file. Overwrites existing file.
   *
   * @throws FileSystemError with code ENOENT if parent directory doesn't exist
   */
  writeFile(path: string, content: string): Promise<void>;

  /**
   * Append content to file, creating it when missing.
   *
   * @throws FileSystemError with code ENOENT if parent directory doesn't exist
   */
  appendFile(path: string, content: string): Promise<void>;

  /**
   * Write binary content to file. Overwrites existing file.
   */
  writeFileBuffer(path: string, content: Buffer): Promise<void>;

  /**
   * Create directory. Creates parent directories by default.
   * No-op if directory already exists.
   *
   * @throws FileSystemError with code EEXIST if path exists as a file
   */
  mkdir(path: string, options?: MkdirOptions): Promise<void>;

  /**
   * Create a fresh, uniquely named directory under the OS temp directory.
   *
   * @param prefix - Name prefix, e.g. "remembrances-install-"
   * @returns Absolute path of the created directory
   */
  makeTempDir(prefix: string): Promise<string>;

  /**
   * List directory contents.
   *
   * @throws FileSystemError with code ENOENT if directory not found
   * @throws FileSystemError with code ENOTDIR if path is not a directory
   */
  readdir(path: string): Promise<readonly DirEntry[]>;

  /**
   * Delete file or directory.
   *
   * @example Remove directory tree, no error if missing
   * await fs.rm('/tmp/remembrances-install-abc', { recursive: true, force: true });
   */
  rm(path: string, options?: RmOptions): Promise<void>;

  /**
   * Copy a file or directory tree to a new location.
   * Overwrites existing files at destination.
   * Creates destination parent directories if they don't exist.
   *
   * @throws FileSystemError with code ENOENT if source doesn't exist
   */
  copyTree(src: string, dest: string): Promise<void>;

  /**
   * Make a file executable (sets mode 0o755).
   *
   * @throws FileSystemError with code ENOENT if file not found
   */
  makeExecutable(path: string): Promise<void>;
}

/**
 * Check whether a path exists by listing its parent directory.
 * Any failure to list the parent counts as "does not exist".
 */
export async function pathExists(fileSystem: FileSystemLayer, path: string): Promise<boolean> {
  try {
    const entries = await fileSystem.readdir(dirname(path));
    const name = basename(path);
    return entries.some((entry) => entry.name === name);
  } catch (error) {
    if (error instanceof FileSystemError) {
      return false;
    }
    throw error;
  }
}

/**
 * Read a file, returning null when it does not exist.
 */
export async function readFileIfExists(
  fileSystem: FileSystemLayer,
  path: string
): Promise<string | null> {
  try {
    return await fileSystem.readFile(path);
  } catch (error) {
    if (isFileSystemErrorWithCode(error, "ENOENT")) {
      return null;
    }
    throw error;
  }
}

// ============================================================================
// Helper Functions
// ============================================================================

const KNOWN_ERROR_CODES: ReadonlySet<string> = new Set<FileSystemErrorCode>([
  "ENOENT",
  "EACCES",
  "EEXIST",
  "ENOTDIR",
  "EISDIR",
  "ENOTEMPTY",
]);

function isKnownErrorCode(code: string): code is Exclude<FileSystemErrorCode, "UNKNOWN"> {
  return KNOWN_ERROR_CODES.has(code);
}

/**
 * Extract the POSIX error code from a Node.js error.
 * Handles both ErrnoException (regular fs errors) and SystemError (rm errors,
 * which carry codes like ERR_FS_EISDIR with the POSIX code in info.code).
 */
function extractErrorCode(error: Error): string | undefined {
  if ("info" in error && typeof error.info === "object" && error.info !== null) {
    if ("code" in error.info && typeof error.info.code === "string") {
      return error.info.code;
    }
  }
  if ("code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

/**
 * Map a Node.js filesystem error to a FileSystemError.
 */
function mapError(error: unknown, path: string): FileSystemError {
  if (!(error instanceof Error)) {
    return new FileSystemError("UNKNOWN", path, String(error));
  }

  const code = extractErrorCode(error);

  if (code && isKnownErrorCode(code)) {
    return new FileSystemError(code, path, error.message, error);
  }

  // Unknown error code - preserve original code
  return new FileSystemError("UNKNOWN", path, error.message, error, code);
}

// ============================================================================
// DefaultFileSystemLayer Implementation
// ============================================================================

/**
 * Default implementation of FileSystemLayer using node:fs/promises.
 * Maps Node.js errors to FileSystemError for consistent error handling.
 */
export class DefaultFileSystemLayer implements FileSystemLayer {
  constructor(private readonly logger: Logger) {}

  async readFile(filePath: string): Promise<string> {
    this.logger.debug("Read", { path: filePath });
    try {
      return await fs.readFile(filePath, "utf-8");
    } catch (error) {
      throw this.fail("Read failed", error, filePath);
    }
  }

  async writeFile(filePath: string, content: string): Promise<void> {
    this.logger.debug("Write", { path: filePath });
    try {
      await fs.writeFile(filePath, content, "utf-8");
    } catch (error) {
      throw this.fail("Write failed", error, filePath);
    }
  }

  async appendFile(filePath: string, content: string): Promise<void> {
    this.logger.debug("Append", { path: filePath });
    try {
      await fs.appendFile(filePath, content, "utf-8");
    } catch (error) {
      throw this.fail("Append failed", error, filePath);
    }
  }

  async writeFileBuffer(filePath: string, content: Buffer): Promise<void> {
    this.logger.debug("WriteBuffer", { path: filePath, size: content.length });
    try {
      await fs.writeFile(filePath, content);
    } catch (error) {
      throw this.fail("WriteBuffer failed", error, filePath);
    }
  }

  async mkdir(dirPath: string, options?: MkdirOptions): Promise<void> {
    const recursive = options?.recursive ?? true;
    this.logger.debug("Mkdir", { path: dirPath });
    try {
      await fs.mkdir(dirPath, { recursive });
    } catch (error) {
      throw this.fail("Mkdir failed", error, dirPath);
    }
  }

  async makeTempDir(prefix: string): Promise<string> {
    const base = join(tmpdir(), prefix);
    try {
      const created = await fs.mkdtemp(base);
      this.logger.debug("MakeTempDir", { path: created });
      return created;
    } catch (error) {
      throw this.fail("MakeTempDir failed", error, base);
    }
  }

  async readdir(dirPath: string): Promise<readonly DirEntry[]> {
    try {
      const entries = await fs.readdir(dirPath, { withFileTypes: true });
      const result = entries.map((entry) => ({
        name: entry.name,
        isDirectory: entry.isDirectory(),
        isFile: entry.isFile(),
        isSymbolicLink: entry.isSymbolicLink(),
      }));
      this.logger.silly("Readdir", { path: dirPath, count: result.length });
      return result;
    } catch (error) {
      // Missing directories are routine when probing library paths
      const fsError = mapError(error, dirPath);
      this.logger.debug("Readdir failed", { path: dirPath, code: fsError.fsCode });
      throw fsError;
    }
  }

  async rm(targetPath: string, options?: RmOptions): Promise<void> {
    const recursive = options?.recursive ?? false;
    const force = options?.force ?? false;
    this.logger.debug("Rm", { path: targetPath, recursive });
    try {
      if (recursive) {
        await fs.rm(targetPath, { recursive, force });
      } else {
        const stat = await fs.stat(targetPath);
        if (stat.isDirectory()) {
          // rmdir fails with ENOTEMPTY if not empty
          await fs.rmdir(targetPath);
        } else {
          await fs.rm(targetPath, { force });
        }
      }
    } catch (error) {
      const fsError = mapError(error, targetPath);
      if (force && fsError.fsCode === "ENOENT") {
        return;
      }
      this.logger.warn("Rm failed", {
        path: targetPath,
        code: fsError.fsCode,
        error: fsError.message,
      });
      throw fsError;
    }
  }

  async copyTree(src: string, dest: string): Promise<void> {
    this.logger.debug("CopyTree", { src, dest });
    try {
      await fs.cp(src, dest, {
        recursive: true,
        force: true,
        preserveTimestamps: true,
      });
    } catch (error) {
      const fsError = mapError(error, src);
      this.logger.warn("CopyTree failed", {
        src,
        dest,
        code: fsError.fsCode,
        error: fsError.message,
      });
      throw fsError;
    }
  }

  async makeExecutable(filePath: string): Promise<void> {
    try {
      await fs.chmod(filePath, 0o755);
    } catch (error) {
      throw mapError(error, filePath);
    }
  }

  private fail(message: string, error: unknown, path: string): FileSystemError {
    const fsError = mapError(error, path);
    const context = { path, code: fsError.fsCode, error: fsError.message };
    if (fsError.fsCode === "ENOENT") {
      this.logger.debug(message, context);
    } else {
      this.logger.warn(message, context);
    }
    return fsError;
  }
}
