/**
 * Service error definitions with serialization support for the JSON summary.
 */

import type { FileSystemErrorCode } from "./platform/filesystem.js";

/**
 * Error codes for host platform checks.
 */
export type PlatformErrorCode = "UNSUPPORTED_OS" | "UNSUPPORTED_ARCH" | "UNSUPPORTED_COMBINATION";

/**
 * Error codes for release metadata and asset resolution.
 */
export type ReleaseErrorCode = "NETWORK_ERROR" | "INVALID_RESPONSE" | "NO_ASSET" | "NO_MAPPING";

/**
 * Error codes for binary download operations.
 */
export type BinaryDownloadErrorCode = "NETWORK_ERROR" | "EXTRACTION_FAILED" | "BINARY_NOT_FOUND";

/**
 * Error codes for archive extraction operations.
 */
export type ArchiveErrorCode =
  | "INVALID_ARCHIVE"
  | "EXTRACTION_FAILED"
  | "PERMISSION_DENIED"
  | "TOOL_MISSING";

/**
 * Error codes for the CUDA runtime remediation step.
 */
export type RemediationErrorCode = "DOWNLOAD_FAILED" | "EXTRACTION_FAILED";

/**
 * Error codes for installer settings.
 */
export type ConfigErrorCode = "INVALID_SETTING";

/**
 * Serialized error format.
 */
export interface SerializedError {
  readonly type:
    | "platform"
    | "release"
    | "binary-download"
    | "archive"
    | "remediation"
    | "config"
    | "filesystem";
  readonly message: string;
  readonly code?: string;
  readonly path?: string;
}

/**
 * Base class for all service errors.
 */
export abstract class ServiceError extends Error {
  abstract readonly type: SerializedError["type"];
  readonly code: string | undefined;

  constructor(message: string, code?: string) {
    super(message);
    this.name = this.constructor.name;
    this.code = code ?? undefined;
    // Fix prototype chain for instanceof to work
    Object.setPrototypeOf(this, new.target.prototype);
  }

  /**
   * Serialize the error for the `--json` summary.
   */
  toJSON(): SerializedError {
    const result: SerializedError = {
      type: this.type,
      message: this.message,
    };
    if (this.code !== undefined) {
      return { ...result, code: this.code };
    }
    return result;
  }
}

/**
 * The host operating system or architecture cannot run any release asset.
 */
export class PlatformError extends ServiceError {
  readonly type = "platform" as const;

  constructor(
    message: string,
    readonly errorCode: PlatformErrorCode
  ) {
    super(message, errorCode);
    this.name = "PlatformError";
  }
}

/**
 * Error from release metadata fetching or asset resolution.
 */
export class ReleaseError extends ServiceError {
  readonly type = "release" as const;

  constructor(
    message: string,
    readonly errorCode: ReleaseErrorCode
  ) {
    super(message, errorCode);
    this.name = "ReleaseError";
  }
}

/**
 * Error from downloading and installing the application archive.
 */
export class BinaryDownloadError extends ServiceError {
  readonly type = "binary-download" as const;

  constructor(
    message: string,
    readonly errorCode?: BinaryDownloadErrorCode
  ) {
    super(message, errorCode);
    this.name = "BinaryDownloadError";
  }
}

/**
 * Error from archive extraction operations (zip, tar.xz).
 */
export class ArchiveError extends ServiceError {
  readonly type = "archive" as const;

  constructor(
    message: string,
    readonly errorCode?: ArchiveErrorCode
  ) {
    super(message, errorCode);
    this.name = "ArchiveError";
  }
}

/**
 * Error from installing the CUDA runtime library bundle.
 * Only fails the remediation step; the installed application stays in place.
 */
export class RemediationError extends ServiceError {
  readonly type = "remediation" as const;

  constructor(
    message: string,
    readonly errorCode: RemediationErrorCode
  ) {
    super(message, errorCode);
    this.name = "RemediationError";
  }
}

/**
 * Invalid installer setting (environment variable).
 */
export class ConfigError extends ServiceError {
  readonly type = "config" as const;

  constructor(
    message: string,
    /** Name of the offending setting */
    readonly setting: string
  ) {
    super(message, "INVALID_SETTING" satisfies ConfigErrorCode);
    this.name = "ConfigError";
  }
}

/**
 * Error from filesystem operations.
 */
export class FileSystemError extends ServiceError {
  readonly type = "filesystem" as const;

  constructor(
    /** Mapped error code */
    readonly fsCode: FileSystemErrorCode,
    /** Path that caused the error */
    readonly path: string,
    message: string,
    /** Original error for debugging */
    readonly cause?: Error,
    /** Original Node.js error code (e.g., "EMFILE", "ENOSPC") */
    readonly originalCode?: string
  ) {
    super(message, fsCode);
    this.name = "FileSystemError";
  }

  override toJSON(): SerializedError {
    return {
      type: this.type,
      message: this.message,
      path: this.path,
      code: this.fsCode,
    };
  }
}

/**
 * Type guard to check if an error is a ServiceError.
 */
export function isServiceError(error: unknown): error is ServiceError {
  return error instanceof ServiceError;
}

/**
 * Type guard for a FileSystemError carrying a specific code.
 */
export function isFileSystemErrorWithCode(
  error: unknown,
  code: FileSystemErrorCode
): error is FileSystemError {
  return error instanceof FileSystemError && error.fsCode === code;
}

export { getErrorMessage } from "../shared/error-utils.js";
