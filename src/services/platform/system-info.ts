/**
 * CPU feature listing using systeminformation.
 */

import si from "systeminformation";
import { err, ok, type Result } from "../../shared/result.js";

export interface SystemInfoError {
  readonly code: "QUERY_FAILED";
  readonly message: string;
}

/**
 * Interface for system information queries.
 * Abstracts the underlying implementation for testability.
 */
export interface SystemInfo {
  /**
   * List the CPU feature flags of the host, lower-cased.
   * An empty list means the platform did not report any.
   */
  cpuFlags(): Promise<Result<readonly string[], SystemInfoError>>;
}

/**
 * SystemInfo implementation using systeminformation.
 */
export class SiSystemInfo implements SystemInfo {
  async cpuFlags(): Promise<Result<readonly string[], SystemInfoError>> {
    try {
      const flags = await si.cpuFlags();
      return ok(
        flags
          .toLowerCase()
          .split(/\s+/)
          .filter((flag) => flag !== "")
      );
    } catch (error) {
      return err({
        code: "QUERY_FAILED",
        message: error instanceof Error ? error.message : "Unknown error",
      });
    }
  }
}
