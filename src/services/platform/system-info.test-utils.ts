/**
 * Test utilities for SystemInfo.
 */
import { vi, type Mock } from "vitest";
import { err, ok, type Result } from "../../shared/result.js";
import type { SystemInfo, SystemInfoError } from "./system-info.js";

export interface MockSystemInfo extends SystemInfo {
  cpuFlags: Mock<() => Promise<Result<readonly string[], SystemInfoError>>>;
}

/**
 * Create a mock SystemInfo.
 *
 * @param cpuFlags - Flags to report, or an error message to fail with. Defaults to no flags.
 */
export function createMockSystemInfo(
  cpuFlags: readonly string[] | { readonly error: string } = []
): MockSystemInfo {
  return {
    cpuFlags: vi.fn(async () =>
      "error" in cpuFlags
        ? err<SystemInfoError>({ code: "QUERY_FAILED", message: cpuFlags.error })
        : ok(cpuFlags)
    ),
  };
}
