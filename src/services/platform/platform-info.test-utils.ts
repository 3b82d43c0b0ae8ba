/**
 * Test utilities for PlatformInfo.
 */
import type { PlatformInfo } from "./platform-info.js";

/**
 * Create a mock PlatformInfo.
 * Defaults to a Linux x86_64 host with a bash login shell.
 */
export function createMockPlatformInfo(overrides?: Partial<PlatformInfo>): PlatformInfo {
  return {
    osName: overrides?.osName ?? "Linux",
    machine: overrides?.machine ?? "x86_64",
    homeDir: overrides?.homeDir ?? "/home/test",
    shell: overrides && "shell" in overrides ? overrides.shell : "/bin/bash",
  };
}
