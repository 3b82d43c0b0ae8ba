/**
 * Test utilities for service tests.
 * These helpers create temporary directories with automatic cleanup.
 */

import { mkdtemp, rm, realpath } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";

/**
 * Create a temporary directory with automatic cleanup.
 * @returns Object with path and cleanup function
 */
export async function createTempDir(): Promise<{
  path: string;
  cleanup: () => Promise<void>;
}> {
  const tempPath = await mkdtemp(join(tmpdir(), "remembrances-test-"));
  // Resolve to canonical path so path comparisons in tests hold (macOS /var -> /private/var)
  const resolvedPath = await realpath(tempPath);
  return {
    path: resolvedPath,
    cleanup: async () => {
      await rm(resolvedPath, { recursive: true, force: true });
    },
  };
}

/**
 * Run a test function with a temporary directory.
 * The directory is cleaned up afterwards, even if the test fails.
 */
export async function withTempDir(fn: (dirPath: string) => Promise<void>): Promise<void> {
  const { path, cleanup } = await createTempDir();
  try {
    await fn(path);
  } finally {
    await cleanup();
  }
}
