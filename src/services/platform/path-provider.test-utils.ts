/**
 * Test utilities for PathProvider.
 */
import { join } from "node:path";
import type { PathProvider } from "./path-provider.js";

/**
 * Create a mock PathProvider.
 * Defaults to the Linux layout under `/home/test`.
 */
export function createMockPathProvider(overrides?: Partial<PathProvider>): PathProvider {
  const homeDir = overrides?.homeDir ?? "/home/test";
  const installDir = overrides?.installDir ?? join(homeDir, ".local", "share", "remembrances");
  return {
    homeDir,
    installDir,
    configDir: overrides?.configDir ?? join(homeDir, ".config", "remembrances"),
    dataDir: overrides?.dataDir ?? installDir,
    binDir: overrides?.binDir ?? join(installDir, "bin"),
    modelsDir: overrides?.modelsDir ?? join(installDir, "models"),
    logsDir: overrides?.logsDir ?? join(installDir, "logs"),
    cudaLibDir: overrides?.cudaLibDir ?? join(homeDir, ".local", "lib"),
  };
}
