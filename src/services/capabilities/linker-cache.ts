/**
 * Dynamic linker cache (`ldconfig -p`) lookups.
 */

import { basename } from "node:path";
import type { Logger } from "../logging/index.js";
import type { ProcessRunner } from "../platform/process.js";
import { isSpawnFailure } from "../platform/process.js";
import { found, indeterminate, type ProbeResult } from "./probe.js";

/**
 * One library listed by `ldconfig -p`.
 */
export interface LinkerCacheEntry {
  /** Library name as listed, e.g. "libcudart.so.12" */
  readonly name: string;
  /** Resolved path, e.g. "/usr/local/cuda/lib64/libcudart.so.12" */
  readonly path: string;
}

/**
 * ldconfig is often outside a regular user's PATH.
 */
const LDCONFIG_COMMANDS = ["ldconfig", "/sbin/ldconfig"] as const;

/**
 * Parse `ldconfig -p` output.
 *
 * @example
 * parseLinkerCache("\tlibcudart.so.12 (libc6,x86-64) => /usr/local/cuda/lib64/libcudart.so.12");
 * // [{ name: "libcudart.so.12", path: "/usr/local/cuda/lib64/libcudart.so.12" }]
 */
export function parseLinkerCache(output: string): LinkerCacheEntry[] {
  const entries: LinkerCacheEntry[] = [];
  for (const line of output.split("\n")) {
    const match = /^\s*(\S+)\s+\([^)]*\)\s+=>\s+(\S.*?)\s*$/.exec(line);
    if (match?.[1] && match[2]) {
      entries.push({ name: match[1], path: match[2] });
    }
  }
  return entries;
}

/**
 * True when a file name is the SONAME itself or a dotted version of it
 * (`libcublas.so.12.6.4.1` for `libcublas.so.12`).
 */
export function matchesSoname(fileName: string, soname: string): boolean {
  return fileName === soname || fileName.startsWith(`${soname}.`);
}

/**
 * True when any cache entry provides the SONAME.
 */
export function cacheProvides(entries: readonly LinkerCacheEntry[], soname: string): boolean {
  return entries.some(
    (entry) => matchesSoname(entry.name, soname) || matchesSoname(basename(entry.path), soname)
  );
}

/**
 * Loads the linker cache once and shares it between probes.
 */
export class LinkerCache {
  private loaded: Promise<ProbeResult<readonly LinkerCacheEntry[]>> | null = null;

  constructor(
    private readonly processRunner: ProcessRunner,
    private readonly logger: Logger
  ) {}

  /**
   * Cache entries, or indeterminate when ldconfig is unavailable or fails.
   */
  entries(): Promise<ProbeResult<readonly LinkerCacheEntry[]>> {
    this.loaded ??= this.load();
    return this.loaded;
  }

  private async load(): Promise<ProbeResult<readonly LinkerCacheEntry[]>> {
    for (const command of LDCONFIG_COMMANDS) {
      const result = await this.processRunner.run(command, ["-p"]).wait();
      if (isSpawnFailure(result)) {
        continue;
      }
      if (result.exitCode !== 0) {
        this.logger.debug("ldconfig failed", { command, exitCode: result.exitCode });
        return indeterminate(`${command} exited with ${result.exitCode ?? "signal"}`);
      }
      const entries = parseLinkerCache(result.stdout);
      this.logger.debug("Linker cache loaded", { command, entries: entries.length });
      return found(entries);
    }
    return indeterminate("ldconfig not found");
  }
}
