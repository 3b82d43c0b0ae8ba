/**
 * Checks whether the CUDA runtime libraries the installed build needs can be loaded.
 */

import { join } from "node:path";
import type { Logger } from "../logging/index.js";
import type { FileSystemLayer } from "../platform/filesystem.js";
import { pathExists } from "../platform/filesystem.js";
import type { ProcessRunner } from "../platform/process.js";
import { isSpawnFailure } from "../platform/process.js";
import { FileSystemError } from "../errors.js";
import { cacheProvides, matchesSoname, type LinkerCache } from "../capabilities/linker-cache.js";

/**
 * CUDA 12 runtime libraries the llama backend links against.
 */
export const CUDA_RUNTIME_SONAMES = [
  "libcudart.so.12",
  "libcublas.so.12",
  "libcublasLt.so.12",
] as const;

/**
 * Directories searched when the linker cache does not list a library.
 */
export const LIBRARY_SEARCH_DIRS = [
  "/usr/local/cuda/lib64",
  "/usr/lib/x86_64-linux-gnu",
  "/lib/x86_64-linux-gnu",
  "/usr/lib64",
  "/lib64",
  "/usr/lib",
  "/lib",
] as const;

const LLAMA_LIBRARY = "libllama.so";

export type ValidationStrategy = "loader-resolution" | "library-presence";

export type ValidationOutcome =
  | { readonly kind: "resolvable"; readonly strategy: ValidationStrategy }
  | {
      readonly kind: "missing-libraries";
      readonly strategy: ValidationStrategy;
      /** Missing SONAMEs, in the order of {@link CUDA_RUNTIME_SONAMES} */
      readonly libraries: readonly string[];
    }
  | { readonly kind: "indeterminate"; readonly strategy: ValidationStrategy; readonly reason: string };

/**
 * Outcome of {@link RuntimeDependencyValidator.validate}; never indeterminate.
 */
export type DefiniteOutcome = Exclude<ValidationOutcome, { kind: "indeterminate" }>;

export interface RuntimeDependencyValidator {
  /**
   * Check the CUDA runtime of an installed NVIDIA build.
   * Asks the dynamic loader first and falls back to looking for the files.
   *
   * @param libraryCandidates - Paths of the llama library, first existing one is checked
   */
  validate(libraryCandidates: readonly string[]): Promise<DefiniteOutcome>;
}

/**
 * Where to look for the installed llama library.
 */
export function defaultLibraryCandidates(binDir: string, cwd: string): string[] {
  return [join(binDir, LLAMA_LIBRARY), join(cwd, LLAMA_LIBRARY)];
}

/**
 * Interpret `ldd` output for the CUDA runtime libraries.
 *
 * @example
 * parseLddOutput("\tlibcudart.so.12 => not found\n"); // missing-libraries ["libcudart.so.12"]
 */
export function parseLddOutput(output: string): ValidationOutcome {
  const strategy = "loader-resolution";
  const lines = output.split("\n");
  const missing = CUDA_RUNTIME_SONAMES.filter((soname) =>
    lines.some((line) => line.includes(soname) && /not found/.test(line.slice(line.indexOf(soname))))
  );
  if (missing.length > 0) {
    return { kind: "missing-libraries", strategy, libraries: missing };
  }
  if (!CUDA_RUNTIME_SONAMES.some((soname) => output.includes(soname))) {
    return { kind: "indeterminate", strategy, reason: "no CUDA runtime references" };
  }
  return { kind: "resolvable", strategy };
}

export class DefaultRuntimeDependencyValidator implements RuntimeDependencyValidator {
  constructor(
    private readonly processRunner: ProcessRunner,
    private readonly fileSystem: FileSystemLayer,
    private readonly linkerCache: LinkerCache,
    private readonly logger: Logger
  ) {}

  async validate(libraryCandidates: readonly string[]): Promise<DefiniteOutcome> {
    const loader = await this.checkLoaderResolution(libraryCandidates);
    const outcome = loader.kind === "indeterminate" ? await this.checkLibraryPresence() : loader;

    this.logger.info("CUDA runtime validated", {
      outcome: outcome.kind,
      strategy: outcome.strategy,
      missing: outcome.kind === "missing-libraries" ? outcome.libraries.join(",") : null,
    });
    return outcome;
  }

  /**
   * Ask `ldd` whether the llama library's CUDA dependencies resolve.
   */
  async checkLoaderResolution(libraryCandidates: readonly string[]): Promise<ValidationOutcome> {
    const strategy = "loader-resolution";
    let library: string | undefined;
    for (const candidate of libraryCandidates) {
      if (await pathExists(this.fileSystem, candidate)) {
        library = candidate;
        break;
      }
    }
    if (library === undefined) {
      this.logger.debug("No llama library to check", { candidates: libraryCandidates.join(",") });
      return { kind: "indeterminate", strategy, reason: `${LLAMA_LIBRARY} not found` };
    }

    const result = await this.processRunner.run("ldd", [library]).wait();
    if (isSpawnFailure(result)) {
      return { kind: "indeterminate", strategy, reason: "ldd not found" };
    }
    if (result.stdout.trim() === "") {
      return { kind: "indeterminate", strategy, reason: "no ldd output" };
    }

    const outcome = parseLddOutput(result.stdout);
    this.logger.debug("Loader resolution checked", { library, outcome: outcome.kind });
    return outcome;
  }

  /**
   * Look for each CUDA runtime library in the linker cache and the usual directories.
   */
  async checkLibraryPresence(): Promise<DefiniteOutcome> {
    const cache = await this.linkerCache.entries();
    const missing: string[] = [];
    for (const soname of CUDA_RUNTIME_SONAMES) {
      const inCache = cache.kind === "found" && cacheProvides(cache.value, soname);
      if (!inCache && !(await this.foundInSearchDirs(soname))) {
        missing.push(soname);
      }
    }
    return missing.length === 0
      ? { kind: "resolvable", strategy: "library-presence" }
      : { kind: "missing-libraries", strategy: "library-presence", libraries: missing };
  }

  private async foundInSearchDirs(soname: string): Promise<boolean> {
    for (const dir of LIBRARY_SEARCH_DIRS) {
      try {
        const entries = await this.fileSystem.readdir(dir);
        if (entries.some((entry) => matchesSoname(entry.name, soname))) {
          this.logger.debug("Library found", { soname, dir });
          return true;
        }
      } catch (error) {
        if (!(error instanceof FileSystemError)) throw error;
      }
    }
    return false;
  }
}
