/**
 * Tests for DefaultRuntimeDependencyValidator.
 */

import { describe, it, expect } from "vitest";
import {
  DefaultRuntimeDependencyValidator,
  defaultLibraryCandidates,
  parseLddOutput,
} from "./dependency-validator.js";
import { LinkerCache } from "../capabilities/linker-cache.js";
import {
  COMMAND_NOT_FOUND,
  createMockProcessRunner,
  exitedWith,
  type ScriptedResult,
} from "../platform/process.test-utils.js";
import {
  createMockFileSystemLayer,
  directory,
  file,
  type Entry,
} from "../platform/filesystem.test-utils.js";
import { createMockLogger, createSilentLogger } from "../logging/logging.test-utils.js";

const BIN_DIR = "/home/test/.local/share/remembrances/bin";
const LLAMA = `${BIN_DIR}/libllama.so`;
const CANDIDATES = defaultLibraryCandidates(BIN_DIR, "/work");

const LDD_ALL_RESOLVED = [
  "\tlinux-vdso.so.1 (0x00007ffd)",
  "\tlibcudart.so.12 => /usr/local/cuda/lib64/libcudart.so.12 (0x00007f01)",
  "\tlibcublas.so.12 => /usr/local/cuda/lib64/libcublas.so.12 (0x00007f02)",
  "\tlibcublasLt.so.12 => /usr/local/cuda/lib64/libcublasLt.so.12 (0x00007f03)",
].join("\n");

const LDD_TWO_MISSING = [
  "\tlibcudart.so.12 => /usr/local/cuda/lib64/libcudart.so.12 (0x00007f01)",
  "\tlibcublas.so.12 => not found",
  "\tlibcublasLt.so.12 => not found",
].join("\n");

const LDCONFIG_CUDART_ONLY = [
  "3 libs found in cache `/etc/ld.so.cache'",
  "\tlibcudart.so.12 (libc6,x86-64) => /usr/lib/x86_64-linux-gnu/libcudart.so.12",
  "\tlibc.so.6 (libc6,x86-64) => /lib/x86_64-linux-gnu/libc.so.6",
].join("\n");

function createValidator(options: {
  commands?: Record<string, ScriptedResult>;
  files?: Record<string, Entry>;
}) {
  const runner = createMockProcessRunner(options.commands);
  const fs = createMockFileSystemLayer({ entries: options.files ?? {} });
  const logger = createMockLogger();
  const validator = new DefaultRuntimeDependencyValidator(
    runner,
    fs,
    new LinkerCache(runner, createSilentLogger()),
    logger
  );
  return { validator, runner, logger };
}

describe("defaultLibraryCandidates", () => {
  it("checks the install directory before the working directory", () => {
    expect(CANDIDATES).toEqual([LLAMA, "/work/libllama.so"]);
  });
});

describe("parseLddOutput", () => {
  it("reports resolvable when every runtime library resolves", () => {
    expect(parseLddOutput(LDD_ALL_RESOLVED)).toEqual({
      kind: "resolvable",
      strategy: "loader-resolution",
    });
  });

  it("lists unresolved libraries in canonical order", () => {
    expect(parseLddOutput(LDD_TWO_MISSING)).toEqual({
      kind: "missing-libraries",
      strategy: "loader-resolution",
      libraries: ["libcublas.so.12", "libcublasLt.so.12"],
    });
  });

  it("is indeterminate for a library without CUDA references", () => {
    expect(parseLddOutput("\tlibc.so.6 => /lib/x86_64-linux-gnu/libc.so.6 (0x00007f01)")).toEqual({
      kind: "indeterminate",
      strategy: "loader-resolution",
      reason: "no CUDA runtime references",
    });
  });
});

describe("DefaultRuntimeDependencyValidator", () => {
  describe("validate", () => {
    it("trusts the loader when ldd answers", async () => {
      const { validator, runner, logger } = createValidator({
        commands: { ldd: exitedWith(0, LDD_TWO_MISSING) },
        files: { [LLAMA]: file("so") },
      });

      const outcome = await validator.validate(CANDIDATES);

      expect(outcome).toEqual({
        kind: "missing-libraries",
        strategy: "loader-resolution",
        libraries: ["libcublas.so.12", "libcublasLt.so.12"],
      });
      expect(runner.run).toHaveBeenCalledWith("ldd", [LLAMA]);
      expect(logger.info).toHaveBeenCalledWith("CUDA runtime validated", {
        outcome: "missing-libraries",
        strategy: "loader-resolution",
        missing: "libcublas.so.12,libcublasLt.so.12",
      });
    });

    it("uses the library in the working directory when the install has none", async () => {
      const { validator, runner } = createValidator({
        commands: { ldd: exitedWith(0, LDD_ALL_RESOLVED) },
        files: { "/work/libllama.so": file("so") },
      });

      const outcome = await validator.validate(CANDIDATES);

      expect(outcome).toEqual({ kind: "resolvable", strategy: "loader-resolution" });
      expect(runner.run).toHaveBeenCalledWith("ldd", ["/work/libllama.so"]);
    });

    it("falls back to the presence check without a llama library", async () => {
      const { validator, runner } = createValidator({
        commands: { ldconfig: exitedWith(0, LDCONFIG_CUDART_ONLY) },
        files: {
          "/usr/local/cuda/lib64/libcublas.so.12": file(""),
          "/usr/local/cuda/lib64/libcublasLt.so.12.4.5": file(""),
        },
      });

      const outcome = await validator.validate(CANDIDATES);

      expect(outcome).toEqual({ kind: "resolvable", strategy: "library-presence" });
      expect(runner.run).not.toHaveBeenCalledWith("ldd", expect.anything());
    });

    it("falls back to the presence check when ldd is not installed", async () => {
      const { validator } = createValidator({
        commands: { ldd: COMMAND_NOT_FOUND },
        files: { [LLAMA]: file("so") },
      });

      const outcome = await validator.validate(CANDIDATES);

      expect(outcome).toEqual({
        kind: "missing-libraries",
        strategy: "library-presence",
        libraries: ["libcudart.so.12", "libcublas.so.12", "libcublasLt.so.12"],
      });
    });

    it("falls back to the presence check when the library has no CUDA references", async () => {
      const { validator } = createValidator({
        commands: {
          ldd: exitedWith(0, "\tlibc.so.6 => /lib/x86_64-linux-gnu/libc.so.6 (0x00007f01)"),
          ldconfig: exitedWith(0, LDCONFIG_CUDART_ONLY),
        },
        files: { [LLAMA]: file("so") },
      });

      const outcome = await validator.validate(CANDIDATES);

      expect(outcome).toEqual({
        kind: "missing-libraries",
        strategy: "library-presence",
        libraries: ["libcublas.so.12", "libcublasLt.so.12"],
      });
    });
  });

  describe("checkLoaderResolution", () => {
    it("is indeterminate on empty ldd output", async () => {
      const { validator } = createValidator({
        commands: { ldd: exitedWith(1, "", "not a dynamic executable") },
        files: { [LLAMA]: file("so") },
      });

      expect(await validator.checkLoaderResolution([LLAMA])).toEqual({
        kind: "indeterminate",
        strategy: "loader-resolution",
        reason: "no ldd output",
      });
    });
  });

  describe("checkLibraryPresence", () => {
    it("finds libraries in the linker cache", async () => {
      const cache = [
        "\tlibcudart.so.12 (libc6,x86-64) => /usr/lib/x86_64-linux-gnu/libcudart.so.12",
        "\tlibcublas.so.12 (libc6,x86-64) => /usr/lib/x86_64-linux-gnu/libcublas.so.12",
        "\tlibcublasLt.so.12 (libc6,x86-64) => /usr/lib/x86_64-linux-gnu/libcublasLt.so.12",
      ].join("\n");
      const { validator } = createValidator({ commands: { ldconfig: exitedWith(0, cache) } });

      expect(await validator.checkLibraryPresence()).toEqual({
        kind: "resolvable",
        strategy: "library-presence",
      });
    });

    it("skips unreadable search directories", async () => {
      const { validator } = createValidator({
        files: {
          "/usr/local/cuda/lib64": directory({ error: "EACCES" }),
          "/usr/lib64/libcudart.so.12": file(""),
        },
      });

      expect(await validator.checkLibraryPresence()).toEqual({
        kind: "missing-libraries",
        strategy: "library-presence",
        libraries: ["libcublas.so.12", "libcublasLt.so.12"],
      });
    });
  });
});
