/**
 * Test utilities for process module.
 */
import { vi, type Mock } from "vitest";
import type { SpawnedProcess, ProcessResult, ProcessRunner } from "./process.js";

/**
 * Mock SpawnedProcess with vitest mock methods for assertions.
 */
export interface MockSpawnedProcess extends SpawnedProcess {
  wait: Mock<() => Promise<ProcessResult>>;
}

/**
 * Mock ProcessRunner with vitest mock method for assertions.
 */
export interface MockProcessRunner extends ProcessRunner {
  run: Mock<(command: string, args: readonly string[]) => SpawnedProcess>;
}

/**
 * Scripted result for one command. A function receives the arguments.
 */
export type ScriptedResult = ProcessResult | ((args: readonly string[]) => ProcessResult);

/**
 * Result of a command that is not installed.
 */
export const COMMAND_NOT_FOUND: ProcessResult = {
  stdout: "",
  stderr: "spawn ENOENT",
  exitCode: null,
};

/**
 * Successful result with the given stdout.
 */
export function exitedWith(exitCode: number, stdout = "", stderr = ""): ProcessResult {
  return { exitCode, stdout, stderr };
}

/**
 * Create a mock SpawnedProcess with controllable behavior.
 *
 * @param overrides.pid - Process ID (defaults to 12345, set to null to simulate spawn failure)
 * @param overrides.waitResult - Result for wait() (can be a value or async function)
 */
export function createMockSpawnedProcess(overrides?: {
  pid?: number | null;
  waitResult?: ProcessResult | (() => Promise<ProcessResult>);
}): MockSpawnedProcess {
  const defaultResult: ProcessResult = {
    exitCode: 0,
    stdout: "",
    stderr: "",
  };

  // pid: null means undefined (spawn failure), otherwise use value or default
  const pid = overrides?.pid === null ? undefined : (overrides?.pid ?? 12345);

  return {
    pid,
    wait: vi.fn(async () => {
      if (typeof overrides?.waitResult === "function") {
        return overrides.waitResult();
      }
      return overrides?.waitResult ?? defaultResult;
    }),
  };
}

/**
 * Create a mock ProcessRunner with per-command scripted results.
 * Commands without a script behave as if they were not installed.
 *
 * @example
 * ```typescript
 * const runner = createMockProcessRunner({
 *   "nvidia-smi": exitedWith(0, "CUDA Version: 12.4"),
 *   ldconfig: COMMAND_NOT_FOUND,
 * });
 * ```
 */
export function createMockProcessRunner(
  scripts: Readonly<Record<string, ScriptedResult>> = {}
): MockProcessRunner {
  return {
    run: vi.fn((command: string, args: readonly string[]) => {
      const script = scripts[command];
      if (script === undefined) {
        return createMockSpawnedProcess({ pid: null, waitResult: COMMAND_NOT_FOUND });
      }
      const result = typeof script === "function" ? script(args) : script;
      return createMockSpawnedProcess({
        pid: result.exitCode === null && result.signal === undefined ? null : 12345,
        waitResult: result,
      });
    }),
  };
}
