/**
 * Process spawning utilities.
 */

import { execa } from "execa";
import type { Logger } from "../logging/index.js";

/**
 * Result of running a process command.
 */
export interface ProcessResult {
  readonly stdout: string;
  readonly stderr: string;
  /**
   * Exit code, or null if process didn't exit normally.
   * null when: killed by signal or spawn error (command missing, not executable).
   */
  readonly exitCode: number | null;
  /** Signal name if process was killed (e.g., 'SIGTERM', 'SIGKILL') */
  readonly signal?: string;
}

/**
 * Handle for a spawned process.
 */
export interface SpawnedProcess {
  /**
   * Process ID.
   * undefined if process failed to spawn (e.g., ENOENT, EACCES).
   */
  readonly pid: number | undefined;

  /**
   * Wait for the process to exit.
   * Never throws for process exit status - check result fields instead.
   *
   * @example
   * const result = await proc.wait();
   * if (result.exitCode === null && result.signal === undefined) {
   *   // command not found
   * }
   */
  wait(): Promise<ProcessResult>;
}

/**
 * Interface for running external processes.
 * Allows dependency injection for testing.
 */
export interface ProcessRunner {
  /**
   * Start a process and return a handle to it.
   * Returns synchronously - the process is spawned immediately.
   *
   * @example
   * const proc = runner.run('ldconfig', ['-p']);
   * const result = await proc.wait();
   * if (result.exitCode !== 0) {
   *   logger.warn('ldconfig failed', { stderr: result.stderr });
   * }
   */
  run(command: string, args: readonly string[]): SpawnedProcess;
}

/**
 * True when the result describes a command that never started.
 */
export function isSpawnFailure(result: ProcessResult): boolean {
  return result.exitCode === null && result.signal === undefined;
}

function startProcess(command: string, args: readonly string[]) {
  return execa(command, [...args], {
    cleanup: true,
    reject: false, // Don't throw on non-zero exit - check exitCode instead
  });
}

type ExecaSubprocess = ReturnType<typeof startProcess>;

/**
 * SpawnedProcess implementation wrapping an execa subprocess.
 */
export class ExecaSpawnedProcess implements SpawnedProcess {
  private cachedResult: Promise<ProcessResult> | null = null;

  constructor(
    private readonly subprocess: ExecaSubprocess,
    private readonly logger: Logger,
    private readonly command: string
  ) {}

  get pid(): number | undefined {
    return this.subprocess.pid;
  }

  wait(): Promise<ProcessResult> {
    if (this.cachedResult === null) {
      this.cachedResult = this.waitForProcess().then((result) => {
        this.logResult(result);
        return result;
      });
    }
    return this.cachedResult;
  }

  private logResult(result: ProcessResult): void {
    this.logOutputLines(result.stdout, "stdout");
    this.logOutputLines(result.stderr, "stderr");

    if (isSpawnFailure(result)) {
      this.logger.debug("Spawn failed", { command: this.command, error: result.stderr });
      return;
    }
    this.logger.debug("Exited", {
      command: this.command,
      pid: this.pid ?? 0,
      exitCode: result.exitCode ?? -1,
      signal: result.signal ?? null,
    });
  }

  /**
   * Log output lines at SILLY level; `ldconfig -p` alone prints thousands.
   */
  private logOutputLines(output: string, stream: "stdout" | "stderr"): void {
    if (!output) return;

    const prefix = `[${this.command} ${this.pid ?? 0}]`;
    for (const line of output.split("\n")) {
      if (line.trim() === "") continue;
      this.logger.silly(`${prefix} ${stream}: ${line}`);
    }
  }

  private async waitForProcess(): Promise<ProcessResult> {
    try {
      const result = await this.subprocess;
      return toProcessResult(result);
    } catch (error) {
      // Pure spawn error (ENOENT, EACCES, etc.)
      return {
        stdout: "",
        stderr: error instanceof Error ? error.message : String(error),
        exitCode: null,
      };
    }
  }
}

function toProcessResult(result: Awaited<ExecaSubprocess>): ProcessResult {
  const stdout = typeof result.stdout === "string" ? result.stdout : "";
  let stderr = typeof result.stderr === "string" ? result.stderr : "";

  // For spawn errors (ENOENT, EACCES), execa sets failed=true and resolves with the
  // error itself instead of throwing (with reject: false)
  if (result.failed && !stderr && result instanceof Error) {
    stderr = result.message;
  }

  const processResult: ProcessResult = {
    stdout,
    stderr,
    exitCode: result.exitCode ?? null,
  };
  if (result.signal) {
    return { ...processResult, signal: result.signal };
  }
  return processResult;
}

/**
 * Process runner implementation using execa.
 */
export class ExecaProcessRunner implements ProcessRunner {
  constructor(private readonly logger: Logger) {}

  run(command: string, args: readonly string[]): SpawnedProcess {
    const subprocess = startProcess(command, args);
    const spawned = new ExecaSpawnedProcess(subprocess, this.logger, command);

    // Spawn failures have no PID; they are logged from wait()
    if (spawned.pid !== undefined) {
      this.logger.debug("Spawned", { command, args: args.join(" "), pid: spawned.pid });
    }

    return spawned;
  }
}
