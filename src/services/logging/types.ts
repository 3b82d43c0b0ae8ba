/**
 * Logging types and interfaces.
 *
 * Provides a testable logging abstraction over electron-log with:
 * - Type-safe logger names (scopes)
 * - Constrained context type (no nested objects, functions, symbols)
 * - Interface for dependency injection
 */

/**
 * Log levels in order of verbosity (most verbose to least).
 */
export const LogLevel = {
  silly: "silly",
  debug: "debug",
  info: "info",
  warn: "warn",
  error: "error",
} as const;

export type LogLevel = (typeof LogLevel)[keyof typeof LogLevel];

/**
 * Valid logger names (scopes).
 * Each name corresponds to a module or subsystem of the installer.
 */
export type LoggerName =
  | "process" // ExecaProcessRunner - process spawning
  | "network" // DefaultNetworkLayer - HTTP
  | "fs" // DefaultFileSystemLayer - filesystem operations
  | "capabilities" // HardwareCapabilityProber - GPU/CUDA/SIMD probes
  | "release" // ReleaseClient and asset resolution
  | "binary-download" // BinaryDownloadService - archive download and install
  | "runtime-deps" // DependencyValidator and CUDA runtime remediation
  | "config" // ConfigGenerator - config.yaml generation
  | "model" // ModelDownloadService - GGUF model download
  | "shell" // ShellProfileService - PATH and LD_LIBRARY_PATH setup
  | "installer"; // Installer run orchestration

/**
 * Context data for log entries.
 * Constrained to primitive types for serialization safety:
 * - No nested objects (prevents circular references)
 * - No functions or symbols (not serializable)
 * - null allowed for explicit "no value" cases
 */
export type LogContext = Record<string, string | number | boolean | null>;

/**
 * Logger interface for dependency injection.
 * Services receive this interface via constructor injection.
 *
 * @example
 * ```typescript
 * class MyService {
 *   constructor(private readonly logger: Logger) {}
 *
 *   async doWork(): Promise<void> {
 *     this.logger.debug('Starting work', { taskId: 'abc123' });
 *     try {
 *       // ... work
 *       this.logger.info('Work complete', { durationMs: 100 });
 *     } catch (error) {
 *       this.logger.error('Work failed', { taskId: 'abc123' });
 *     }
 *   }
 * }
 * ```
 */
export interface Logger {
  /**
   * Log a silly message (most verbose).
   * Use for per-iteration/per-scan details that would be overwhelming in normal debug output.
   */
  silly(message: string, context?: LogContext): void;

  /**
   * Log a debug message.
   * Use for detailed tracing information useful during development.
   */
  debug(message: string, context?: LogContext): void;

  /**
   * Log an info message.
   * Use for significant operations (start/stop, connections, completions).
   */
  info(message: string, context?: LogContext): void;

  /**
   * Log a warning message.
   * Use for recoverable issues or deprecated behavior.
   */
  warn(message: string, context?: LogContext): void;

  /**
   * Log an error message.
   * Use for failures that require attention.
   *
   * @param message - Human-readable error description
   * @param context - Structured context data
   * @param error - Optional Error object for stack trace inclusion
   */
  error(message: string, context?: LogContext, error?: Error): void;
}

/**
 * Logging service interface.
 * Creates named loggers for the installer services.
 *
 * @example
 * ```typescript
 * const loggingService = new ElectronLogService(pathProvider);
 * const logger = loggingService.createLogger("release");
 * const releaseClient = new GitHubReleaseClient(httpClient, logger);
 * ```
 */
export interface LoggingService {
  /**
   * Create a logger with the specified name (scope).
   * The name appears in log output to identify the source.
   */
  createLogger(name: LoggerName): Logger;

  /**
   * Dispose of the logging service.
   */
  dispose(): void;
}
