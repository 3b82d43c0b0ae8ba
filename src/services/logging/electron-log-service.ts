/**
 * ElectronLogService - logging implementation using electron-log's Node.js entry point.
 *
 * Features:
 * - Session-based log files: `<logsDir>/<datetime>-<uuid>.log`
 * - Environment variable configuration for level and console output
 * - Named logger scopes for component identification
 * - Context serialization as key=value pairs
 */

import log from "electron-log/node";
import { randomUUID } from "node:crypto";
import { join } from "node:path";
import type { PathProvider } from "../platform/path-provider.js";
import type { Logger, LoggerName, LoggingService, LogContext, LogLevel } from "./types.js";
import { LogLevel as LogLevelValues } from "./types.js";

/**
 * Type for electron-log scope (log functions).
 */
type ElectronLogScope = ReturnType<typeof log.scope>;

/**
 * Level used when REMEMBRANCES_LOGLEVEL is unset or invalid.
 */
export const DEFAULT_LOG_LEVEL: LogLevel = "info";

/**
 * Format context object as key=value pairs for log message.
 *
 * @returns Formatted string like "key1=value1 key2=value2"
 */
export function formatContext(context: LogContext | undefined): string {
  if (!context) return "";
  return Object.entries(context)
    .map(([key, value]) => {
      if (value === null) return `${key}=null`;
      return `${key}=${String(value)}`;
    })
    .join(" ");
}

function isLogLevel(value: string): value is LogLevel {
  return Object.values<string>(LogLevelValues).includes(value);
}

/**
 * Parse and validate REMEMBRANCES_LOGLEVEL environment variable.
 *
 * @returns Valid log level or undefined if invalid
 */
export function parseLogLevel(envValue: string | undefined): LogLevel | undefined {
  if (!envValue) return undefined;
  const normalized = envValue.toLowerCase().trim();
  return isLogLevel(normalized) ? normalized : undefined;
}

/**
 * Generate session-based log filename.
 * Format: YYYY-MM-DDTHH-MM-SS-<uuid>.log
 */
function generateSessionFilename(): string {
  const timestamp = new Date()
    .toISOString()
    .replace(/[:.]/g, "-") // Replace : and . with -
    .slice(0, 19); // YYYY-MM-DDTHH-MM-SS
  const uuid = randomUUID().slice(0, 8);
  return `${timestamp}-${uuid}.log`;
}

/**
 * Logger implementation wrapping an electron-log scope.
 */
class ElectronLogLogger implements Logger {
  constructor(private readonly scope: ElectronLogScope) {}

  silly(message: string, context?: LogContext): void {
    this.scope.silly(withContext(message, context));
  }

  debug(message: string, context?: LogContext): void {
    this.scope.debug(withContext(message, context));
  }

  info(message: string, context?: LogContext): void {
    this.scope.info(withContext(message, context));
  }

  warn(message: string, context?: LogContext): void {
    this.scope.warn(withContext(message, context));
  }

  error(message: string, context?: LogContext, error?: Error): void {
    if (error) {
      // Include error message and stack
      this.scope.error(withContext(message, context), error);
    } else {
      this.scope.error(withContext(message, context));
    }
  }
}

function withContext(message: string, context: LogContext | undefined): string {
  const contextStr = formatContext(context);
  return contextStr ? `${message} ${contextStr}` : message;
}

const LOGGER_NAMES: ReadonlySet<string> = new Set<LoggerName>([
  "process",
  "network",
  "fs",
  "capabilities",
  "release",
  "binary-download",
  "runtime-deps",
  "config",
  "model",
  "shell",
  "installer",
]);

function isLoggerName(value: string): value is LoggerName {
  return LOGGER_NAMES.has(value);
}

/**
 * Parse REMEMBRANCES_LOGGER env var to get set of allowed logger names.
 * Unknown names are ignored.
 *
 * @returns Set of allowed logger names, or undefined if not set (allow all)
 */
export function parseLoggerFilter(envValue: string | undefined): Set<LoggerName> | undefined {
  if (!envValue) return undefined;
  const names = envValue
    .split(",")
    .map((name) => name.trim())
    .filter(isLoggerName);
  if (names.length === 0) return undefined;
  return new Set(names);
}

/**
 * Logger that filters based on allowed logger names.
 * If the logger is not in the allowed set, all log methods are no-ops.
 */
class FilteredLogger implements Logger {
  private readonly enabled: boolean;

  constructor(
    private readonly inner: Logger,
    allowedLoggers: Set<LoggerName> | undefined,
    name: LoggerName
  ) {
    this.enabled = allowedLoggers === undefined || allowedLoggers.has(name);
  }

  silly(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.silly(message, context);
  }

  debug(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.debug(message, context);
  }

  info(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.info(message, context);
  }

  warn(message: string, context?: LogContext): void {
    if (this.enabled) this.inner.warn(message, context);
  }

  error(message: string, context?: LogContext, error?: Error): void {
    if (this.enabled) this.inner.error(message, context, error);
  }
}

/**
 * Installer logging service using electron-log.
 *
 * Configuration:
 * - Default level: INFO
 * - Override via REMEMBRANCES_LOGLEVEL environment variable
 * - Console output via REMEMBRANCES_PRINT_LOGS (any non-empty value)
 * - Logger filtering via REMEMBRANCES_LOGGER (comma-separated logger names)
 *
 * @example
 * ```typescript
 * const loggingService = new ElectronLogService(pathProvider);
 * const logger = loggingService.createLogger("capabilities");
 * logger.info("Probed", { hasNvidiaGpu: true, cudaMajorVersion: 12 });
 * // Output: [2025-12-16 10:30:00.123] [info] [capabilities] Probed hasNvidiaGpu=true cudaMajorVersion=12
 * ```
 */
export class ElectronLogService implements LoggingService {
  private readonly loggers = new Map<LoggerName, Logger>();
  private readonly logLevel: LogLevel;
  private readonly allowedLoggers: Set<LoggerName> | undefined;

  constructor(pathProvider: Pick<PathProvider, "logsDir">) {
    this.logLevel = parseLogLevel(process.env.REMEMBRANCES_LOGLEVEL) ?? DEFAULT_LOG_LEVEL;
    const enableConsole = !!process.env.REMEMBRANCES_PRINT_LOGS;
    this.allowedLoggers = parseLoggerFilter(process.env.REMEMBRANCES_LOGGER);

    const filename = generateSessionFilename();
    log.transports.file.resolvePathFn = (): string => join(pathProvider.logsDir, filename);
    log.transports.file.level = this.logLevel;
    log.transports.console.level = enableConsole ? this.logLevel : false;

    // Format: [timestamp] [level] [scope] message
    log.transports.file.format = "[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {scope} {text}";
    log.transports.console.format = "[{y}-{m}-{d} {h}:{i}:{s}.{ms}] [{level}] {scope} {text}";
  }

  createLogger(name: LoggerName): Logger {
    const existing = this.loggers.get(name);
    if (existing) {
      return existing;
    }

    const scope = log.scope(`[${name}]`);
    const logger = new FilteredLogger(new ElectronLogLogger(scope), this.allowedLoggers, name);
    this.loggers.set(name, logger);
    return logger;
  }

  dispose(): void {
    this.loggers.clear();
  }
}
