export type { Logger, LoggerName, LoggingService, LogContext } from "./types.js";
export { LogLevel } from "./types.js";
export { ElectronLogService } from "./electron-log-service.js";
