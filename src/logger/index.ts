// ============================================
// LOGGER MODULE EXPORTS
// ============================================
export { AppLogger, createLogger, getDefaultLogger, setDefaultLogger } from "./logger.js";
export { LogFileWriter, formatFileLine } from "./file-writer.js";
export { LogLevel, LOG_LEVELS } from "./types.js";
export type { Logger, LoggerConfig, LogEntry } from "./types.js";
