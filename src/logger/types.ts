// ============================================
// LOGGER TYPES
// ============================================

export enum LogLevel {
  DEBUG = "debug",
  INFO = "info",
  WARN = "warn",
  ERROR = "error",
}

export const LOG_LEVELS: readonly LogLevel[] = [
  LogLevel.DEBUG,
  LogLevel.INFO,
  LogLevel.WARN,
  LogLevel.ERROR,
];

export interface LogEntry {
  timestamp: Date;
  level: LogLevel;
  message: string;
  scope?: string;
  context?: Record<string, unknown>;
  error?: Error;
}

export interface LoggerConfig {
  logDir: string;
  level: LogLevel;
  enableConsole: boolean;
  enableFile: boolean;
  scope?: string; // Prefix for every entry, e.g. "ollama"
}

export interface Logger {
  debug(message: string, context?: Record<string, unknown>): void;
  info(message: string, context?: Record<string, unknown>): void;
  warn(message: string, context?: Record<string, unknown>): void;
  error(message: string, error?: Error, context?: Record<string, unknown>): void;
  child(scope: string): Logger;
}
