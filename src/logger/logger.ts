import { LOG_LEVELS, LogLevel } from "./types.js";
import type { LogEntry, LoggerConfig, Logger } from "./types.js";
import { LogFileWriter } from "./file-writer.js";

// ============================================
// STANDARDIZED LOGGER
// ============================================
export class AppLogger implements Logger {
  private config: LoggerConfig;
  private fileWriter: LogFileWriter;
  private initialized: boolean = false;
  // File writes are chained so lines land in call order; close() drains it
  private pending: Promise<void> = Promise.resolve();

  constructor(config: LoggerConfig) {
    this.config = config;
    this.fileWriter = new LogFileWriter(config.logDir);
  }

  /**
   * Initialize the logger (create log directory, etc.)
   */
  async initialize(): Promise<void> {
    if (this.initialized) return;

    if (this.config.enableFile) {
      await this.fileWriter.initialize();
    }

    this.initialized = true;
  }

  private shouldLog(level: LogLevel): boolean {
    return LOG_LEVELS.indexOf(level) >= LOG_LEVELS.indexOf(this.config.level);
  }

  private formatConsoleLog(entry: LogEntry): string {
    const timestamp = entry.timestamp.toISOString();
    const level = entry.level.toUpperCase().padEnd(5);
    const scope = entry.scope ? `[${entry.scope}] ` : "";
    const contextStr = entry.context ? ` ${JSON.stringify(entry.context, null, 2)}` : "";
    const errorStr = entry.error
      ? `\nError: ${entry.error.message}${entry.error.stack ? `\n${entry.error.stack}` : ""}`
      : "";

    return `[${timestamp}] ${level} ${scope}${entry.message}${contextStr}${errorStr}`;
  }

  private log(
    level: LogLevel,
    message: string,
    error?: Error,
    context?: Record<string, unknown>,
    scope: string | undefined = this.config.scope
  ): void {
    if (!this.shouldLog(level)) return;

    const entry: LogEntry = {
      timestamp: new Date(),
      level,
      message,
      ...(scope !== undefined ? { scope } : {}),
      ...(context !== undefined ? { context } : {}),
      ...(error !== undefined ? { error } : {}),
    };

    if (this.config.enableConsole) {
      const consoleMessage = this.formatConsoleLog(entry);
      switch (level) {
        case LogLevel.DEBUG:
          console.debug(consoleMessage);
          break;
        case LogLevel.INFO:
          console.info(consoleMessage);
          break;
        case LogLevel.WARN:
          console.warn(consoleMessage);
          break;
        case LogLevel.ERROR:
          console.error(consoleMessage);
          break;
      }
    }

    if (this.config.enableFile && this.initialized) {
      this.pending = this.pending.then(() => this.fileWriter.write(entry));
    }
  }

  debug(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.DEBUG, message, undefined, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.INFO, message, undefined, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.log(LogLevel.WARN, message, undefined, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.log(LogLevel.ERROR, message, error, context);
  }

  /**
   * Scoped logger sharing this logger's file writer and write queue.
   */
  child(scope: string): Logger {
    const childScope = this.config.scope ? `${this.config.scope}:${scope}` : scope;
    return new ScopedLogger(this, childScope);
  }

  /** @internal used by ScopedLogger */
  logScoped(
    scope: string,
    level: LogLevel,
    message: string,
    error?: Error,
    context?: Record<string, unknown>
  ): void {
    this.log(level, message, error, context, scope);
  }

  /**
   * Wait for queued file writes, then stop writing.
   */
  async close(): Promise<void> {
    await this.pending;
    if (this.config.enableFile) {
      this.fileWriter.close();
    }
    this.initialized = false;
  }
}

class ScopedLogger implements Logger {
  constructor(
    private readonly parent: AppLogger,
    private readonly scope: string
  ) {}

  debug(message: string, context?: Record<string, unknown>): void {
    this.parent.logScoped(this.scope, LogLevel.DEBUG, message, undefined, context);
  }

  info(message: string, context?: Record<string, unknown>): void {
    this.parent.logScoped(this.scope, LogLevel.INFO, message, undefined, context);
  }

  warn(message: string, context?: Record<string, unknown>): void {
    this.parent.logScoped(this.scope, LogLevel.WARN, message, undefined, context);
  }

  error(message: string, error?: Error, context?: Record<string, unknown>): void {
    this.parent.logScoped(this.scope, LogLevel.ERROR, message, error, context);
  }

  child(scope: string): Logger {
    return new ScopedLogger(this.parent, `${this.scope}:${scope}`);
  }
}

// ============================================
// LOGGER FACTORY
// ============================================
let defaultLogger: AppLogger | null = null;

export function createLogger(config?: Partial<LoggerConfig>): AppLogger {
  const defaultConfig: LoggerConfig = {
    logDir: "logs",
    level: LogLevel.INFO,
    enableConsole: true,
    enableFile: true,
    ...config,
  };

  return new AppLogger(defaultConfig);
}

/**
 * Process-wide logger. Until `setDefaultLogger` runs this is a console-only
 * logger, so modules imported before startup never touch the disk.
 */
export function getDefaultLogger(): AppLogger {
  if (!defaultLogger) {
    defaultLogger = createLogger({ enableFile: false });
  }
  return defaultLogger;
}

export function setDefaultLogger(logger: AppLogger): void {
  defaultLogger = logger;
}
