import { appendFile, mkdir } from "node:fs/promises";
import { join } from "node:path";
import type { LogEntry } from "./types.js";

// ============================================
// DAILY LOG FILE WRITER
// ============================================

/**
 * Format an entry as a single file line (context on the same line, error
 * message and stack on the following lines).
 */
export function formatFileLine(entry: LogEntry): string {
  const timestamp = entry.timestamp.toISOString();
  const level = entry.level.toUpperCase().padEnd(5);
  const scope = entry.scope ? `[${entry.scope}] ` : "";
  const contextStr = entry.context ? ` ${JSON.stringify(entry.context)}` : "";
  const errorStr = entry.error
    ? `\nError: ${entry.error.message}${entry.error.stack ? `\nStack: ${entry.error.stack}` : ""}`
    : "";

  return `[${timestamp}] ${level} ${scope}${entry.message}${contextStr}${errorStr}\n`;
}

export class LogFileWriter {
  private logDir: string;
  private initialized: boolean = false;

  constructor(logDir: string) {
    this.logDir = logDir;
  }

  /**
   * Create the log directory if needed.
   */
  async initialize(): Promise<void> {
    await mkdir(this.logDir, { recursive: true });
    this.initialized = true;
  }

  /**
   * One file per level per day: `info-2024-05-01.log`.
   */
  filePathFor(entry: LogEntry): string {
    const date = entry.timestamp.toISOString().split("T")[0];
    return join(this.logDir, `${entry.level}-${date}.log`);
  }

  /**
   * Append an entry. Never rejects: a failed write is reported on stderr so
   * the chat keeps running when the disk is unavailable.
   */
  async write(entry: LogEntry): Promise<void> {
    if (!this.initialized) {
      return;
    }

    try {
      await appendFile(this.filePathFor(entry), formatFileLine(entry), "utf8");
    } catch (error) {
      const errorMsg = error instanceof Error ? error.message : String(error);
      console.error("Failed to write log to file:", errorMsg);
    }
  }

  close(): void {
    this.initialized = false;
  }
}
