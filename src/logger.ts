/**
 * Logger
 *
 * Writes every entry to an optional log file and to the console. The file is
 * opened once when the logger is created and released by close(); entries
 * logged after close() only reach the console.
 */

import * as fs from "fs";
import { format } from "date-fns";

import { WatermarkError } from "./errors";

export type LogLevel = "DEBUG" | "INFO" | "WARN" | "ERROR";

const LEVEL_ORDER: Record<LogLevel, number> = { DEBUG: 10, INFO: 20, WARN: 30, ERROR: 40 };

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
  close(): void;
}

export interface LoggerOptions {
  filePath?: string;
  console?: boolean;
  level?: LogLevel;
}

export function logFileName(date: Date = new Date()): string {
  return `watermark_log_${format(date, "yyyyMMdd_HHmmss")}.log`;
}

export function formatLogData(data: unknown): string {
  if (data instanceof WatermarkError) return JSON.stringify(data.toJSON());
  if (data instanceof Error) return `${data.name}: ${data.message}`;
  if (typeof data === "string") return data;
  return JSON.stringify(data);
}

export function formatLogLine(level: LogLevel, message: string, data?: unknown, date: Date = new Date()): string {
  const line = `${format(date, "yyyy-MM-dd HH:mm:ss,SSS")} - ${level} - ${message}`;
  return data === undefined ? line : `${line} ${formatLogData(data)}`;
}

export function createLogger(options: LoggerOptions = {}): Logger {
  const toConsole = options.console ?? true;
  const threshold = LEVEL_ORDER[options.level ?? "INFO"];
  let fd: number | undefined = options.filePath ? fs.openSync(options.filePath, "a") : undefined;

  function write(level: LogLevel, message: string, data?: unknown): void {
    if (LEVEL_ORDER[level] < threshold) return;
    const line = formatLogLine(level, message, data);

    if (fd !== undefined) {
      try {
        fs.writeSync(fd, `${line}\n`);
      } catch (error) {
        // Fallback to console if file write fails
        console.error("Failed to write log:", error);
        if (!toConsole) console.log(line);
      }
    }

    if (!toConsole) return;
    if (level === "ERROR") console.error(line);
    else if (level === "WARN") console.warn(line);
    else console.log(line);
  }

  return {
    debug: (message, data) => write("DEBUG", message, data),
    info: (message, data) => write("INFO", message, data),
    warn: (message, data) => write("WARN", message, data),
    error: (message, data) => write("ERROR", message, data),
    close: () => {
      if (fd === undefined) return;
      fs.closeSync(fd);
      fd = undefined;
    },
  };
}
