// 统一日志：按级别输出到控制台

import { getConsoleLevel, shouldLogToConsole } from "./config.js";
import type { LogCategory, LogEntry, LogLevel } from "./types.js";

export type { LogCategory, LogEntry, LogLevel } from "./types.js";

export function formatConsole(entry: LogEntry): string {
  const tag = `[${entry.category}]`;
  const payloadStr =
    entry.payload != null && Object.keys(entry.payload).length > 0
      ? " " + JSON.stringify(entry.payload)
      : "";
  return `${tag} ${entry.message}${payloadStr}`;
}

function writeConsole(entry: LogEntry): void {
  const line = formatConsole(entry);
  if (entry.level === "error") {
    console.error(line);
  } else if (entry.level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

function emit(level: LogLevel, category: LogCategory, message: string, meta?: Record<string, unknown>): void {
  const entry: LogEntry = {
    level,
    category,
    message,
    payload: meta && Object.keys(meta).length > 0 ? { ...meta } : undefined,
  };
  if (shouldLogToConsole(getConsoleLevel(), level)) {
    writeConsole(entry);
  }
}

/** 统一 logger：控制台由 LOG_LEVEL 过滤 */
export const logger = {
  error(category: LogCategory, message: string, meta?: Record<string, unknown>) {
    emit("error", category, message, meta);
  },
  warn(category: LogCategory, message: string, meta?: Record<string, unknown>) {
    emit("warn", category, message, meta);
  },
  info(category: LogCategory, message: string, meta?: Record<string, unknown>) {
    emit("info", category, message, meta);
  },
  debug(category: LogCategory, message: string, meta?: Record<string, unknown>) {
    emit("debug", category, message, meta);
  },
};
