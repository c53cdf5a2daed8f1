import { appendFileSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";
import { errorMessage } from "./error";

export type LogLevel = "debug" | "info" | "warn" | "error";

let currentLevel: LogLevel = "info";
let logFilePath: string | null = null;

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m", // gray
  info: "\x1b[36m", // cyan
  warn: "\x1b[33m", // yellow
  error: "\x1b[31m", // red
};

const RESET = "\x1b[0m";

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && value in LEVEL_PRIORITY;
}

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Mirror every emitted line, without colors, into a file. Pass null to stop.
 */
export function setLogFile(filePath: string | null): void {
  if (filePath) {
    mkdirSync(dirname(filePath), { recursive: true });
  }
  logFilePath = filePath;
}

export function getLogFile(): string | null {
  return logFilePath;
}

function formatTimestamp(): string {
  return new Date().toISOString();
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

function formatData(data: unknown): string {
  if (data instanceof Error) {
    return ` ${data.message}`;
  }
  if (typeof data === "object" && data !== null) {
    return ` ${JSON.stringify(data, null, 2)}`;
  }
  return ` ${String(data)}`;
}

export function formatMessage(
  level: LogLevel,
  message: string,
  data?: unknown,
  timestamp: string = formatTimestamp(),
): { console: string; file: string } {
  const levelStr = level.toUpperCase().padEnd(5);
  const suffix = data === undefined ? "" : formatData(data);

  return {
    console: `${LEVEL_COLORS[level]}[${timestamp}] ${levelStr}${RESET} ${message}${suffix}`,
    file: `[${timestamp}] ${levelStr} ${message}${suffix}`,
  };
}

function writeToFile(line: string): void {
  if (!logFilePath) return;
  try {
    appendFileSync(logFilePath, `${line}\n`);
  } catch (err) {
    const path = logFilePath;
    // stop retrying a sink that cannot be written
    logFilePath = null;
    console.error(`Failed to write log file ${path}: ${errorMessage(err)}`);
  }
}

function emit(level: LogLevel, message: string, data?: unknown): void {
  if (!shouldLog(level)) return;

  const formatted = formatMessage(level, message, data);

  if (level === "error") {
    console.error(formatted.console);
  } else if (level === "warn") {
    console.warn(formatted.console);
  } else {
    console.log(formatted.console);
  }

  writeToFile(formatted.file);
}

export function debug(message: string, data?: unknown): void {
  emit("debug", message, data);
}

export function info(message: string, data?: unknown): void {
  emit("info", message, data);
}

export function warn(message: string, data?: unknown): void {
  emit("warn", message, data);
}

export function error(message: string, data?: unknown): void {
  emit("error", message, data);
}

export const logger = {
  debug,
  info,
  warn,
  error,
  setLevel: setLogLevel,
  getLevel: getLogLevel,
  setFile: setLogFile,
};
