import { appendFileSync, mkdirSync } from "node:fs";
import * as path from "node:path";

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

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/**
 * Mirror every emitted line into a file (without colour codes).
 * Pass null to stop writing to the file.
 */
export function setLogFile(filePath: string | null): void {
  if (filePath === null) {
    logFilePath = null;
    return;
  }

  const resolved = path.resolve(filePath);
  mkdirSync(path.dirname(resolved), { recursive: true });
  logFilePath = resolved;
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
    return ` ${data.name}: ${data.message}`;
  }
  if (typeof data === "object" && data !== null) {
    return ` ${JSON.stringify(data, null, 2)}`;
  }
  return ` ${String(data)}`;
}

function formatMessage(
  level: LogLevel,
  message: string,
  data: unknown,
  colored: boolean,
): string {
  const timestamp = formatTimestamp();
  const levelStr = level.toUpperCase().padEnd(5);
  const head = colored
    ? `${LEVEL_COLORS[level]}[${timestamp}] ${levelStr}${RESET}`
    : `[${timestamp}] ${levelStr}`;

  let formatted = `${head} ${message}`;

  if (data !== undefined) {
    formatted += formatData(data);
  }

  return formatted;
}

function writeToFile(level: LogLevel, message: string, data: unknown): void {
  if (!logFilePath) return;
  appendFileSync(logFilePath, `${formatMessage(level, message, data, false)}\n`);
}

export function debug(message: string, data?: unknown): void {
  if (shouldLog("debug")) {
    console.log(formatMessage("debug", message, data, true));
    writeToFile("debug", message, data);
  }
}

export function info(message: string, data?: unknown): void {
  if (shouldLog("info")) {
    console.log(formatMessage("info", message, data, true));
    writeToFile("info", message, data);
  }
}

export function warn(message: string, data?: unknown): void {
  if (shouldLog("warn")) {
    console.warn(formatMessage("warn", message, data, true));
    writeToFile("warn", message, data);
  }
}

export function error(message: string, data?: unknown): void {
  if (shouldLog("error")) {
    console.error(formatMessage("error", message, data, true));
    writeToFile("error", message, data);
  }
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
