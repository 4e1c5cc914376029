import fs from "fs";
import path from "path";

import { config } from "@config/index";

export type LogLevel = "debug" | "info" | "warn" | "error";

export interface LoggerPort {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void;
  event(type: string, payload: Record<string, unknown>): void;
}

const LEVEL_WEIGHT: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LEVEL_WEIGHT, value);
}

function minimumLevel(): LogLevel {
  const configured = config.observability.logLevel.toLowerCase();
  return isLogLevel(configured) ? configured : "info";
}

export function shouldLog(level: LogLevel, threshold: LogLevel): boolean {
  return LEVEL_WEIGHT[level] >= LEVEL_WEIGHT[threshold];
}

function resolveLogFile(): string | null {
  const target = config.observability.logFile;
  if (!target) {
    return null;
  }
  return path.isAbsolute(target) ? target : path.join(process.cwd(), target);
}

function persist(line: string): void {
  const logFile = resolveLogFile();
  if (!logFile) {
    return;
  }

  try {
    fs.mkdirSync(path.dirname(logFile), { recursive: true });
    fs.appendFileSync(logFile, line, { encoding: "utf-8" });
  } catch (err) {
    console.error("❌ Failed to write log file:", err);
  }
}

function writeEntry(level: LogLevel, entry: Record<string, unknown>): void {
  if (!shouldLog(level, minimumLevel())) {
    return;
  }

  const line = JSON.stringify(entry) + "\n";

  if (level === "error") {
    console.error(line.trimEnd());
  } else {
    console.log(line.trimEnd());
  }

  persist(line);
}

/**
 * JSON-lines logger. Entries go to the console and, unless LOG_FILE is empty,
 * to the configured log file.
 *
 * - log() records `{ timestamp, level, message, ...meta }`
 * - event() records `{ timestamp, type, ...payload }` at info level
 */
export const logger: LoggerPort = {
  log(level: LogLevel, message: string, meta?: Record<string, unknown>): void {
    writeEntry(level, {
      timestamp: new Date().toISOString(),
      level,
      message,
      ...(meta || {}),
    });
  },

  event(type: string, payload: Record<string, unknown>): void {
    writeEntry("info", {
      timestamp: new Date().toISOString(),
      type,
      ...payload,
    });
  },
};

export function logEvent(type: string, payload: Record<string, unknown>): void {
  logger.event(type, payload);
}
