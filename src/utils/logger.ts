import { promises as fsp } from "fs";
import * as path from "path";
import { resolveConfigDir } from "../config/paths";

enum LogLevel {
  DEBUG = "DEBUG",
  INFO = "INFO",
  WARN = "WARN",
  ERROR = "ERROR",
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  [LogLevel.DEBUG]: 10,
  [LogLevel.INFO]: 20,
  [LogLevel.WARN]: 30,
  [LogLevel.ERROR]: 40,
};

let reportedWriteFailure = false;

function parseLevel(value: string | undefined): LogLevel {
  switch (value?.trim().toUpperCase()) {
    case "DEBUG":
      return LogLevel.DEBUG;
    case "WARN":
      return LogLevel.WARN;
    case "ERROR":
      return LogLevel.ERROR;
    default:
      return LogLevel.INFO;
  }
}

export function resolveLogFile(): string | undefined {
  const configured = process.env.LOCAL_LLM_CHAT_LOG_FILE?.trim();
  if (configured) {
    return configured;
  }
  // Test runs only log when a file is set explicitly.
  if (process.env.NODE_ENV === "test") {
    return undefined;
  }
  return path.join(resolveConfigDir(), "logs", "app.log");
}

export function formatLogLine(
  level: string,
  message: string,
  timestamp: string = new Date().toISOString(),
): string {
  return `[${timestamp}] [${level}] ${message}`;
}

// Never writes to stdout: log lines would interleave with streamed replies.
async function log(level: LogLevel, message: string): Promise<void> {
  const threshold = parseLevel(process.env.LOCAL_LLM_CHAT_LOG_LEVEL);
  if (LEVEL_ORDER[level] < LEVEL_ORDER[threshold]) {
    return;
  }
  const logFile = resolveLogFile();
  if (!logFile) {
    return;
  }

  try {
    await fsp.mkdir(path.dirname(logFile), { recursive: true });
    await fsp.appendFile(logFile, formatLogLine(level, message) + "\n");
  } catch (error) {
    if (!reportedWriteFailure) {
      reportedWriteFailure = true;
      const reason = error instanceof Error ? error.message : String(error);
      process.stderr.write(`log write failed (${logFile}): ${reason}\n`);
    }
  }
}

export const logger = {
  debug: async (message: string) => await log(LogLevel.DEBUG, message),
  info: async (message: string) => await log(LogLevel.INFO, message),
  warn: async (message: string) => await log(LogLevel.WARN, message),
  error: async (message: string) => await log(LogLevel.ERROR, message),
};
