/**
 * Logger
 *
 * Console logger that also appends to a daily log file once a log
 * directory has been configured.
 */

import * as fs from "fs";
import * as path from "path";

const MAX_LOG_SIZE = 5 * 1024 * 1024; // 5MB
const MAX_LOG_FILES = 7; // Keep 7 days of logs
const LOG_FILE_PREFIX = "ompd-";

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

interface LoggerSettings {
  dir: string | null;
  level: LogLevel;
}

const settings: LoggerSettings = {
  dir: null,
  level: "info",
};

/**
 * Get log file path for today
 */
function getLogFilePath(dir: string): string {
  const today = new Date().toISOString().split("T")[0];
  return path.join(dir, `${LOG_FILE_PREFIX}${today}.log`);
}

/**
 * Clean up old log files
 */
function cleanupOldLogs(dir: string): void {
  try {
    const logFiles = fs
      .readdirSync(dir)
      .filter((f) => f.startsWith(LOG_FILE_PREFIX) && f.endsWith(".log"))
      .map((f) => ({
        path: path.join(dir, f),
        mtime: fs.statSync(path.join(dir, f)).mtime,
      }))
      .sort((a, b) => b.mtime.getTime() - a.mtime.getTime());

    for (const file of logFiles.slice(MAX_LOG_FILES)) {
      fs.unlinkSync(file.path);
    }
  } catch (error) {
    console.error("Failed to clean up old logs:", error);
  }
}

/**
 * Rotate log file if it's too large
 */
function rotateLogIfNeeded(logFile: string): void {
  if (fs.existsSync(logFile) && fs.statSync(logFile).size > MAX_LOG_SIZE) {
    fs.renameSync(logFile, logFile.replace(".log", `-${Date.now()}.log`));
  }
}

function serialize(data: unknown): string {
  if (data instanceof Error) {
    return JSON.stringify({ name: data.name, message: data.message }, null, 2);
  }
  return JSON.stringify(data, null, 2);
}

/**
 * Write log entry to console and, when configured, to file
 */
function writeLog(level: LogLevel, message: string, data?: unknown): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[settings.level]) {
    return;
  }

  const label = level.toUpperCase();

  if (settings.dir) {
    const timestamp = new Date().toISOString();
    const logFile = getLogFilePath(settings.dir);
    const logLine = `[${timestamp}] [${label}] ${message}${
      data !== undefined ? `\n${serialize(data)}` : ""
    }\n`;

    try {
      rotateLogIfNeeded(logFile);
      fs.appendFileSync(logFile, logLine, "utf8");
    } catch (error) {
      console.error("Failed to write log:", error);
    }
  }

  const payload = data ?? "";
  if (level === "error") {
    console.error(`[${label}] ${message}`, payload);
  } else if (level === "warn") {
    console.warn(`[${label}] ${message}`, payload);
  } else if (level === "debug") {
    console.debug(`[${label}] ${message}`, payload);
  } else {
    console.log(`[${label}] ${message}`, payload);
  }
}

/**
 * Point the logger at a log directory and minimum level.
 * The directory is created if needed and old logs are pruned.
 */
export function configureLogger(options: { dir?: string | null; level?: LogLevel }): void {
  if (options.level) {
    settings.level = options.level;
  }

  if (options.dir === undefined) {
    return;
  }

  settings.dir = options.dir;
  if (settings.dir) {
    fs.mkdirSync(settings.dir, { recursive: true });
    cleanupOldLogs(settings.dir);
  }
}

export const logger = {
  info: (message: string, data?: unknown) => writeLog("info", message, data),
  warn: (message: string, data?: unknown) => writeLog("warn", message, data),
  error: (message: string, data?: unknown) => writeLog("error", message, data),
  debug: (message: string, data?: unknown) => writeLog("debug", message, data),

  /**
   * Get log file path, or null when logging to console only
   */
  getLogFilePath: (): string | null => (settings.dir ? getLogFilePath(settings.dir) : null),
};
