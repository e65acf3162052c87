import * as fs from "node:fs";
import * as path from "node:path";
import pino from "pino";

/**
 * Valid log levels.
 */
export const LOG_LEVELS = [
  "trace",
  "debug",
  "info",
  "warn",
  "error",
  "fatal",
  "silent",
] as const;
export type LogLevel = (typeof LOG_LEVELS)[number];

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

export interface LogConfig {
  /** Directory for log files */
  logDir: string;
  /** Log filename. Default: ws-intercept.log */
  logFile: string;
  /** Minimum log level for console. Default: info */
  consoleLevel: LogLevel;
  /** Minimum log level for file. Default: info */
  fileLevel: LogLevel;
  /** Also log to console. Default: true */
  logToConsole: boolean;
  /** Log to file. Default: false */
  logToFile: boolean;
  /** Use pretty printing for console. Default: true in dev */
  prettyPrint: boolean;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
  silent: 6,
};

/**
 * Get the minimum (most verbose) of two log levels.
 */
function getMinLevel(a: LogLevel, b: LogLevel): LogLevel {
  return LEVEL_ORDER[a] <= LEVEL_ORDER[b] ? a : b;
}

/** Stream level for pino, or null when the stream should not be created */
function streamLevel(level: LogLevel): pino.Level | null {
  return level === "silent" ? null : level;
}

/**
 * Create a logger with the given configuration.
 */
export function createLogger(config: LogConfig): pino.Logger {
  const streams: pino.StreamEntry[] = [];

  // Console stream
  const consoleLevel = config.logToConsole
    ? streamLevel(config.consoleLevel)
    : null;
  if (consoleLevel) {
    if (config.prettyPrint) {
      const pretty = pino.transport({
        target: "pino-pretty",
        options: {
          colorize: true,
          translateTime: "HH:MM:ss",
          ignore: "pid,hostname",
        },
      });
      streams.push({ stream: pretty, level: consoleLevel });
    } else {
      streams.push({ stream: process.stdout, level: consoleLevel });
    }
  }

  // File stream
  const fileLevel = config.logToFile ? streamLevel(config.fileLevel) : null;
  if (fileLevel) {
    fs.mkdirSync(config.logDir, { recursive: true });
    const logPath = path.join(config.logDir, config.logFile);
    const fileStream = fs.createWriteStream(logPath, { flags: "a" });
    streams.push({ stream: fileStream, level: fileLevel });
  }

  const first = streams[0];
  if (!first) {
    // No streams configured, use a silent logger
    return pino({ level: "silent" });
  }

  if (streams.length === 1) {
    return pino({ level: first.level ?? "info" }, first.stream);
  }

  // pino needs its base level at or below every stream's level
  const minLevel = getMinLevel(config.consoleLevel, config.fileLevel);
  return pino({ level: minLevel }, pino.multistream(streams));
}
