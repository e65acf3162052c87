import { homedir } from "node:os";
import { join } from "node:path";
import { DEFAULT_MAX_PAYLOAD_LENGTH } from "@ws-intercept/shared";
import { type LogConfig, type LogLevel, isLogLevel } from "./logger.js";

export interface ProxyConfig {
  /** Port for the proxy server (default: 8080) */
  port: number;
  /** Interface to listen on (default: 127.0.0.1) */
  host: string;
  /**
   * Origin every upgrade is sent to, e.g. ws://localhost:3000. Unset means
   * forward-proxy mode: the target comes from the request (default: unset)
   */
  upstream?: string;
  /** Longest wait on socket readiness before re-checking for shutdown in ms (default: 1000) */
  pollIntervalMs: number;
  /** Origin connect timeout in ms (default: 10000) */
  connectTimeoutMs: number;
  /** Largest frame payload relayed, in bytes (default: 100 MiB) */
  maxFramePayload: number;
  /** Logging configuration */
  logging: LogConfig;
}

function getEnvNumber(name: string, defaultValue: number): number {
  const value = process.env[name];
  if (value === undefined) return defaultValue;
  const parsed = Number.parseInt(value, 10);
  return Number.isNaN(parsed) ? defaultValue : parsed;
}

function getEnvBoolean(name: string, defaultValue: boolean): boolean {
  const value = process.env[name];
  if (value === undefined) return defaultValue;
  return value.toLowerCase() !== "false" && value !== "0";
}

function getEnvLogLevel(name: string, defaultValue: LogLevel): LogLevel {
  const value = process.env[name]?.toLowerCase();
  return value !== undefined && isLogLevel(value) ? value : defaultValue;
}

export function loadConfig(): ProxyConfig {
  const logLevel = getEnvLogLevel("WSI_LOG_LEVEL", "info");
  const fileLevel = getEnvLogLevel("WSI_LOG_FILE_LEVEL", logLevel);

  return {
    port: getEnvNumber("WSI_PORT", 8080),
    host: process.env.WSI_HOST ?? "127.0.0.1",
    upstream: process.env.WSI_UPSTREAM || undefined,
    pollIntervalMs: getEnvNumber("WSI_POLL_INTERVAL_MS", 1000),
    connectTimeoutMs: getEnvNumber("WSI_CONNECT_TIMEOUT_MS", 10_000),
    maxFramePayload: getEnvNumber(
      "WSI_MAX_FRAME_PAYLOAD",
      DEFAULT_MAX_PAYLOAD_LENGTH,
    ),
    logging: {
      logDir:
        process.env.WSI_LOG_DIR ?? join(homedir(), ".ws-intercept", "logs"),
      logFile: process.env.WSI_LOG_FILE ?? "ws-intercept.log",
      consoleLevel: logLevel,
      fileLevel,
      logToConsole: getEnvBoolean("WSI_LOG_TO_CONSOLE", true),
      logToFile: getEnvBoolean("WSI_LOG_TO_FILE", false),
      prettyPrint: process.env.NODE_ENV !== "production",
    },
  };
}
