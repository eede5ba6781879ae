import { config } from "../config";

type LogLevel = "debug" | "info" | "warn" | "error";
export type LogThreshold = LogLevel | "silent";

interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  data?: Record<string, unknown>;
}

const LEVEL_RANK: Record<LogThreshold, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

function isThreshold(v: string): v is LogThreshold {
  return Object.prototype.hasOwnProperty.call(LEVEL_RANK, v);
}

export function parseThreshold(raw: string | undefined): LogThreshold {
  const v = (raw ?? "").trim().toLowerCase();
  return isThreshold(v) ? v : "info";
}

let threshold: LogThreshold = parseThreshold(config.logLevel);

export function setLogLevel(level: LogThreshold): void {
  threshold = level;
}

function formatLog(entry: LogEntry): string {
  const { level, message, timestamp, data } = entry;
  const dataStr = data ? ` ${JSON.stringify(data)}` : "";
  return `[${timestamp}] ${level.toUpperCase()}: ${message}${dataStr}`;
}

function log(level: LogLevel, message: string, data?: Record<string, unknown>): void {
  if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;

  const formatted = formatLog({
    level,
    message,
    timestamp: new Date().toISOString(),
    data,
  });

  switch (level) {
    case "error":
      console.error(formatted);
      break;
    case "warn":
      console.warn(formatted);
      break;
    default:
      console.log(formatted);
  }
}

export const logger = {
  debug: (message: string, data?: Record<string, unknown>) => log("debug", message, data),
  info: (message: string, data?: Record<string, unknown>) => log("info", message, data),
  warn: (message: string, data?: Record<string, unknown>) => log("warn", message, data),
  error: (message: string, data?: Record<string, unknown>) => log("error", message, data),
};
