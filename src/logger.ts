// stdout carries the MCP protocol, so every log line goes to stderr.

export type LogLevel = "debug" | "info" | "warn" | "error";

const LEVELS: Record<LogLevel, number> = { debug: 10, info: 20, warn: 30, error: 40 };

let threshold: LogLevel = "info";

export function setLogLevel(level: LogLevel): void {
  threshold = level;
}

function write(level: LogLevel, message: string, meta: unknown[]): void {
  if (LEVELS[level] < LEVELS[threshold]) return;
  const line = `${new Date().toISOString()} [${level.toUpperCase()}] ${message}`;
  console.error(line, ...meta);
}

export const logger = {
  debug: (message: string, ...meta: unknown[]) => write("debug", message, meta),
  info: (message: string, ...meta: unknown[]) => write("info", message, meta),
  warn: (message: string, ...meta: unknown[]) => write("warn", message, meta),
  error: (message: string, ...meta: unknown[]) => write("error", message, meta),
};
