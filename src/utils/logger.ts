export type LogLevel = "debug" | "info" | "warn" | "error";

let currentLevel: LogLevel = "info";

const LEVEL_PRIORITY: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

const LEVEL_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m", // gray
  info: "\x1b[32m", // green
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

function shouldLog(level: LogLevel): boolean {
  return LEVEL_PRIORITY[level] >= LEVEL_PRIORITY[currentLevel];
}

function describeData(data: unknown): string {
  if (data instanceof Error) {
    return data.message;
  }
  if (typeof data === "object" && data !== null) {
    return JSON.stringify(data, null, 2);
  }
  return String(data);
}

export function formatMessage(level: LogLevel, message: string, data?: unknown): string {
  const timestamp = new Date().toISOString();
  const levelStr = level.toUpperCase().padEnd(5);

  let formatted = `${LEVEL_COLORS[level]}[${timestamp}] ${levelStr}${RESET} ${message}`;

  if (data !== undefined) {
    formatted += ` ${describeData(data)}`;
  }

  return formatted;
}

function write(level: LogLevel, message: string, data?: unknown): void {
  if (!shouldLog(level)) {
    return;
  }
  const line = formatMessage(level, message, data);
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
}

export function debug(message: string, data?: unknown): void {
  write("debug", message, data);
}

export function info(message: string, data?: unknown): void {
  write("info", message, data);
}

export function warn(message: string, data?: unknown): void {
  write("warn", message, data);
}

export function error(message: string, data?: unknown): void {
  write("error", message, data);
}

export interface ScopedLogger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

/**
 * Logger whose messages carry a `[scope]` prefix, used by collectors so
 * interleaved phase output stays attributable.
 */
export function scoped(scope: string): ScopedLogger {
  const prefix = `[${scope}]`;
  return {
    debug: (message, data) => write("debug", `${prefix} ${message}`, data),
    info: (message, data) => write("info", `${prefix} ${message}`, data),
    warn: (message, data) => write("warn", `${prefix} ${message}`, data),
    error: (message, data) => write("error", `${prefix} ${message}`, data),
  };
}

export const logger = {
  debug,
  info,
  warn,
  error,
  scoped,
  setLevel: setLogLevel,
  getLevel: getLogLevel,
};
