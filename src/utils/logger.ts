export type LogLevel = "debug" | "info" | "warn" | "error";

/** Receives every formatted line that passes the level filter. */
export type LogSink = (level: LogLevel, line: string) => void;

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = "info";

const consoleSink: LogSink = (level, line) => {
  switch (level) {
    case "debug":
      console.debug(line);
      break;
    case "info":
      console.info(line);
      break;
    case "warn":
      console.warn(line);
      break;
    case "error":
      console.error(line);
      break;
  }
};

let currentSink: LogSink = consoleSink;

export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

/** Redirect log output. Pass null to restore the console. */
export function setLogSink(sink: LogSink | null): void {
  currentSink = sink ?? consoleSink;
}

function shouldLog(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLevel];
}

function formatMsg(level: LogLevel, msg: string, data?: Record<string, unknown>): string {
  const ts = new Date().toISOString();
  const base = `${ts} [${level.toUpperCase()}] ${msg}`;
  if (data && Object.keys(data).length > 0) {
    return `${base} ${JSON.stringify(data, jsonReplacer)}`;
  }
  return base;
}

// Entity ids are bigints.
function jsonReplacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

export type Logger = {
  debug(msg: string, data?: Record<string, unknown>): void;
  info(msg: string, data?: Record<string, unknown>): void;
  warn(msg: string, data?: Record<string, unknown>): void;
  error(msg: string, data?: Record<string, unknown>): void;
};

function emit(level: LogLevel, msg: string, data?: Record<string, unknown>): void {
  if (shouldLog(level)) currentSink(level, formatMsg(level, msg, data));
}

export const log: Logger = {
  debug(msg, data) {
    emit("debug", msg, data);
  },
  info(msg, data) {
    emit("info", msg, data);
  },
  warn(msg, data) {
    emit("warn", msg, data);
  },
  error(msg, data) {
    emit("error", msg, data);
  },
};

/** Logger whose messages are prefixed with `[scope]`. */
export function createLogger(scope: string): Logger {
  const prefix = `[${scope}]`;
  return {
    debug: (msg, data) => emit("debug", `${prefix} ${msg}`, data),
    info: (msg, data) => emit("info", `${prefix} ${msg}`, data),
    warn: (msg, data) => emit("warn", `${prefix} ${msg}`, data),
    error: (msg, data) => emit("error", `${prefix} ${msg}`, data),
  };
}
