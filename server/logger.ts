type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

function isLogLevel(value: string): value is LogLevel {
  return value in LOG_LEVELS;
}

function minLevel(): number {
  const level = (process.env.LOG_LEVEL || "info").toLowerCase();
  return isLogLevel(level) ? LOG_LEVELS[level] : LOG_LEVELS.info;
}

type Sink = (message: string, ...rest: unknown[]) => void;

function emit(level: LogLevel, sink: Sink, component: string, message: string, meta?: unknown): void {
  if (minLevel() > LOG_LEVELS[level]) return;
  const line = `[${component}] ${message}`;
  if (meta !== undefined) {
    sink(line, meta);
  } else {
    sink(line);
  }
}

/**
 * Component-tagged console logger. `LOG_LEVEL` (debug, info, warn, error)
 * is read on every call so tests and the CLI can change it at runtime.
 */
export const logger = {
  debug(component: string, message: string, meta?: unknown): void {
    emit("debug", console.debug, component, message, meta);
  },
  info(component: string, message: string, meta?: unknown): void {
    emit("info", console.info, component, message, meta);
  },
  warn(component: string, message: string, meta?: unknown): void {
    emit("warn", console.warn, component, message, meta);
  },
  error(component: string, message: string, error?: unknown): void {
    emit("error", console.error, component, message, error);
  },
};

export function errorMessage(error: unknown): string {
  if (error instanceof Error) return error.message || error.name;
  return String(error);
}
