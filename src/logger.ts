export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
}

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100
};

export function formatLogLine(level: Exclude<LogLevel, "silent">, message: string, data?: Record<string, unknown>): string {
  const prefix = `[${new Date().toISOString()}] [${level.toUpperCase()}]`;
  if (data && Object.keys(data).length > 0) {
    return `${prefix} ${message} ${JSON.stringify(data)}`;
  }
  return `${prefix} ${message}`;
}

// Logs go to stderr; stdout is reserved for command output.
export function createLogger(level: LogLevel = "info"): Logger {
  const threshold = LEVEL_ORDER[level];

  function write(entryLevel: Exclude<LogLevel, "silent">, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[entryLevel] < threshold) {
      return;
    }
    console.error(formatLogLine(entryLevel, message, data));
  }

  return {
    debug: (message, data) => write("debug", message, data),
    info: (message, data) => write("info", message, data),
    warn: (message, data) => write("warn", message, data),
    error: (message, data) => write("error", message, data)
  };
}

export const silentLogger: Logger = createLogger("silent");
