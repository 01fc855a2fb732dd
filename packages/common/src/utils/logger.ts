// ============================================
// Structured Logger
// ============================================

export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
}

const LOG_LEVEL_NAMES: Record<LogLevel, string> = {
  [LogLevel.DEBUG]: "DEBUG",
  [LogLevel.INFO]: "INFO",
  [LogLevel.WARN]: "WARN",
  [LogLevel.ERROR]: "ERROR",
};

const LOG_LEVEL_MAP: Record<string, LogLevel> = {
  DEBUG: LogLevel.DEBUG,
  INFO: LogLevel.INFO,
  WARN: LogLevel.WARN,
  ERROR: LogLevel.ERROR,
};

export function resolveLogLevel(raw: string | undefined): LogLevel {
  return LOG_LEVEL_MAP[raw?.toUpperCase() ?? ""] ?? LogLevel.INFO;
}

const currentLevel: LogLevel = resolveLogLevel(process.env.LOG_LEVEL);

// Amounts are bigint; JSON.stringify rejects them
function replacer(_key: string, value: unknown): unknown {
  return typeof value === "bigint" ? value.toString() : value;
}

export function formatEntry(
  level: LogLevel,
  service: string,
  message: string,
  meta?: Record<string, unknown>
): string {
  const entry = {
    timestamp: new Date().toISOString(),
    level: LOG_LEVEL_NAMES[level],
    service,
    message,
    ...meta,
  };
  return JSON.stringify(entry, replacer);
}

export function createLogger(service: string) {
  function log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
    if (level < currentLevel) return;

    const output = formatEntry(level, service, message, meta);

    if (level >= LogLevel.ERROR) {
      console.error(output);
    } else if (level >= LogLevel.WARN) {
      console.warn(output);
    } else {
      console.log(output);
    }
  }

  return {
    debug: (msg: string, meta?: Record<string, unknown>) => log(LogLevel.DEBUG, msg, meta),
    info: (msg: string, meta?: Record<string, unknown>) => log(LogLevel.INFO, msg, meta),
    warn: (msg: string, meta?: Record<string, unknown>) => log(LogLevel.WARN, msg, meta),
    error: (msg: string, meta?: Record<string, unknown>) => log(LogLevel.ERROR, msg, meta),
  };
}

export type Logger = ReturnType<typeof createLogger>;
