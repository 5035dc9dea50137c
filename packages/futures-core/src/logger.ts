export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogMeta = Record<string, unknown>;

export interface Logger {
  debug(msg: string, meta?: LogMeta): void;
  info(msg: string, meta?: LogMeta): void;
  warn(msg: string, meta?: LogMeta): void;
  error(msg: string, meta?: LogMeta): void;
  child(scope: string): Logger;
}

export type LoggerOptions = {
  level?: LogLevel;
  write?: (line: string) => void;
};

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40
};

export function resolveLogLevel(raw: string | null | undefined = process.env.LOG_LEVEL): LogLevel {
  const normalized = (raw ?? "").trim().toLowerCase();
  if (normalized === "debug" || normalized === "info" || normalized === "warn" || normalized === "error") {
    return normalized;
  }
  return "info";
}

export function createLogger(scope?: string, options: LoggerOptions = {}): Logger {
  const threshold = options.level ?? resolveLogLevel();
  // JSON line for log collectors / Docker logs
  const write = options.write ?? ((line: string) => console.log(line));

  function log(level: LogLevel, msg: string, meta?: LogMeta) {
    if (LEVEL_RANK[level] < LEVEL_RANK[threshold]) return;
    const entry = {
      level,
      msg,
      time: Date.now(),
      ...(scope ? { scope } : {}),
      ...(meta ?? {})
    };
    write(JSON.stringify(entry));
  }

  return {
    debug: (msg, meta) => log("debug", msg, meta),
    info: (msg, meta) => log("info", msg, meta),
    warn: (msg, meta) => log("warn", msg, meta),
    error: (msg, meta) => log("error", msg, meta),
    child: (childScope) => createLogger(scope ? `${scope}.${childScope}` : childScope, { level: threshold, write })
  };
}

export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger
};

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
