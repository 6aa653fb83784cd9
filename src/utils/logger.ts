export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

let levelOverride: LogLevel | null = null;

function isLogLevel(value: string | undefined): value is LogLevel {
  return value !== undefined && value in LEVEL_ORDER;
}

export function setLogLevel(level: LogLevel | null): void {
  levelOverride = level;
}

export function currentLogLevel(): LogLevel {
  if (levelOverride) return levelOverride;
  const fromEnv = process.env.FINANCE_LOG_LEVEL?.toLowerCase();
  return isLogLevel(fromEnv) ? fromEnv : "info";
}

function enabled(level: LogLevel): boolean {
  return LEVEL_ORDER[level] >= LEVEL_ORDER[currentLogLevel()];
}

function prefix(level: string, scope?: string): string {
  return scope ? `[${level}] [${scope}]` : `[${level}]`;
}

export function debug(message: string, meta?: unknown, scope?: string): void {
  if (!enabled("debug")) return;
  if (meta !== undefined) {
    console.debug(`${prefix("DEBUG", scope)} ${message}`, meta);
  } else {
    console.debug(`${prefix("DEBUG", scope)} ${message}`);
  }
}

export function info(message: string, meta?: unknown, scope?: string): void {
  if (!enabled("info")) return;
  if (meta !== undefined) {
    console.log(`${prefix("INFO", scope)} ${message}`, meta);
  } else {
    console.log(`${prefix("INFO", scope)} ${message}`);
  }
}

export function warn(message: string, meta?: unknown, scope?: string): void {
  if (!enabled("warn")) return;
  if (meta !== undefined) {
    console.warn(`${prefix("WARN", scope)} ${message}`, meta);
  } else {
    console.warn(`${prefix("WARN", scope)} ${message}`);
  }
}

export function error(message: string, meta?: unknown, scope?: string): void {
  if (!enabled("error")) return;
  if (meta instanceof Error) {
    console.error(`${prefix("ERROR", scope)} ${message}:`, meta.message, meta.stack);
  } else if (meta !== undefined) {
    console.error(`${prefix("ERROR", scope)} ${message}`, meta);
  } else {
    console.error(`${prefix("ERROR", scope)} ${message}`);
  }
}

export interface ScopedLogger {
  debug(message: string, meta?: unknown): void;
  info(message: string, meta?: unknown): void;
  warn(message: string, meta?: unknown): void;
  error(message: string, meta?: unknown): void;
}

export function scoped(scope: string): ScopedLogger {
  return {
    debug: (message, meta) => debug(message, meta, scope),
    info: (message, meta) => info(message, meta, scope),
    warn: (message, meta) => warn(message, meta, scope),
    error: (message, meta) => error(message, meta, scope),
  };
}
