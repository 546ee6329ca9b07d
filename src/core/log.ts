// src/core/log.ts
// Console logging with a level gate

export type LogLevel = "silent" | "error" | "warn" | "info" | "debug";

export const LOG_LEVELS: readonly LogLevel[] = ["silent", "error", "warn", "info", "debug"];

export interface Logger {
  debug(message: string, ...rest: unknown[]): void;
  info(message: string, ...rest: unknown[]): void;
  warn(message: string, ...rest: unknown[]): void;
  error(message: string, ...rest: unknown[]): void;
}

export function isLogLevel(s: string): s is LogLevel {
  return LOG_LEVELS.some(l => l === s);
}

function rank(level: LogLevel): number {
  return LOG_LEVELS.indexOf(level);
}

export function createLogger(scope: string, level: LogLevel = "warn"): Logger {
  const enabled = (at: LogLevel) => rank(at) <= rank(level);
  const prefix = `[${scope}]`;
  return {
    debug: (m, ...rest) => { if (enabled("debug")) console.debug(prefix, m, ...rest); },
    info: (m, ...rest) => { if (enabled("info")) console.info(prefix, m, ...rest); },
    warn: (m, ...rest) => { if (enabled("warn")) console.warn(prefix, m, ...rest); },
    error: (m, ...rest) => { if (enabled("error")) console.error(prefix, m, ...rest); },
  };
}

export const silentLogger: Logger = createLogger("silent", "silent");
