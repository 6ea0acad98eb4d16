/**
 * Port: Logger: structured, level-based logging contract.
 */
export const LOG_LEVELS = ["trace", "debug", "info", "warn", "error", "fatal", "panic"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

export const LEVEL_PRIORITY: Readonly<Record<LogLevel, number>> = {
  trace: 0,
  debug: 1,
  info: 2,
  warn: 3,
  error: 4,
  fatal: 5,
  panic: 6,
};

type LogMethod = (msg: string, meta?: Record<string, unknown>) => void;

export interface Logger {
  trace: LogMethod;
  debug: LogMethod;
  info: LogMethod;
  warn: LogMethod;
  error: LogMethod;
  fatal: LogMethod;
  panic: LogMethod;
  child(bindings: Record<string, unknown>): Logger;
}
