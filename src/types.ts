/**
 * Core types for the logging facade
 */

export const LEVEL_NAMES = ["DEBUG", "INFO", "WARN", "ERROR"] as const;

export type LevelName = (typeof LEVEL_NAMES)[number];

/** Numeric severities, a larger value is more severe */
export const LogLevels = {
  DEBUG: -1,
  INFO: 0,
  WARN: 1,
  ERROR: 2,
} as const satisfies Record<LevelName, number>;

export type LogLevel = (typeof LogLevels)[LevelName];

export function getLevelName(level: LogLevel): LevelName {
  switch (level) {
    case LogLevels.DEBUG:
      return "DEBUG";
    case LogLevels.INFO:
      return "INFO";
    case LogLevels.WARN:
      return "WARN";
    case LogLevels.ERROR:
      return "ERROR";
  }
}

/** A single key/value attribute. The value is opaque to the facade. */
export class LogAttr {
  constructor(
    readonly key: string,
    readonly value: unknown,
  ) {}
}

/** Build a typed attribute to pass instead of a key/value pair */
export function attr(key: string, value: unknown): LogAttr {
  return new LogAttr(key, value);
}

export interface LogRecord {
  readonly message: string;
  readonly level: LogLevel;
  readonly attrs: readonly LogAttr[];
}

/**
 * Backend capability supplied by the embedding application.
 * The facade keeps a reference to it and never touches its state.
 */
export interface LogHandler {
  enabled(level: LogLevel): boolean;
  handle(record: LogRecord): void;
}

/**
 * Leveled emission entry points.
 * `args` are alternating key/value pairs, `LogAttr` instances, or a mix of both.
 */
export interface Logger {
  debug(msg: string, ...args: unknown[]): void;
  info(msg: string, ...args: unknown[]): void;
  warn(msg: string, ...args: unknown[]): void;
  error(msg: string, ...args: unknown[]): void;
  exception(error: unknown, ...args: unknown[]): void;
}
