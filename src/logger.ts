/**
 * Module-scoped logger bound to a single handler
 */

import { MalformedAttrsError } from "./errors.ts";
import { type LogHandler, type Logger, LogAttr, type LogLevel, LogLevels, type LogRecord } from "./types.ts";

export const ATTR_KEY_MODULE = "module";
export const DEFAULT_MODULE_NAME = "default";

function describeArg(arg: unknown): string {
  if (arg === null) return "null";
  return typeof arg;
}

/**
 * Convert logger arguments into attributes, preserving order.
 * Accepts `LogAttr` instances and alternating string keys and values.
 */
export function argsToAttrs(args: readonly unknown[]): LogAttr[] {
  const attrs: LogAttr[] = [];
  let i = 0;
  while (i < args.length) {
    const arg = args[i];
    if (arg instanceof LogAttr) {
      attrs.push(arg);
      i += 1;
      continue;
    }
    if (typeof arg !== "string") {
      throw new MalformedAttrsError(`attribute key at position ${i} must be a string, got ${describeArg(arg)}`);
    }
    if (i + 1 >= args.length) {
      throw new MalformedAttrsError(`attribute key "${arg}" has no value`);
    }
    attrs.push(new LogAttr(arg, args[i + 1]));
    i += 2;
  }
  return attrs;
}

/** Format an error for logging */
export function formatError(error: unknown): string {
  if (error instanceof Error) return error.stack || `${error.name}: ${error.message}`;
  return `Non-Error exception: ${String(error)}`;
}

export class ModuleLogger implements Logger {
  constructor(
    readonly module: string,
    readonly handler: LogHandler,
  ) {}

  debug(msg: string, ...args: unknown[]): void {
    this.log(LogLevels.DEBUG, msg, args);
  }

  info(msg: string, ...args: unknown[]): void {
    this.log(LogLevels.INFO, msg, args);
  }

  warn(msg: string, ...args: unknown[]): void {
    this.log(LogLevels.WARN, msg, args);
  }

  error(msg: string, ...args: unknown[]): void {
    this.log(LogLevels.ERROR, msg, args);
  }

  exception(error: unknown, ...args: unknown[]): void {
    // Skip stack formatting when ERROR is disabled
    if (!this.handler.enabled(LogLevels.ERROR)) return;
    this.emit(LogLevels.ERROR, formatError(error), args);
  }

  private log(level: LogLevel, msg: string, args: readonly unknown[]): void {
    if (!this.handler.enabled(level)) return;
    this.emit(level, msg, args);
  }

  private emit(level: LogLevel, message: string, args: readonly unknown[]): void {
    const attrs = argsToAttrs(args);
    attrs.push(new LogAttr(ATTR_KEY_MODULE, this.module));

    const record: LogRecord = Object.freeze({
      message,
      level,
      attrs: Object.freeze(attrs),
    });
    this.handler.handle(record);
  }
}
