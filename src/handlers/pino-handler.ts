/**
 * LogHandler backed by pino, writing one JSON line per record
 */

import pino, { type DestinationStream, type Logger as PinoLogger, type LoggerOptions } from "pino";
import { ATTR_KEY_MODULE } from "../logger.ts";
import { type LevelName, type LogHandler, type LogLevel, LogLevels, type LogRecord } from "../types.ts";

export type TimestampFormat = "ISO" | "EPOCH" | "NONE";

export interface PinoHandlerOptions {
  /** Root level, defaults to INFO */
  level?: LevelName;
  /** Per-module levels, overriding the root level for records tagged with that module */
  modules?: Record<string, LevelName>;
  timestamp?: TimestampFormat;
  /** Defaults to stdout */
  destination?: DestinationStream;
  /** Log file, written synchronously. Ignored when `destination` is set. */
  file?: string;
}

type PinoMethod = "debug" | "info" | "warn" | "error";

function pinoMethod(level: LogLevel): PinoMethod {
  switch (level) {
    case LogLevels.DEBUG:
      return "debug";
    case LogLevels.INFO:
      return "info";
    case LogLevels.WARN:
      return "warn";
    case LogLevels.ERROR:
      return "error";
  }
}

// pino applies its own serializer to this key
const PINO_ERR_KEY = "err";

/** Prefix for attributes whose key collides with a field pino writes itself */
export const RESERVED_KEY_PREFIX = "attr.";

const PINO_RESERVED_KEYS = new Set(["level", "time", "msg"]);

type FileDestination = ReturnType<typeof pino.destination>;

function timestampOption(format: TimestampFormat): LoggerOptions["timestamp"] {
  switch (format) {
    case "ISO":
      return pino.stdTimeFunctions.isoTime;
    case "EPOCH":
      return pino.stdTimeFunctions.epochTime;
    case "NONE":
      return false;
  }
}

function moduleOf(record: LogRecord): string | undefined {
  for (let i = record.attrs.length - 1; i >= 0; i--) {
    const { key, value } = record.attrs[i];
    if (key === ATTR_KEY_MODULE && typeof value === "string") return value;
  }
  return undefined;
}

export class PinoHandler implements LogHandler {
  private readonly pino: PinoLogger;
  private readonly level: LogLevel;
  private readonly moduleLevels: Map<string, LogLevel>;
  private readonly minLevel: number;
  private readonly file: FileDestination | undefined;
  private closed = false;

  constructor(options: PinoHandlerOptions = {}) {
    this.level = LogLevels[options.level ?? "INFO"];
    this.moduleLevels = new Map(
      Object.entries(options.modules ?? {}).map(([module, name]): [string, LogLevel] => [module, LogLevels[name]]),
    );
    this.minLevel = Math.min(this.level, ...this.moduleLevels.values());

    // Filtering happens here, so pino itself passes everything through
    const pinoOptions: LoggerOptions = {
      level: "debug",
      base: null,
      timestamp: timestampOption(options.timestamp ?? "ISO"),
    };
    if (options.destination) {
      this.pino = pino(pinoOptions, options.destination);
    }
    else if (options.file) {
      // Immediate writes without buffering
      this.file = pino.destination({ dest: options.file, mkdir: true, sync: true });
      this.pino = pino(pinoOptions, this.file);
    }
    else {
      this.pino = pino(pinoOptions);
    }
  }

  enabled(level: LogLevel): boolean {
    return !this.closed && level >= this.minLevel;
  }

  handle(record: LogRecord): void {
    if (this.closed || record.level < this.thresholdFor(record)) return;

    // No prototype, so a "__proto__" key stays an ordinary field
    const fields: Record<string, unknown> = Object.create(null);
    for (const { key, value } of record.attrs) {
      const field = PINO_RESERVED_KEYS.has(key) ? `${RESERVED_KEY_PREFIX}${key}` : key;
      fields[field] = value instanceof Error && key !== PINO_ERR_KEY ? pino.stdSerializers.err(value) : value;
    }
    this.pino[pinoMethod(record.level)](fields, record.message);
  }

  /**
   * Flush and close the log file opened for `file`. The handler drops every
   * record afterwards. No-op for other destinations.
   */
  close(): void {
    if (!this.file || this.closed) return;
    this.closed = true;
    this.file.flushSync();
    this.file.end();
  }

  private thresholdFor(record: LogRecord): LogLevel {
    const module = moduleOf(record);
    if (module === undefined) return this.level;
    return this.moduleLevels.get(module) ?? this.level;
  }
}
