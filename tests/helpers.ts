/**
 * Shared test doubles
 */

import type { DestinationStream } from "pino";
import { type LogHandler, type LogLevel, LogLevels, type LogRecord } from "../mod.ts";

/**
 * Handler that captures records for inspection
 */
export class RecordingHandler implements LogHandler {
  readonly records: LogRecord[] = [];
  readonly enabledCalls: LogLevel[] = [];

  constructor(private readonly minLevel: number = LogLevels.DEBUG) {}

  enabled(level: LogLevel): boolean {
    this.enabledCalls.push(level);
    return level >= this.minLevel;
  }

  handle(record: LogRecord): void {
    this.records.push(record);
  }

  lastRecord(): LogRecord | undefined {
    return this.records[this.records.length - 1];
  }
}

/**
 * In-memory pino destination, one entry per JSON line
 */
export class MemoryDestination implements DestinationStream {
  readonly lines: string[] = [];

  write(msg: string): void {
    this.lines.push(msg);
  }

  entries(): unknown[] {
    return this.lines.map((line) => JSON.parse(line));
  }
}
