/**
 * Logging configuration and startup.
 * Loads ./configs/logging.jsonc unless told otherwise.
 */

import { readFileSync } from "node:fs";
import { resolve } from "node:path";
import { type ParseError, parse, printParseErrorCode } from "jsonc-parser";
import type { DestinationStream } from "pino";
import { z } from "zod";
import { LoggingConfigError } from "./errors.ts";
import { PinoHandler } from "./handlers/pino-handler.ts";
import { internalWarn, setInternalWarnFn } from "./internal-logger.ts";
import { getLogger, setDefaultHandler } from "./registry.ts";
import { LEVEL_NAMES, type LevelName, type LogHandler } from "./types.ts";

export const DEFAULT_CONFIG_PATH = "./configs/logging.jsonc";

/** Module that the facade's own diagnostics are logged under */
export const INTERNAL_MODULE_NAME = "logging";

export const LEGACY_FORMAT_WARNING =
  'deprecated config format: remove the "logging" wrapper and place level, file, timestamp and modules at the top level';

const levelName = z
  .string()
  .transform((name) => name.toUpperCase())
  .pipe(z.enum(LEVEL_NAMES));

export const loggingConfigSchema = z.object({
  level: levelName.optional(),
  /** Log file path. Logs go to stdout when unset. */
  file: z.string().min(1).optional(),
  timestamp: z.enum(["ISO", "EPOCH", "NONE"]).optional(),
  modules: z.record(z.object({ level: levelName })).optional(),
});

export type LoggingConfig = z.infer<typeof loggingConfigSchema>;

export const DEFAULT_CONFIG: LoggingConfig = {
  level: "INFO",
  timestamp: "ISO",
};

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isNotFound(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Load logging config from file synchronously
 * @returns undefined when the file does not exist
 */
export function loadLoggingConfigSync(path: string = DEFAULT_CONFIG_PATH): LoggingConfig | undefined {
  const fullPath = resolve(path);

  let text: string;
  try {
    text = readFileSync(fullPath, "utf8");
  }
  catch (error) {
    if (isNotFound(error)) return undefined;
    throw error;
  }

  const errors: ParseError[] = [];
  const raw: unknown = parse(text, errors, { allowTrailingComma: true });
  const [firstError] = errors;
  if (firstError) {
    throw new LoggingConfigError(`${printParseErrorCode(firstError.error)} at offset ${firstError.offset}`, fullPath);
  }

  let candidate = raw;
  if (isRecord(raw) && "logging" in raw) {
    internalWarn(LEGACY_FORMAT_WARNING);
    candidate = raw.logging;
  }

  const result = loggingConfigSchema.safeParse(candidate);
  if (!result.success) {
    const details = result.error.issues
      .map((issue) => `${issue.path.join(".") || "(root)"}: ${issue.message}`)
      .join("; ");
    throw new LoggingConfigError(details, fullPath);
  }
  return result.data;
}

/**
 * Build a pino-backed handler from config
 * @param destination Overrides both stdout and `config.file`
 */
export function createHandlerFromConfig(config: LoggingConfig, destination?: DestinationStream): PinoHandler {
  let modules: Record<string, LevelName> | undefined;
  if (config.modules) {
    modules = {};
    for (const [module, moduleConfig] of Object.entries(config.modules)) {
      modules[module] = moduleConfig.level;
    }
  }

  return new PinoHandler({
    level: config.level,
    modules,
    timestamp: config.timestamp,
    destination,
    file: config.file,
  });
}

export interface SetupOptions {
  /** Used as-is instead of reading a file */
  config?: LoggingConfig;
  configPath?: string;
  destination?: DestinationStream;
}

/**
 * Install a pino-backed default handler from config, and route the facade's
 * own warnings through it. Call once at startup.
 */
export function setupLogging(options: SetupOptions = {}): LogHandler {
  const config = options.config ?? loadLoggingConfigSync(options.configPath) ?? DEFAULT_CONFIG;
  const handler = createHandlerFromConfig(config, options.destination);

  setDefaultHandler(handler);

  // Resolved per call so diagnostics follow later setDefaultHandler() calls
  setInternalWarnFn((message) => getLogger(INTERNAL_MODULE_NAME).warn(message));

  return handler;
}
