/**
 * Structured logging facade
 *
 * One process-wide handler, installed at startup, and cheap loggers tagged
 * with the name of the module that emits through them:
 * - Leveled logging with key/value attributes
 * - Module tagging for extensions bundled into one process
 * - A pino-backed handler configured from ./configs/logging.jsonc
 *
 * @example
 * ```typescript
 * import { getLogger, setupLogging } from "log-facade";
 *
 * setupLogging();
 *
 * const logger = getLogger("http");
 * logger.info("started", "port", 8080);
 * ```
 *
 * @module
 */

export {
  getDefaultLogger,
  getLogger,
  HANDLER_REPLACED_WARNING,
  isHandlerSet,
  LogRegistry,
  setDefaultHandler,
} from "./src/registry.ts";

export { ATTR_KEY_MODULE, argsToAttrs, DEFAULT_MODULE_NAME, ModuleLogger } from "./src/logger.ts";

export {
  attr,
  getLevelName,
  LEVEL_NAMES,
  type LevelName,
  LogAttr,
  type LogHandler,
  type Logger,
  type LogLevel,
  LogLevels,
  type LogRecord,
} from "./src/types.ts";

export { HandlerNotSetError, LoggingConfigError, MalformedAttrsError } from "./src/errors.ts";

export { type LogFn, setInternalWarnFn } from "./src/internal-logger.ts";

export {
  PinoHandler,
  type PinoHandlerOptions,
  RESERVED_KEY_PREFIX,
  type TimestampFormat,
} from "./src/handlers/pino-handler.ts";

export {
  createHandlerFromConfig,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_PATH,
  INTERNAL_MODULE_NAME,
  LEGACY_FORMAT_WARNING,
  loadLoggingConfigSync,
  type LoggingConfig,
  loggingConfigSchema,
  type SetupOptions,
  setupLogging,
} from "./src/config.ts";
