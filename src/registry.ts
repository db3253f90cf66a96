/**
 * Process-wide handler slot and logger retrieval.
 *
 * The handler must be set during startup, before any logger is retrieved
 * and before extensions start logging. Setting it again is allowed (last
 * write wins), but loggers already returned by getLogger() keep the handler
 * they were created with. Only the default logger follows the new handler.
 */

import { HandlerNotSetError } from "./errors.ts";
import { internalWarn } from "./internal-logger.ts";
import { DEFAULT_MODULE_NAME, ModuleLogger } from "./logger.ts";
import type { LogHandler, Logger } from "./types.ts";

export const HANDLER_REPLACED_WARNING =
  "default log handler replaced; loggers retrieved earlier keep the previous handler";

export class LogRegistry {
  private handler: LogHandler | undefined;
  private defaultLogger: ModuleLogger | undefined;

  setDefaultHandler(handler: LogHandler): void {
    const replaced = this.handler !== undefined && this.handler !== handler;
    this.handler = handler;
    this.defaultLogger = new ModuleLogger(DEFAULT_MODULE_NAME, handler);
    // Reported once the new handler is in place, so it is the one that receives it
    if (replaced) internalWarn(HANDLER_REPLACED_WARNING);
  }

  hasHandler(): boolean {
    return this.handler !== undefined;
  }

  getDefaultLogger(): Logger {
    if (!this.defaultLogger) throw new HandlerNotSetError();
    return this.defaultLogger;
  }

  /**
   * Extensions bundled into one process can't be told apart by stack, so each
   * retrieves a logger under its own name and every record carries a `module`
   * attribute.
   */
  getLogger(module?: string): Logger {
    if (!module) return this.getDefaultLogger();
    if (!this.handler) throw new HandlerNotSetError();
    return new ModuleLogger(module, this.handler);
  }
}

const defaultRegistry = new LogRegistry();

/**
 * Install the process-wide handler. Call this once in the application entry
 * point, before anything retrieves a logger.
 */
export function setDefaultHandler(handler: LogHandler): void {
  defaultRegistry.setDefaultHandler(handler);
}

export function isHandlerSet(): boolean {
  return defaultRegistry.hasHandler();
}

export function getDefaultLogger(): Logger {
  return defaultRegistry.getDefaultLogger();
}

/**
 * Get a logger tagged with `module`
 * @param module Module name, omitted for the default logger
 */
export function getLogger(module?: string): Logger {
  return defaultRegistry.getLogger(module);
}
