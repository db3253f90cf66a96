/**
 * Internal diagnostics for the facade itself.
 * Uses a setter so the registry can warn without depending on an installed handler.
 */

export type LogFn = (message: string) => void;

const consoleWarn: LogFn = (message: string) => {
  // Fallback until setupLogging() routes diagnostics through the facade
  console.warn(`[log-facade] ${message}`);
};

let warnFn: LogFn = consoleWarn;

/**
 * Set the internal warning function. Returns the one it replaces.
 */
export function setInternalWarnFn(fn: LogFn): LogFn {
  const previous = warnFn;
  warnFn = fn;
  return previous;
}

/**
 * Log an internal warning (handler replaced, deprecated config format).
 */
export function internalWarn(message: string): void {
  warnFn(message);
}
