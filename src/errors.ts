/**
 * Errors raised by the facade
 */

export class HandlerNotSetError extends Error {
  constructor() {
    super("Log handler not set: call setDefaultHandler() before retrieving a logger");
    this.name = "HandlerNotSetError";
  }
}

export class MalformedAttrsError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedAttrsError";
  }
}

export class LoggingConfigError extends Error {
  constructor(
    message: string,
    readonly path: string,
  ) {
    super(`Invalid logging config ${path}: ${message}`);
    this.name = "LoggingConfigError";
  }
}
