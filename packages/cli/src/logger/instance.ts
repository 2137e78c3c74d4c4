// pattern: Imperative Shell

import { createLogger, mapLogLevelToPinoLevel } from "./config.js";

import type { LogFormat, LogLevel } from "./types.js";
import type { Logger } from "pino";

// Global logger instance
let LOGGER: Logger | undefined;

export function initializeLogger(
  format: LogFormat,
  nonInteractive: boolean
): void {
  LOGGER = createLogger(format, nonInteractive);
}

export function setCliLogLevel(logLevel: LogLevel): void {
  if (!LOGGER) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  LOGGER.level = mapLogLevelToPinoLevel(logLevel);
}

// Always refers to the current logger instance, so modules can import it
// before the CLI has parsed --format and --log-level
export const CLI_LOGGER = new Proxy({} as Logger, {
  get(_target, prop) {
    if (!LOGGER) {
      throw new Error("Logger not initialized. Call initializeLogger() first.");
    }
    const value: unknown = Reflect.get(LOGGER, prop);
    if (typeof value === "function") {
      return value.bind(LOGGER);
    }
    return value;
  },
});
