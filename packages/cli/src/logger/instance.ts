// pattern: Imperative Shell

import { createLogger } from "./config.js";

import type { LogFormat, LogLevel } from "./types.js";
import type { Logger } from "pino";

// CLI surface only; sandbox components receive their logger explicitly
let cliLogger: Logger | undefined;

export function initializeLogger(
  format: LogFormat,
  nonInteractive: boolean
): void {
  cliLogger = createLogger(format, nonInteractive);
}

function currentLogger(): Logger {
  if (!cliLogger) {
    throw new Error("Logger not initialized. Call initializeLogger() first.");
  }
  return cliLogger;
}

export function setCliLogLevel(logLevel: LogLevel): void {
  currentLogger().level = logLevel;
}

/**
 * Stands in for whichever logger `initializeLogger` built last, so modules
 * can import it before the global options are parsed
 */
export const CLI_LOGGER: Logger = new Proxy<Logger>(Object.create(null), {
  get(_target, prop) {
    const logger = currentLogger();
    const value: unknown = Reflect.get(logger, prop, logger);
    return typeof value === "function" ? value.bind(logger) : value;
  },
  set(_target, prop, value) {
    return Reflect.set(currentLogger(), prop, value);
  },
});
