// pattern: Functional Core

export { createLogger } from "./config.js";
export { CLI_LOGGER, initializeLogger, setCliLogLevel } from "./instance.js";
export type { LogFormat, LogLevel } from "./types.js";
export { LOG_FORMATS, LOG_LEVELS } from "./types.js";
