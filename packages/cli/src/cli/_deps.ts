// pattern: Imperative Shell
// Shared dependencies for CLI commands

export { CLI_LOGGER, initializeLogger, setCliLogLevel } from "../logger/index.js";
