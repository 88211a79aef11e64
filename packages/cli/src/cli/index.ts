// pattern: Imperative Shell

import { Command, Option } from "@commander-js/extra-typings";

import {
  LOG_FORMATS,
  LOG_LEVELS,
  type LogFormat,
  type LogLevel,
} from "../logger/index.js";

import { makeSchemaCommand } from "./schema/index.js";
import { CLI_LOGGER, initializeLogger, setCliLogLevel } from "./_deps.js";
import {
  setConfigPath,
  setModeOverrides,
  setNonInteractive,
  setRootOverride,
} from "./_globals.js";
import { makeExecCommand } from "./exec.js";
import { makeShellCommand } from "./shell.js";

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some(format => format === value);
}

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new Error(
      `Invalid log level: ${value}. Valid levels are: ${LOG_LEVELS.join(", ")}`
    );
  }
  return value;
}

function parseLogFormat(value: string): LogFormat {
  if (!isLogFormat(value)) {
    throw new Error(
      `Invalid log format: ${value}. Valid formats are: ${LOG_FORMATS.join(", ")}`
    );
  }
  return value;
}

// Determine defaults based on environment
export function getDefaultLogLevel(): LogLevel {
  const envLevel = process.env["SANDSHELL_LOG_LEVEL"];
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return "info";
}

export function isNonInteractiveEnvironment(): boolean {
  return (
    !process.stdout.isTTY || process.env["SANDSHELL_NON_INTERACTIVE"] === "1"
  );
}

function getDefaultLogFormat(): LogFormat {
  return isNonInteractiveEnvironment() ? "json" : "nice";
}

// Define the root command
export const rootCommand = new Command("sandshell")
  .version("0.1.0")
  .description("a shell confined to one directory, with a recycle bin")
  .addOption(
    new Option("-l, --log-level <level>", "Set log level")
      .choices(LOG_LEVELS)
      .default(getDefaultLogLevel())
      .argParser(parseLogLevel)
  )
  .addOption(
    new Option("--non-interactive", "Disable interactive features").default(
      isNonInteractiveEnvironment()
    )
  )
  .addOption(
    new Option("-f, --format <format>", "Log output format")
      .choices(LOG_FORMATS)
      .default(getDefaultLogFormat())
      .argParser(parseLogFormat)
  )
  .addOption(new Option("-c, --config <path>", "Use this settings file"))
  .addOption(
    new Option("-r, --root <dir>", "Override the allowed root directory")
  )
  .addOption(
    new Option("--dry-run", "Report what would change without touching files")
  )
  .addOption(
    new Option("--no-safe-mode", "Log dangerous arguments instead of rejecting them")
  )
  .hook("preAction", thisCommand => {
    // Configure CLI_LOGGER and session overrides before any action runs
    const options = thisCommand.opts();

    initializeLogger(options.format, options.nonInteractive);
    setCliLogLevel(options.logLevel);
    CLI_LOGGER.debug(
      `Log level configured to: ${options.logLevel}, format: ${options.format}, non-interactive: ${options.nonInteractive}`
    );

    setNonInteractive(options.nonInteractive);
    setConfigPath(options.config);
    setRootOverride(options.root);
    setModeOverrides(
      options.dryRun ? true : undefined,
      options.safeMode ? undefined : false
    );
    if (options.root) {
      CLI_LOGGER.debug(`Allowed root override: ${options.root}`);
    }
  })
  .addCommand(makeShellCommand(), { isDefault: true })
  .addCommand(makeExecCommand())
  .addCommand(makeSchemaCommand());
