// pattern: Factory

import { Chalk } from "chalk";

import { ArgumentGate } from "../executor/argument-gate.js";
import { ReversibleDeleter } from "../recycle/reversible-deleter.js";
import { createSandboxConfig } from "../sandbox/config.js";
import { type AccessCheck, PathSandbox } from "../sandbox/path-sandbox.js";

import type { ShellContext, ShellOutput } from "../commands/types.js";
import type { ResolvedShellSettings } from "../config/types/index.js";
import type { Logger } from "pino";

export interface CreateShellContextOptions {
  settings: ResolvedShellSettings;
  logger: Logger;
  output: ShellOutput;
  /** Defaults to declining every question */
  confirm?: (message: string) => Promise<boolean>;
  /** Permission check for the sandbox; defaults to `fs.accessSync` */
  access?: AccessCheck;
}

/**
 * Build the sandbox components for one session and bundle them with the
 * output sink and confirmation hook
 *
 * @throws ConfigurationError if the allowed root is unusable
 */
export function createShellContext(
  options: CreateShellContextOptions
): ShellContext {
  const { settings, logger, output } = options;

  const config = createSandboxConfig(
    {
      allowedRoot: settings.allowedRoot,
      recycleBin: settings.recycleBin,
      dryRun: settings.dryRun,
      safeMode: settings.safeMode,
    },
    logger
  );

  return {
    config,
    sandbox: new PathSandbox(config, logger, options.access),
    deleter: new ReversibleDeleter(config, logger),
    gate: new ArgumentGate(config, logger),
    logger,
    output,
    colors: new Chalk({ level: settings.colors ? 1 : 0 }),
    confirm: options.confirm ?? (async () => false),
  };
}
