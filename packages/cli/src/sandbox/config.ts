// pattern: Imperative Shell
// Builds the process-wide sandbox configuration: canonical root, eagerly
// created recycle directory, and the two mode switches.

import { mkdirSync, realpathSync, statSync } from "node:fs";
import { resolve } from "node:path";

import { ConfigurationError, errorMessage } from "../utils/errors.js";

import type { ResolvedPath, SandboxOptions } from "./types.js";
import type { Logger } from "pino";

export const DEFAULT_RECYCLE_BIN = ".recycle_bin";

/**
 * Sandbox configuration. Everything is fixed at construction except
 * `dryRun`, which callers may flip between commands. Operations read
 * `dryRun` once when they start.
 */
export class SandboxConfig {
  readonly allowedRoot: ResolvedPath;
  readonly recycleDir: ResolvedPath;
  readonly safeMode: boolean;
  dryRun: boolean;

  constructor(
    allowedRoot: ResolvedPath,
    recycleDir: ResolvedPath,
    safeMode: boolean,
    dryRun: boolean
  ) {
    this.allowedRoot = allowedRoot;
    this.recycleDir = recycleDir;
    this.safeMode = safeMode;
    this.dryRun = dryRun;
  }
}

/**
 * Canonicalize the allowed root and create the recycle directory.
 *
 * @throws ConfigurationError if the root is missing or not a directory, or
 * the recycle directory cannot be created
 */
export function createSandboxConfig(
  options: SandboxOptions,
  logger: Logger
): SandboxConfig {
  const baseDir = options.baseDir ?? process.cwd();
  const requestedRoot = resolve(baseDir, options.allowedRoot);

  let allowedRoot: string;
  try {
    allowedRoot = realpathSync.native(requestedRoot);
  } catch (error) {
    throw new ConfigurationError(
      `Allowed root does not exist: ${requestedRoot} (${errorMessage(error)})`
    );
  }

  if (!statSync(allowedRoot).isDirectory()) {
    throw new ConfigurationError(
      `Allowed root is not a directory: ${allowedRoot}`
    );
  }

  const requestedRecycle = resolve(
    allowedRoot,
    options.recycleBin ?? DEFAULT_RECYCLE_BIN
  );

  let recycleDir: string;
  try {
    mkdirSync(requestedRecycle, { recursive: true });
    recycleDir = realpathSync.native(requestedRecycle);
  } catch (error) {
    throw new ConfigurationError(
      `Cannot create recycle directory ${requestedRecycle}: ${errorMessage(error)}`
    );
  }

  const config = new SandboxConfig(
    allowedRoot as ResolvedPath,
    recycleDir as ResolvedPath,
    options.safeMode ?? true,
    options.dryRun ?? false
  );

  logger.debug(
    {
      allowedRoot: config.allowedRoot,
      recycleDir: config.recycleDir,
      safeMode: config.safeMode,
      dryRun: config.dryRun,
    },
    "Sandbox configuration created"
  );

  return config;
}
