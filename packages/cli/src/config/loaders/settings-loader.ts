// pattern: Functional Core
import { parse as parseToml } from "@iarna/toml";
import { access, constants, readFile } from "node:fs/promises";
import { basename, dirname, extname, join, resolve } from "node:path";
import { parse as parseYaml } from "yaml";

import { DEFAULT_RECYCLE_BIN } from "../../sandbox/config.js";
import { ajv } from "../../utils/ajv.js";
import { ConfigurationError, ValidationError } from "../../utils/errors.js";
import { type ResolvedShellSettings, ShellSettings } from "../types/index.js";

import type { Logger } from "pino";

export const SETTINGS_FILENAMES = [
  "sandshell.yaml",
  "sandshell.yml",
  "sandshell.json",
  "sandshell.toml",
];

export const DEFAULT_PROMPT = "> ";

// Compile schema once for reuse
const validateShellSettings = ajv.compile<ShellSettings>(ShellSettings);

/**
 * Loads and parses a settings file, detecting the format by extension
 * (.json, .yaml/.yml, .toml)
 */
export async function loadSettingsFromFile(filePath: string): Promise<unknown> {
  const content = await readFile(filePath, "utf8");
  const ext = extname(filePath).toLowerCase();

  switch (ext) {
    case ".json":
      return JSON.parse(content);
    case ".yaml":
    case ".yml":
      return parseYaml(content);
    case ".toml":
      return parseToml(content);
    default:
      throw new ConfigurationError(
        `Unsupported file format: ${ext}. Supported formats: .json, .yaml, .yml, .toml`
      );
  }
}

/**
 * Validates a parsed object against the ShellSettings schema
 *
 * @throws ValidationError listing every schema violation
 */
export function validateShellSettingsObject(
  data: unknown
): data is ShellSettings {
  if (validateShellSettings(data)) {
    return true;
  }

  const messages = (validateShellSettings.errors ?? []).map(
    err => `${err.instancePath || "root"}: ${err.message ?? "is invalid"}`
  );
  throw new ValidationError(
    `Settings validation failed: ${messages.join(", ")}`,
    messages
  );
}

/**
 * Search for a sandshell settings file in `startDir` and, unless
 * `noParent` is set, its parent directories
 *
 * @throws ConfigurationError if one directory holds more than one settings file
 */
export async function findSettingsFile(
  startDir: string = process.cwd(),
  noParent = false
): Promise<string | null> {
  let currentDir = resolve(startDir);

  for (;;) {
    const found: string[] = [];
    for (const filename of SETTINGS_FILENAMES) {
      const candidate = join(currentDir, filename);
      try {
        await access(candidate, constants.F_OK);
        found.push(candidate);
      } catch {
        // Not present at this level
      }
    }

    if (found.length > 1) {
      throw new ConfigurationError(
        `Multiple sandshell settings files found in ${currentDir}: ${found.map(path => basename(path)).join(", ")}. Please use only one settings file per directory.`
      );
    }
    if (found.length === 1 && found[0]) {
      return found[0];
    }

    const parentDir = dirname(currentDir);
    if (noParent || parentDir === currentDir) {
      return null;
    }
    currentDir = parentDir;
  }
}

/**
 * Apply defaults and make `allowedRoot` absolute
 */
export function applySettingsDefaults(
  settings: ShellSettings,
  baseDir: string
): ResolvedShellSettings {
  return {
    allowedRoot: resolve(baseDir, settings.allowedRoot ?? "."),
    recycleBin: settings.recycleBin ?? DEFAULT_RECYCLE_BIN,
    dryRun: settings.dryRun ?? false,
    safeMode: settings.safeMode ?? true,
    prompt: settings.prompt ?? DEFAULT_PROMPT,
    colors: settings.colors ?? true,
  };
}

export interface LoadShellSettingsOptions {
  /** Explicit settings file; skips discovery */
  configPath?: string | undefined;
  /** Where discovery starts (defaults to process.cwd()) */
  startDir?: string | undefined;
  logger: Logger;
}

export interface LoadedShellSettings {
  settings: ResolvedShellSettings;
  /** The file the settings came from, or null when defaults were used */
  settingsPath: string | null;
}

/**
 * Find, parse and validate the settings file. Falls back to defaults with a
 * warning when there is none.
 */
export async function loadShellSettings(
  options: LoadShellSettingsOptions
): Promise<LoadedShellSettings> {
  const { logger } = options;
  const startDir = resolve(options.startDir ?? process.cwd());

  let settingsPath: string | null;
  if (options.configPath) {
    settingsPath = resolve(startDir, options.configPath);
    try {
      await access(settingsPath, constants.R_OK);
    } catch {
      throw new ConfigurationError(
        `Settings file not found or not readable: ${settingsPath}`
      );
    }
  } else {
    settingsPath = await findSettingsFile(startDir);
  }

  if (!settingsPath) {
    logger.warn(
      { startDir },
      "No sandshell settings file found, using defaults"
    );
    return {
      settings: applySettingsDefaults({}, startDir),
      settingsPath: null,
    };
  }

  const data = await loadSettingsFromFile(settingsPath);
  if (!validateShellSettingsObject(data)) {
    // Unreachable: the validator throws on failure
    throw new ValidationError(`Settings validation failed: ${settingsPath}`);
  }

  logger.debug({ settingsPath }, "Loaded settings file");
  return {
    settings: applySettingsDefaults(data, dirname(settingsPath)),
    settingsPath,
  };
}
