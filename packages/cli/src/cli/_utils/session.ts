// pattern: Imperative Shell

import { resolve } from "node:path";

import { loadShellSettings } from "../../config/loaders/settings-loader.js";
import { CLI_LOGGER } from "../_deps.js";
import {
  getConfigPath,
  getModeOverrides,
  getRootOverride,
} from "../_globals.js";

import type { ResolvedShellSettings } from "../../config/types/index.js";

export interface SettingsOverrides {
  root?: string | undefined;
  dryRun?: boolean | undefined;
  safeMode?: boolean | undefined;
}

/**
 * Layer command-line flags over loaded settings. A relative root is taken
 * from `cwd`.
 */
export function applySettingsOverrides(
  settings: ResolvedShellSettings,
  overrides: SettingsOverrides,
  cwd: string
): ResolvedShellSettings {
  return {
    ...settings,
    allowedRoot:
      overrides.root !== undefined
        ? resolve(cwd, overrides.root)
        : settings.allowedRoot,
    dryRun: overrides.dryRun ?? settings.dryRun,
    safeMode: overrides.safeMode ?? settings.safeMode,
  };
}

/**
 * Load the settings file (or defaults) and apply the global CLI overrides
 */
export async function loadSessionSettings(): Promise<ResolvedShellSettings> {
  const { settings, settingsPath } = await loadShellSettings({
    configPath: getConfigPath(),
    logger: CLI_LOGGER,
  });

  const resolved = applySettingsOverrides(
    settings,
    { root: getRootOverride(), ...getModeOverrides() },
    process.cwd()
  );

  CLI_LOGGER.debug(
    { settingsPath, settings: resolved },
    "Session settings resolved"
  );
  return resolved;
}
