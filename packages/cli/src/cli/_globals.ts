// pattern: Imperative Shell

// Global settings file override
let CONFIG_PATH: string | undefined;

// Global allowed root override
let ROOT_OVERRIDE: string | undefined;

// Global mode flags; undefined leaves the settings file in charge
let DRY_RUN: boolean | undefined;
let SAFE_MODE: boolean | undefined;

// Global interactive flag
let NON_INTERACTIVE = false;

/**
 * Set the settings file override
 * Skips settings file discovery when given
 */
export function setConfigPath(path: string | undefined): void {
  CONFIG_PATH = path;
}

export function getConfigPath(): string | undefined {
  return CONFIG_PATH;
}

/**
 * Set the allowed root override
 * Takes precedence over `allowedRoot` in the settings file
 */
export function setRootOverride(root: string | undefined): void {
  ROOT_OVERRIDE = root;
}

export function getRootOverride(): string | undefined {
  return ROOT_OVERRIDE;
}

/**
 * Set the dry-run and safe-mode overrides from command-line flags
 */
export function setModeOverrides(
  dryRun: boolean | undefined,
  safeMode: boolean | undefined
): void {
  DRY_RUN = dryRun;
  SAFE_MODE = safeMode;
}

export function getModeOverrides(): {
  dryRun: boolean | undefined;
  safeMode: boolean | undefined;
} {
  return { dryRun: DRY_RUN, safeMode: SAFE_MODE };
}

export function setNonInteractive(nonInteractive: boolean): void {
  NON_INTERACTIVE = nonInteractive;
}

export function isNonInteractive(): boolean {
  return NON_INTERACTIVE;
}
