import { ShellSettingsV1 } from "./v1/index.js";

export * from "./v1/index.js";

// Alias to latest version
export const ShellSettings = ShellSettingsV1;
export type ShellSettings = ShellSettingsV1;

/**
 * Settings after defaults are applied and paths are made absolute
 */
export interface ResolvedShellSettings {
  allowedRoot: string;
  recycleBin: string;
  dryRun: boolean;
  safeMode: boolean;
  prompt: string;
  colors: boolean;
}
