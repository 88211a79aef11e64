// pattern: Imperative Shell

import { mkdirSync, mkdtempSync, realpathSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { stringify as stringifyYaml } from "yaml";

import type { ShellSettings } from "../config/types/index.js";

/**
 * Configuration for creating a temporary root
 */
export interface TempRootConfig {
  /** Settings file to write into the root, if any */
  settings?: ShellSettings;
  /** Settings file format to use */
  format?: "yaml" | "json";
  /** Optional directory name prefix */
  prefix?: string;
}

/**
 * A scratch directory that tests use as the allowed root
 */
export interface TempRoot {
  /** Canonical path of the temporary directory */
  path: string;
  /** Path of the settings file that was written, if any */
  settingsPath: string | undefined;
  /** Remove the temporary directory */
  cleanup: () => void;
  /** Write a file below the root, creating parent directories */
  writeFile: (relativePath: string, content?: string) => string;
  /** Create a directory below the root */
  mkdir: (relativePath: string) => string;
}

function serializeSettings(
  settings: ShellSettings,
  format: "yaml" | "json"
): string {
  return format === "json"
    ? JSON.stringify(settings, null, 2)
    : stringifyYaml(settings);
}

/**
 * Creates a temporary directory, optionally holding a sandshell settings
 * file, for testing purposes
 */
export function createTempRoot(config: TempRootConfig = {}): TempRoot {
  // realpath: on macOS the temp dir itself sits behind a symlink
  const tempDir = realpathSync.native(
    mkdtempSync(join(tmpdir(), config.prefix ?? "sandshell-test-"))
  );

  let settingsPath: string | undefined;
  if (config.settings) {
    const format = config.format ?? "yaml";
    settingsPath = join(tempDir, `sandshell.${format}`);
    writeFileSync(settingsPath, serializeSettings(config.settings, format), "utf8");
  }

  return {
    path: tempDir,
    settingsPath,
    cleanup: () => {
      rmSync(tempDir, { recursive: true, force: true });
    },
    writeFile: (relativePath, content = "") => {
      const fullPath = join(tempDir, relativePath);
      mkdirSync(dirname(fullPath), { recursive: true });
      writeFileSync(fullPath, content, "utf8");
      return fullPath;
    },
    mkdir: relativePath => {
      const fullPath = join(tempDir, relativePath);
      mkdirSync(fullPath, { recursive: true });
      return fullPath;
    },
  };
}
