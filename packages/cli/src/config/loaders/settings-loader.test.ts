// pattern: Imperative Shell
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createCapturingLogger } from "../../test-utils/logger.js";
import { createTempRoot, type TempRoot } from "../../test-utils/temp-root.js";
import { ConfigurationError, ValidationError } from "../../utils/errors.js";

import {
  applySettingsDefaults,
  findSettingsFile,
  loadSettingsFromFile,
  loadShellSettings,
  validateShellSettingsObject,
} from "./settings-loader.js";

describe("settings loader", () => {
  let tempRoot: TempRoot;

  beforeEach(() => {
    tempRoot = createTempRoot();
  });

  afterEach(() => {
    tempRoot.cleanup();
  });

  describe("loadSettingsFromFile", () => {
    it("should load JSON files", async () => {
      const filePath = tempRoot.writeFile(
        "sandshell.json",
        JSON.stringify({ version: 1, dryRun: true })
      );

      expect(await loadSettingsFromFile(filePath)).toEqual({
        version: 1,
        dryRun: true,
      });
    });

    it("should load YAML files", async () => {
      const filePath = tempRoot.writeFile(
        "sandshell.yml",
        `version: 1
allowedRoot: ./workspace
safeMode: false
`
      );

      expect(await loadSettingsFromFile(filePath)).toEqual({
        version: 1,
        allowedRoot: "./workspace",
        safeMode: false,
      });
    });

    it("should load TOML files", async () => {
      const filePath = tempRoot.writeFile(
        "sandshell.toml",
        `version = 1
recycleBin = "trash"
prompt = "$ "
`
      );

      expect(await loadSettingsFromFile(filePath)).toEqual({
        version: 1,
        recycleBin: "trash",
        prompt: "$ ",
      });
    });

    it("should reject unknown extensions", async () => {
      const filePath = tempRoot.writeFile("sandshell.ini", "dryRun=true");

      await expect(loadSettingsFromFile(filePath)).rejects.toThrow(
        "Unsupported file format: .ini. Supported formats: .json, .yaml, .yml, .toml"
      );
    });
  });

  describe("validateShellSettingsObject", () => {
    it("should accept a complete settings object", () => {
      expect(
        validateShellSettingsObject({
          version: 1,
          allowedRoot: ".",
          recycleBin: ".recycle_bin",
          dryRun: false,
          safeMode: true,
          prompt: "> ",
          colors: false,
        })
      ).toBe(true);
    });

    it("should accept an empty object", () => {
      expect(validateShellSettingsObject({})).toBe(true);
    });

    it("should reject wrongly typed fields", () => {
      expect(() => validateShellSettingsObject({ dryRun: "yes" })).toThrow(
        "Settings validation failed: /dryRun: must be boolean"
      );
    });

    it("should reject unknown fields with a ValidationError", () => {
      let caught: unknown;
      try {
        validateShellSettingsObject({ allowedRoots: "." });
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(ValidationError);
      if (caught instanceof ValidationError) {
        expect(caught.validationErrors).toEqual([
          "root: must NOT have additional properties",
        ]);
      }
    });
  });

  describe("findSettingsFile", () => {
    it("should find a settings file in the start directory", async () => {
      const filePath = tempRoot.writeFile("sandshell.yaml", "dryRun: true\n");

      expect(await findSettingsFile(tempRoot.path)).toBe(filePath);
    });

    it("should climb to parent directories", async () => {
      const filePath = tempRoot.writeFile("sandshell.json", "{}");
      const nested = tempRoot.mkdir("a/b/c");

      expect(await findSettingsFile(nested)).toBe(filePath);
    });

    it("should not climb when told not to", async () => {
      tempRoot.writeFile("sandshell.json", "{}");
      const nested = tempRoot.mkdir("a");

      expect(await findSettingsFile(nested, true)).toBeNull();
    });

    it("should refuse a directory with more than one settings file", async () => {
      tempRoot.writeFile("sandshell.yaml", "");
      tempRoot.writeFile("sandshell.toml", "");

      await expect(findSettingsFile(tempRoot.path)).rejects.toThrow(
        `Multiple sandshell settings files found in ${tempRoot.path}: sandshell.yaml, sandshell.toml. Please use only one settings file per directory.`
      );
    });
  });

  describe("applySettingsDefaults", () => {
    it("should fill every unset field", () => {
      expect(applySettingsDefaults({}, "/srv/box")).toEqual({
        allowedRoot: "/srv/box",
        recycleBin: ".recycle_bin",
        dryRun: false,
        safeMode: true,
        prompt: "> ",
        colors: true,
      });
    });

    it("should resolve a relative root against the base directory", () => {
      const settings = applySettingsDefaults(
        { allowedRoot: "../shared", dryRun: true },
        "/srv/box"
      );

      expect(settings.allowedRoot).toBe("/srv/shared");
      expect(settings.dryRun).toBe(true);
    });
  });

  describe("loadShellSettings", () => {
    it("should load and resolve a discovered settings file", async () => {
      const tempWithSettings = createTempRoot({
        settings: { version: 1, allowedRoot: "data", safeMode: false },
      });
      const nested = tempWithSettings.mkdir("data/inner");
      const { logger } = createCapturingLogger();

      try {
        const loaded = await loadShellSettings({ startDir: nested, logger });

        expect(loaded.settingsPath).toBe(
          join(tempWithSettings.path, "sandshell.yaml")
        );
        expect(loaded.settings).toEqual({
          allowedRoot: join(tempWithSettings.path, "data"),
          recycleBin: ".recycle_bin",
          dryRun: false,
          safeMode: false,
          prompt: "> ",
          colors: true,
        });
      } finally {
        tempWithSettings.cleanup();
      }
    });

    it("should load an explicit settings file relative to the start directory", async () => {
      tempRoot.writeFile("conf/custom.json", JSON.stringify({ dryRun: true }));
      const { logger } = createCapturingLogger();

      const loaded = await loadShellSettings({
        configPath: "conf/custom.json",
        startDir: tempRoot.path,
        logger,
      });

      expect(loaded.settingsPath).toBe(join(tempRoot.path, "conf/custom.json"));
      expect(loaded.settings.allowedRoot).toBe(join(tempRoot.path, "conf"));
      expect(loaded.settings.dryRun).toBe(true);
    });

    it("should fail when the explicit settings file is missing", async () => {
      const { logger } = createCapturingLogger();

      await expect(
        loadShellSettings({ configPath: "nope.yaml", startDir: tempRoot.path, logger })
      ).rejects.toThrow(ConfigurationError);
    });

    it("should fail on invalid settings", async () => {
      tempRoot.writeFile("sandshell.json", JSON.stringify({ safeMode: 1 }));
      const { logger } = createCapturingLogger();

      await expect(
        loadShellSettings({ startDir: tempRoot.path, logger })
      ).rejects.toThrow("Settings validation failed: /safeMode: must be boolean");
    });
  });
});
