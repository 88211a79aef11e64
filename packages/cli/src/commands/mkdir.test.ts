// pattern: Imperative Shell

import { existsSync, statSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createTestShellContext } from "../test-utils/context-helpers.js";
import { createTempRoot, type TempRoot } from "../test-utils/temp-root.js";
import {
  FileSystemError,
  PermissionDenied,
  SandboxViolation,
} from "../utils/errors.js";

import { mkdirCommand } from "./mkdir.js";

describe("mkdir", () => {
  let tempRoot: TempRoot;

  beforeEach(() => {
    tempRoot = createTempRoot();
  });

  afterEach(() => {
    tempRoot.cleanup();
  });

  it("should create each directory", async () => {
    const { context, output } = createTestShellContext(tempRoot.path);

    const outcome = await mkdirCommand.execute(["a", "b"], context);

    expect(outcome).toEqual({ status: "success" });
    expect(statSync(join(tempRoot.path, "a")).isDirectory()).toBe(true);
    expect(statSync(join(tempRoot.path, "b")).isDirectory()).toBe(true);
    expect(output).toEqual([]);
  });

  it("should report created directories with -v", async () => {
    const { context, output } = createTestShellContext(tempRoot.path);

    await mkdirCommand.execute(["-v", "a"], context);
    expect(output).toEqual([`Created directory: ${join(tempRoot.path, "a")}`]);
  });

  it("should create missing parents with -p", async () => {
    const { context } = createTestShellContext(tempRoot.path);

    const outcome = await mkdirCommand.execute(["--parents", "x/y/z"], context);

    expect(outcome).toEqual({ status: "success" });
    expect(existsSync(join(tempRoot.path, "x/y/z"))).toBe(true);
  });

  it("should fail without -p when a parent is missing", async () => {
    const { context } = createTestShellContext(tempRoot.path);

    const outcome = await mkdirCommand.execute(["x/y"], context);

    expect(outcome.status).toBe("failure");
    if (outcome.status === "failure") {
      expect(outcome.errors[0]).toBeInstanceOf(FileSystemError);
      expect(outcome.errors[0]?.message).toMatch(/^Error creating x\/y: ENOENT/);
    }
    expect(existsSync(join(tempRoot.path, "x"))).toBe(false);
  });

  it("should only note directories that already exist", async () => {
    tempRoot.mkdir("a");
    const { context, output } = createTestShellContext(tempRoot.path);

    const outcome = await mkdirCommand.execute(["a"], context);

    expect(outcome).toEqual({ status: "success" });
    expect(output).toEqual(["Directory already exists: a"]);
  });

  it("should create nothing in dry-run mode", async () => {
    const { context, output } = createTestShellContext(tempRoot.path, {
      dryRun: true,
    });

    const outcome = await mkdirCommand.execute(["a"], context);

    expect(outcome).toEqual({ status: "success" });
    expect(existsSync(join(tempRoot.path, "a"))).toBe(false);
    expect(output).toEqual([
      `DRY RUN: Would create directory ${join(tempRoot.path, "a")}`,
    ]);
  });

  it("should keep going after a rejected operand and report it", async () => {
    const { context } = createTestShellContext(tempRoot.path);

    const outcome = await mkdirCommand.execute(["../escape", "ok"], context);

    expect(outcome.status).toBe("failure");
    if (outcome.status === "failure") {
      expect(outcome.errors).toHaveLength(1);
      expect(outcome.errors[0]).toBeInstanceOf(SandboxViolation);
    }
    expect(existsSync(join(tempRoot.path, "ok"))).toBe(true);
  });

  it("should refuse to create inside a directory that is not writable", async () => {
    const { context } = createTestShellContext(tempRoot.path, {
      denyAccess: [tempRoot.path],
    });

    const outcome = await mkdirCommand.execute(["a"], context);

    expect(outcome.status).toBe("failure");
    if (outcome.status === "failure") {
      expect(outcome.errors[0]).toBeInstanceOf(PermissionDenied);
      expect(outcome.errors[0]?.message).toBe(
        `Permission denied (write): ${tempRoot.path}`
      );
    }
    expect(existsSync(join(tempRoot.path, "a"))).toBe(false);
  });

  it("should require an operand", async () => {
    const { context } = createTestShellContext(tempRoot.path);

    const outcome = await mkdirCommand.execute(["-p"], context);
    expect(outcome.status === "failure" && outcome.errors[0]?.message).toBe(
      "mkdir: missing operand"
    );
  });
});
