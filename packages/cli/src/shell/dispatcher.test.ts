// pattern: Imperative Shell

import { existsSync, readdirSync } from "node:fs";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { createTestShellContext } from "../test-utils/context-helpers.js";
import { createTempRoot, type TempRoot } from "../test-utils/temp-root.js";
import { ArgumentRejected, CommandError } from "../utils/errors.js";

import { CommandDispatcher } from "./dispatcher.js";

import type { ShellCommand } from "../commands/types.js";

describe("CommandDispatcher", () => {
  let tempRoot: TempRoot;

  beforeEach(() => {
    tempRoot = createTempRoot();
    tempRoot.writeFile("my notes.txt", "");
    tempRoot.writeFile(".profile", "");
    tempRoot.mkdir("docs");
  });

  afterEach(() => {
    tempRoot.cleanup();
  });

  it("should succeed on a blank line without output", async () => {
    const { context, output } = createTestShellContext(tempRoot.path);
    const dispatcher = new CommandDispatcher(context);

    expect(await dispatcher.runLine("   ")).toEqual({ status: "success" });
    expect(output).toEqual([]);
  });

  it("should honour shell quoting", async () => {
    const { context } = createTestShellContext(tempRoot.path);
    const dispatcher = new CommandDispatcher(context);

    const outcome = await dispatcher.runLine("rm 'my notes.txt'");

    expect(outcome).toEqual({ status: "success" });
    expect(existsSync(join(tempRoot.path, "my notes.txt"))).toBe(false);
  });

  it("should report unbalanced quotes as a parse error", async () => {
    const { context } = createTestShellContext(tempRoot.path);
    const dispatcher = new CommandDispatcher(context);

    const outcome = await dispatcher.runLine("rm 'unterminated");

    expect(outcome.status).toBe("failure");
    if (outcome.status === "failure") {
      expect(outcome.errors[0]).toBeInstanceOf(CommandError);
      expect(outcome.errors[0]?.message).toMatch(/^Parse error: /);
    }
  });

  it("should expand the la alias", async () => {
    const { context, output } = createTestShellContext(tempRoot.path);
    const dispatcher = new CommandDispatcher(context);

    await dispatcher.runLine("la");

    expect(output).toEqual([".recycle_bin/", "docs/", ".profile", "my notes.txt"]);
  });

  it("should pass extra arguments after an alias", async () => {
    tempRoot.writeFile("docs/.draft", "");
    const { context, output } = createTestShellContext(tempRoot.path);
    const dispatcher = new CommandDispatcher(context);

    await dispatcher.runLine("la docs");

    expect(output).toEqual([".draft"]);
  });

  it("should fail on an unknown command", async () => {
    const { context } = createTestShellContext(tempRoot.path);
    const dispatcher = new CommandDispatcher(context);

    const outcome = await dispatcher.runLine("chmod 777 docs");

    expect(outcome.status === "failure" && outcome.errors[0]?.message).toBe(
      "Unknown command: chmod. Type 'help' for available commands."
    );
  });

  it("should stop a rejected argument before the command runs", async () => {
    const execute = vi.fn();
    const spy: ShellCommand = {
      name: "spy",
      summary: "test command",
      usage: "spy",
      execute,
    };
    const { context } = createTestShellContext(tempRoot.path);
    const dispatcher = new CommandDispatcher(context, new Map([["spy", spy]]));

    const outcome = await dispatcher.runLine("spy ../secret");

    expect(outcome.status === "failure" && outcome.errors[0]).toBeInstanceOf(
      ArgumentRejected
    );
    expect(execute).not.toHaveBeenCalled();
  });

  it("should leave path decisions to the sandbox outside safe mode", async () => {
    const { context } = createTestShellContext(tempRoot.path, { safeMode: false });
    const dispatcher = new CommandDispatcher(context);

    const outcome = await dispatcher.runLine("ls ../");

    expect(outcome.status === "failure" && outcome.errors[0]?.name).toBe(
      "SandboxViolation"
    );
  });

  it("should turn a thrown error into a failure", async () => {
    const broken: ShellCommand = {
      name: "broken",
      summary: "test command",
      usage: "broken",
      execute: async () => {
        throw new Error("disk on fire");
      },
    };
    const { context } = createTestShellContext(tempRoot.path);
    const dispatcher = new CommandDispatcher(context, new Map([["broken", broken]]));

    const outcome = await dispatcher.run(["broken"]);

    expect(outcome.status === "failure" && outcome.errors[0]?.message).toBe(
      "broken: disk on fire"
    );
  });

  it("should recycle repeated deletions under numbered names", async () => {
    const { context } = createTestShellContext(tempRoot.path);
    const dispatcher = new CommandDispatcher(context);

    for (let i = 0; i < 2; i++) {
      expect(await dispatcher.runLine("mkdir x")).toEqual({ status: "success" });
      expect(await dispatcher.runLine("rm -rf x")).toEqual({ status: "success" });
    }

    expect(readdirSync(join(tempRoot.path, ".recycle_bin")).sort()).toEqual([
      "x",
      "x_1",
    ]);
  });
});
