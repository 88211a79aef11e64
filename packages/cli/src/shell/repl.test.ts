// pattern: Imperative Shell

import { Chalk } from "chalk";
import { createInterface } from "node:readline/promises";
import { join } from "node:path";
import { PassThrough } from "node:stream";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { createTestShellContext } from "../test-utils/context-helpers.js";
import { createTempRoot, type TempRoot } from "../test-utils/temp-root.js";

import { CommandDispatcher } from "./dispatcher.js";
import { formatPrompt, runRepl } from "./repl.js";

describe("formatPrompt", () => {
  const colors = new Chalk({ level: 0 });

  it("should put the display path before the prompt", () => {
    expect(formatPrompt("/sub/dir", "> ", { colors })).toBe("/sub/dir > ");
  });

  it("should shorten long paths from the left", () => {
    const longPath = `/${"a".repeat(20)}/${"b".repeat(29)}`;
    expect(formatPrompt(longPath, "$ ", { colors })).toBe(
      `...${"a".repeat(7)}/${"b".repeat(29)} $ `
    );
  });
});

describe("runRepl", () => {
  let tempRoot: TempRoot;

  beforeEach(() => {
    tempRoot = createTempRoot();
  });

  afterEach(() => {
    tempRoot.cleanup();
  });

  async function session(script: string): Promise<string[]> {
    const { context, output } = createTestShellContext(tempRoot.path);
    const input = new PassThrough();
    const rl = createInterface({ input, terminal: false });

    try {
      const done = runRepl({
        rl,
        dispatcher: new CommandDispatcher(context),
        context,
        prompt: "> ",
      });
      input.end(script);
      await done;
    } finally {
      rl.close();
    }
    return output;
  }

  it("should run lines until exit", async () => {
    const output = await session("mkdir a\n\ncd a\npwd\nexit\npwd\n");

    expect(output).toEqual([
      `Sandboxed to ${tempRoot.path}. Type 'help' for available commands.`,
      join(tempRoot.path, "a"),
      "Goodbye!",
    ]);
  });

  it("should stop at the end of input", async () => {
    const output = await session("pwd\n");

    expect(output).toEqual([
      `Sandboxed to ${tempRoot.path}. Type 'help' for available commands.`,
      tempRoot.path,
    ]);
  });

  it("should report failures and keep going", async () => {
    const output = await session("cd nowhere\nfrobnicate\npwd\n");

    expect(output.slice(1)).toEqual([
      "Error: Directory not found: nowhere",
      "Error: Unknown command: frobnicate. Type 'help' for available commands.",
      tempRoot.path,
    ]);
  });
});
