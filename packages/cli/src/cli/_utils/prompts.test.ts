// pattern: Functional Core

import { afterEach, describe, expect, it, vi } from "vitest";

import {
  isAffirmative,
  isInteractiveEnvironment,
  promptForConfirmation,
} from "./prompts.js";

describe("isAffirmative", () => {
  it("should accept y and yes in any case", () => {
    expect(isAffirmative("y")).toBe(true);
    expect(isAffirmative(" YES ")).toBe(true);
  });

  it("should treat anything else as no", () => {
    expect(isAffirmative("")).toBe(false);
    expect(isAffirmative("n")).toBe(false);
    expect(isAffirmative("yep")).toBe(false);
  });
});

describe("promptForConfirmation", () => {
  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it("should decline without asking in a non-interactive environment", async () => {
    vi.stubEnv("SANDSHELL_NON_INTERACTIVE", "1");

    expect(isInteractiveEnvironment()).toBe(false);
    expect(await promptForConfirmation("Remove everything?")).toBe(false);
  });
});
