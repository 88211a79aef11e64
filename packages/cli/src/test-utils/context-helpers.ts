// pattern: Functional Core
// Test helper utilities for creating ShellContext objects over a temp root

import { type AccessCheck, nodeAccessCheck } from "../sandbox/path-sandbox.js";
import { createShellContext } from "../shell/context.js";

import { type CapturedLogEntry, createCapturingLogger } from "./logger.js";

import type { ShellContext } from "../commands/types.js";
import type { ResolvedShellSettings } from "../config/types/index.js";

export interface TestShellContext {
  context: ShellContext;
  /** Every line written to the shell output, uncoloured */
  output: string[];
  /** Messages asked through `confirm` */
  questions: string[];
  logs: () => CapturedLogEntry[];
}

/**
 * Creates a ShellContext rooted at `allowedRoot` with colours off and an
 * in-memory output sink
 */
export function createTestShellContext(
  allowedRoot: string,
  overrides?: Partial<ResolvedShellSettings> & {
    confirmAnswer?: boolean;
    /** Paths the sandbox should report as lacking every permission */
    denyAccess?: readonly string[];
  }
): TestShellContext {
  const output: string[] = [];
  const questions: string[] = [];
  const { logger, entries } = createCapturingLogger();
  const denied = new Set(overrides?.denyAccess ?? []);
  const access: AccessCheck = (path, mode) =>
    !denied.has(path) && nodeAccessCheck(path, mode);

  const context = createShellContext({
    settings: {
      allowedRoot,
      recycleBin: ".recycle_bin",
      dryRun: false,
      safeMode: true,
      prompt: "> ",
      colors: false,
      ...overrides,
    },
    logger,
    output: { write: line => output.push(line) },
    confirm: async message => {
      questions.push(message);
      return overrides?.confirmAnswer ?? false;
    },
    access,
  });

  return { context, output, questions, logs: entries };
}
