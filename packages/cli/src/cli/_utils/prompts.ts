// pattern: Imperative Shell

import { confirm } from "@inquirer/prompts";

import { isNonInteractive } from "../_globals.js";

/**
 * TTY detection utility
 * @returns True if we're in an interactive terminal environment
 */
export function isInteractiveEnvironment(): boolean {
  return (
    process.env["SANDSHELL_NON_INTERACTIVE"] !== "1" &&
    !isNonInteractive() &&
    process.stdout.isTTY &&
    process.stdin.isTTY
  );
}

/**
 * Prompts user for confirmation with a yes/no question. Non-interactive
 * sessions decline without asking.
 */
export async function promptForConfirmation(message: string): Promise<boolean> {
  if (!isInteractiveEnvironment()) {
    return false;
  }

  return await confirm({
    message,
    default: false,
  });
}

/**
 * Whether a typed answer to a `[y/N]` question means yes
 */
export function isAffirmative(answer: string): boolean {
  return /^y(es)?$/i.test(answer.trim());
}
