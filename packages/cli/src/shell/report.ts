// pattern: Functional Core

import type { CommandOutcome, ShellContext } from "../commands/types.js";

/**
 * Write every error of a failed outcome to the session output
 */
export function reportOutcome(
  outcome: CommandOutcome,
  context: Pick<ShellContext, "output" | "colors">
): void {
  if (outcome.status !== "failure") {
    return;
  }
  for (const error of outcome.errors) {
    context.output.write(context.colors.red(`Error: ${error.message}`));
  }
}
