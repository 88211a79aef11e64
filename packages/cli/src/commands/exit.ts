// pattern: Functional Core

import type { CommandOutcome, ShellCommand } from "./types.js";

export function makeExitCommand(name: string): ShellCommand {
  return {
    name,
    summary: "Exit the shell",
    usage: name,

    async execute(_args, context): Promise<CommandOutcome> {
      context.output.write("Goodbye!");
      return { status: "exit" };
    },
  };
}
