// pattern: Imperative Shell

import { reportOutcome } from "./report.js";

import type { CommandDispatcher } from "./dispatcher.js";
import type { ShellContext } from "../commands/types.js";
import type { Interface } from "node:readline/promises";

const MAX_PROMPT_PATH = 40;

/**
 * `/sub/dir > `, with long paths shortened from the left
 */
export function formatPrompt(
  displayPath: string,
  prompt: string,
  context: Pick<ShellContext, "colors">
): string {
  const path =
    displayPath.length > MAX_PROMPT_PATH
      ? `...${displayPath.slice(-(MAX_PROMPT_PATH - 3))}`
      : displayPath;
  return `${context.colors.blue(path)} ${prompt}`;
}

export interface ReplOptions {
  rl: Interface;
  dispatcher: CommandDispatcher;
  context: ShellContext;
  prompt: string;
}

/**
 * Read lines until `exit` or end of input, running each through the
 * dispatcher and reporting failures. The caller owns `rl` and closes it.
 */
export async function runRepl(options: ReplOptions): Promise<void> {
  const { rl, dispatcher, context, prompt } = options;
  const { sandbox, output } = context;

  const showPrompt = (): void => {
    rl.setPrompt(formatPrompt(sandbox.displayPath(sandbox.cwd), prompt, context));
    rl.prompt();
  };

  rl.on("SIGINT", () => {
    output.write(context.colors.yellow("Use 'exit' to quit"));
    showPrompt();
  });

  output.write(
    `Sandboxed to ${sandbox.allowedRoot}. Type 'help' for available commands.`
  );
  showPrompt();

  for await (const rawLine of rl) {
    const line = rawLine.trim();
    if (line) {
      const outcome = await dispatcher.runLine(line);
      reportOutcome(outcome, context);
      if (outcome.status === "exit") {
        break;
      }
    }
    showPrompt();
  }
}
