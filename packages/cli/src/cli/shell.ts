// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";
import { createInterface } from "node:readline/promises";

import { CommandDispatcher } from "../shell/dispatcher.js";
import { createShellContext } from "../shell/context.js";
import { runRepl } from "../shell/repl.js";

import { consoleOutput } from "./_utils/output.js";
import { isAffirmative, isInteractiveEnvironment } from "./_utils/prompts.js";
import { loadSessionSettings } from "./_utils/session.js";
import { withErrorHandling } from "./_utils/with-error-handling.js";
import { CLI_LOGGER } from "./_deps.js";

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeShellCommand() {
  return new Command("shell")
    .description("Start an interactive sandboxed shell (default)")
    .action(
      withErrorHandling(async () => {
        const settings = await loadSessionSettings();
        const interactive = isInteractiveEnvironment();

        const rl = createInterface({
          input: process.stdin,
          output: process.stdout,
          terminal: interactive,
        });

        try {
          // The loop owns stdin, so questions go through the same interface
          const context = createShellContext({
            settings,
            logger: CLI_LOGGER,
            output: consoleOutput,
            confirm: async message =>
              interactive && isAffirmative(await rl.question(`${message} [y/N] `)),
          });

          await runRepl({
            rl,
            dispatcher: new CommandDispatcher(context),
            context,
            prompt: settings.prompt,
          });
        } finally {
          rl.close();
        }
      })
    );
}
