// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";

import { CommandDispatcher } from "../shell/dispatcher.js";
import { createShellContext } from "../shell/context.js";
import { reportOutcome } from "../shell/report.js";

import { consoleOutput } from "./_utils/output.js";
import { promptForConfirmation } from "./_utils/prompts.js";
import { loadSessionSettings } from "./_utils/session.js";
import { withErrorHandling } from "./_utils/with-error-handling.js";
import { CLI_LOGGER } from "./_deps.js";

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeExecCommand() {
  return new Command("exec")
    .description("Run a single sandboxed command and exit")
    .argument(
      "<words...>",
      "A quoted command line, or the command and its arguments as separate words"
    )
    .addHelpText(
      "after",
      `
Examples:
  sandshell exec "rm -rf 'old notes'"     Parse a quoted command line
  sandshell exec -- ls -la docs           Pass words through unchanged
  sandshell --dry-run exec rm -r build    Show what would be recycled
      `
    )
    .action(
      withErrorHandling(async (words: string[]) => {
        const settings = await loadSessionSettings();
        const context = createShellContext({
          settings,
          logger: CLI_LOGGER,
          output: consoleOutput,
          confirm: promptForConfirmation,
        });
        const dispatcher = new CommandDispatcher(context);

        // One word is a whole command line; several were already split by
        // the calling shell
        const [line] = words;
        const outcome =
          words.length === 1 && line !== undefined
            ? await dispatcher.runLine(line)
            : await dispatcher.run(words);

        reportOutcome(outcome, context);
        if (outcome.status === "failure") {
          process.exitCode = 1;
        }
      })
    );
}
