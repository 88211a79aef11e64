// pattern: Imperative Shell

import { split } from "shlex";

import { COMMAND_ALIASES, createCommandRegistry } from "../commands/registry.js";
import {
  type CommandOutcome,
  failure,
  SUCCESS,
  type ShellCommand,
  type ShellContext,
} from "../commands/types.js";
import { CommandError, errorMessage } from "../utils/errors.js";

import type { Logger } from "pino";

/**
 * Turns command lines into command executions: tokenizing, alias
 * expansion, lookup, the argument gate, then the command itself
 */
export class CommandDispatcher {
  private readonly context: ShellContext;
  private readonly commands: ReadonlyMap<string, ShellCommand>;
  private readonly logger: Logger;

  constructor(
    context: ShellContext,
    commands: ReadonlyMap<string, ShellCommand> = createCommandRegistry()
  ) {
    this.context = context;
    this.commands = commands;
    this.logger = context.logger.child({ component: "dispatcher" });
  }

  /**
   * Tokenize a raw line with shell quoting rules and run it. A blank line
   * succeeds without doing anything.
   */
  async runLine(line: string): Promise<CommandOutcome> {
    let tokens: string[];
    try {
      tokens = split(line);
    } catch (error) {
      return failure(
        new CommandError(`Parse error: ${errorMessage(error)}`)
      );
    }
    return this.run(tokens);
  }

  /**
   * Run an already tokenized command
   */
  async run(tokens: readonly string[]): Promise<CommandOutcome> {
    const [head, ...rest] = tokens;
    if (head === undefined) {
      return SUCCESS;
    }

    const alias = COMMAND_ALIASES.get(head);
    const [name = head, ...aliasArgs] = alias ?? [head];
    const args = [...aliasArgs, ...rest];

    const command = this.commands.get(name);
    if (!command) {
      return failure(
        new CommandError(
          `Unknown command: ${name}. Type 'help' for available commands.`
        )
      );
    }

    const gated = this.context.gate.checkArgs(args);
    if (!gated.success) {
      return failure(gated.error);
    }

    this.logger.debug({ command: name, args }, "Executing command");
    try {
      return await command.execute(args, this.context);
    } catch (error) {
      // Commands report expected errors through their outcome; anything
      // thrown is an unexpected I/O failure
      this.logger.error({ err: error, command: name }, "Command failed");
      return failure(
        new CommandError(`${name}: ${errorMessage(error)}`, name)
      );
    }
  }
}
