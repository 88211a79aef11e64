// pattern: Functional Core

import { CommandError } from "../utils/errors.js";

import { failure, SUCCESS, type ShellCommand } from "./types.js";

/**
 * `help` needs the finished registry, so it is built with a lookup
 * function rather than the map itself
 */
export function makeHelpCommand(
  commands: () => ReadonlyMap<string, ShellCommand>
): ShellCommand {
  return {
    name: "help",
    summary: "Show help for commands",
    usage: "help [command]",

    async execute(args, context) {
      const { output, colors } = context;
      const registry = commands();
      const [commandName] = args;

      if (commandName !== undefined) {
        const command = registry.get(commandName);
        if (!command) {
          return failure(
            new CommandError(`Unknown command: ${commandName}`, "help")
          );
        }
        output.write(`${command.usage} - ${command.summary}`);
        return SUCCESS;
      }

      output.write(colors.bold("Available commands:"));
      const names = [...registry.keys()].sort();
      const width = Math.max(...names.map(name => name.length));
      for (const name of names) {
        const command = registry.get(name);
        if (command) {
          output.write(`  ${colors.cyan(name.padEnd(width))}  ${command.summary}`);
        }
      }
      output.write("");
      output.write("Use 'help <command>' for detailed help on a specific command.");
      return SUCCESS;
    },
  };
}
