// pattern: Factory

import { cdCommand } from "./cd.js";
import { makeExitCommand } from "./exit.js";
import { makeHelpCommand } from "./help.js";
import { lsCommand } from "./ls.js";
import { mkdirCommand } from "./mkdir.js";
import { pwdCommand } from "./pwd.js";
import { rmCommand } from "./rm.js";

import type { ShellCommand } from "./types.js";

/**
 * Shorthands expanded before lookup: `ll` is `ls -l`, `la` is `ls -a`
 */
export const COMMAND_ALIASES: ReadonlyMap<string, readonly string[]> = new Map([
  ["ll", ["ls", "-l"]],
  ["la", ["ls", "-a"]],
]);

/**
 * Build the name-to-command map once at startup
 */
export function createCommandRegistry(): ReadonlyMap<string, ShellCommand> {
  const registry = new Map<string, ShellCommand>();
  const commands: ShellCommand[] = [
    pwdCommand,
    lsCommand,
    cdCommand,
    mkdirCommand,
    rmCommand,
    makeExitCommand("exit"),
    makeExitCommand("quit"),
    makeHelpCommand(() => registry),
  ];
  for (const command of commands) {
    registry.set(command.name, command);
  }
  return registry;
}
