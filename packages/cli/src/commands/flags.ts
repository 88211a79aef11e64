// pattern: Functional Core

import { CommandError } from "../utils/errors.js";
import { fail, type OperationResult, succeed } from "../utils/result.js";

export interface FlagSpec<N extends string> {
  name: N;
  /** Single letters that set this flag, e.g. ["r", "R"] */
  short: readonly string[];
  long: string;
}

export interface ParsedArgs<N extends string> {
  flags: ReadonlySet<N>;
  operands: string[];
}

/**
 * Split command arguments into flags and operands. Short flags combine
 * (`-rf`), long flags are spelled `--name`, and `--` ends flag parsing.
 * A lone `-` is an operand.
 */
export function parseArgs<N extends string>(
  commandName: string,
  args: readonly string[],
  specs: readonly FlagSpec<N>[]
): OperationResult<ParsedArgs<N>, CommandError> {
  const flags = new Set<N>();
  const operands: string[] = [];
  let flagsDone = false;

  for (const arg of args) {
    if (flagsDone || !arg.startsWith("-") || arg === "-") {
      operands.push(arg);
      continue;
    }
    if (arg === "--") {
      flagsDone = true;
      continue;
    }

    if (arg.startsWith("--")) {
      const spec = specs.find(s => s.long === arg.slice(2));
      if (!spec) {
        return fail(
          new CommandError(`${commandName}: unknown option ${arg}`, commandName)
        );
      }
      flags.add(spec.name);
      continue;
    }

    for (const letter of arg.slice(1)) {
      const spec = specs.find(s => s.short.includes(letter));
      if (!spec) {
        return fail(
          new CommandError(
            `${commandName}: unknown option -${letter}`,
            commandName
          )
        );
      }
      flags.add(spec.name);
    }
  }

  return succeed({ flags, operands });
}
