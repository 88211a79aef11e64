// pattern: Functional Core
// The capability interface every shell command implements, and the
// explicitly constructed context handed to each of them.

import type { ArgumentGate } from "../executor/argument-gate.js";
import type { ReversibleDeleter } from "../recycle/reversible-deleter.js";
import type { SandboxConfig } from "../sandbox/config.js";
import type { PathSandbox } from "../sandbox/path-sandbox.js";
import type { SandshellError } from "../utils/errors.js";
import type { ChalkInstance } from "chalk";
import type { Logger } from "pino";

/**
 * Where commands write user-facing output, one line at a time
 */
export interface ShellOutput {
  write(line: string): void;
}

export type CommandOutcome =
  | { status: "success" }
  | { status: "failure"; errors: SandshellError[] }
  /** The session should end */
  | { status: "exit" };

/**
 * Everything a command may touch. Built once per session and passed by
 * reference; there is no module-level sandbox state.
 */
export interface ShellContext {
  config: SandboxConfig;
  sandbox: PathSandbox;
  deleter: ReversibleDeleter;
  gate: ArgumentGate;
  logger: Logger;
  output: ShellOutput;
  colors: ChalkInstance;
  /** Ask the user a yes/no question; non-interactive sessions answer no */
  confirm(message: string): Promise<boolean>;
}

export interface ShellCommand {
  readonly name: string;
  /** One-line description for `help` */
  readonly summary: string;
  /** Synopsis, e.g. `rm [-r] [-f] path...` */
  readonly usage: string;
  execute(
    args: readonly string[],
    context: ShellContext
  ): Promise<CommandOutcome>;
}

export const SUCCESS: CommandOutcome = { status: "success" };

/**
 * Success when nothing went wrong, otherwise a failure carrying every error
 */
export function outcomeFrom(errors: SandshellError[]): CommandOutcome {
  return errors.length === 0 ? SUCCESS : { status: "failure", errors };
}

export function failure(...errors: SandshellError[]): CommandOutcome {
  return { status: "failure", errors };
}
