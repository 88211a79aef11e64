// pattern: Imperative Shell

import { CommandError } from "../utils/errors.js";

import { failure, SUCCESS, type ShellCommand } from "./types.js";

export const pwdCommand: ShellCommand = {
  name: "pwd",
  summary: "Print the current working directory",
  usage: "pwd",

  async execute(args, context) {
    if (args.length > 0) {
      return failure(new CommandError("pwd: too many arguments", "pwd"));
    }
    context.output.write(context.sandbox.cwd);
    return SUCCESS;
  },
};
