// pattern: Imperative Shell

import { existsSync, mkdirSync } from "node:fs";
import { dirname } from "node:path";

import { PermissionKind } from "../sandbox/types.js";
import {
  CommandError,
  errorMessage,
  FileSystemError,
  PermissionDenied,
  type SandshellError,
} from "../utils/errors.js";

import { parseArgs } from "./flags.js";
import { failure, outcomeFrom, type ShellCommand } from "./types.js";

export const mkdirCommand: ShellCommand = {
  name: "mkdir",
  summary: "Create directories",
  usage: "mkdir [-p|--parents] [-v|--verbose] directory...",

  async execute(args, context) {
    const parsed = parseArgs("mkdir", args, [
      { name: "parents", short: ["p"], long: "parents" },
      { name: "verbose", short: ["v"], long: "verbose" },
    ]);
    if (!parsed.success) {
      return failure(parsed.error);
    }
    const { flags, operands } = parsed.value;
    if (operands.length === 0) {
      return failure(new CommandError("mkdir: missing operand", "mkdir"));
    }

    const { sandbox, output, colors } = context;
    const dryRun = context.config.dryRun;
    const errors: SandshellError[] = [];

    for (const dirName of operands) {
      const resolved = sandbox.resolve(dirName);
      if (!resolved.success) {
        errors.push(resolved.error);
        continue;
      }
      const path = resolved.value;

      if (existsSync(path)) {
        output.write(colors.yellow(`Directory already exists: ${dirName}`));
        continue;
      }

      // The parent of a confined path is confined too, unless the path is
      // the root, which always exists
      const parent = sandbox.resolve(dirname(path));
      if (!parent.success) {
        errors.push(parent.error);
        continue;
      }
      if (!sandbox.checkPermission(parent.value, PermissionKind.Write)) {
        errors.push(new PermissionDenied(parent.value, PermissionKind.Write));
        continue;
      }

      if (dryRun) {
        output.write(colors.dim(`DRY RUN: Would create directory ${path}`));
        continue;
      }

      try {
        mkdirSync(path, { recursive: flags.has("parents") });
      } catch (error) {
        errors.push(
          new FileSystemError(
            `Error creating ${dirName}: ${errorMessage(error)}`,
            "write",
            path
          )
        );
        continue;
      }

      context.logger.debug({ path }, "Created directory");
      if (flags.has("verbose")) {
        output.write(`Created directory: ${path}`);
      }
    }

    return outcomeFrom(errors);
  },
};
