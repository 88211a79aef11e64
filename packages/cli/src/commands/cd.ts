// pattern: Imperative Shell

import { statSync } from "node:fs";

import { PermissionKind } from "../sandbox/types.js";
import {
  CommandError,
  FileSystemError,
  PermissionDenied,
} from "../utils/errors.js";

import { failure, SUCCESS, type ShellCommand } from "./types.js";

export const cdCommand: ShellCommand = {
  name: "cd",
  summary: "Change the current directory",
  usage: "cd [directory]",

  async execute(args, context) {
    if (args.length > 1) {
      return failure(new CommandError("cd: too many arguments", "cd"));
    }
    // Like a login shell, no operand means home; the sandbox decides if
    // home is reachable
    const target = args[0] ?? "~";

    const resolved = context.sandbox.resolve(target);
    if (!resolved.success) {
      return failure(resolved.error);
    }
    const path = resolved.value;

    const stats = statSync(path, { throwIfNoEntry: false });
    if (!stats) {
      return failure(
        new FileSystemError(`Directory not found: ${target}`, "read", path)
      );
    }
    if (!stats.isDirectory()) {
      return failure(
        new FileSystemError(`Not a directory: ${target}`, "read", path)
      );
    }
    if (!context.sandbox.checkPermission(path, PermissionKind.Read)) {
      return failure(new PermissionDenied(path, PermissionKind.Read));
    }

    context.sandbox.changeDirectory(path);
    return SUCCESS;
  },
};
