// pattern: Imperative Shell

import { statSync } from "node:fs";

import { PermissionKind } from "../sandbox/types.js";
import {
  CommandError,
  FileSystemError,
  PermissionDenied,
  type SandshellError,
} from "../utils/errors.js";

import { parseArgs } from "./flags.js";
import { failure, outcomeFrom, type ShellCommand } from "./types.js";

export const rmCommand: ShellCommand = {
  name: "rm",
  summary: "Remove files and directories (moved to the recycle bin)",
  usage: "rm [-r|--recursive] [-f|--force] [-v|--verbose] path...",

  async execute(args, context) {
    const parsed = parseArgs("rm", args, [
      { name: "recursive", short: ["r", "R"], long: "recursive" },
      { name: "force", short: ["f"], long: "force" },
      { name: "verbose", short: ["v"], long: "verbose" },
    ]);
    if (!parsed.success) {
      return failure(parsed.error);
    }
    const { flags, operands } = parsed.value;
    if (operands.length === 0) {
      return failure(new CommandError("rm: missing operand", "rm"));
    }

    const { sandbox, deleter, output, colors } = context;
    const recursive = flags.has("recursive");
    const force = flags.has("force");
    const errors: SandshellError[] = [];

    for (const fileName of operands) {
      const resolved = sandbox.resolve(fileName);
      if (!resolved.success) {
        errors.push(resolved.error);
        continue;
      }
      const path = resolved.value;

      const stats = statSync(path, { throwIfNoEntry: false });
      if (!stats) {
        if (!force) {
          errors.push(
            new FileSystemError(`File not found: ${fileName}`, "delete", path)
          );
        }
        continue;
      }

      const isDirectory = stats.isDirectory();
      if (isDirectory && !recursive) {
        errors.push(
          new FileSystemError(
            `Is a directory (use -r for recursive): ${fileName}`,
            "delete",
            path
          )
        );
        continue;
      }

      if (!sandbox.checkPermission(path, PermissionKind.Delete)) {
        errors.push(new PermissionDenied(path, PermissionKind.Delete));
        continue;
      }

      if (isDirectory && !force) {
        const confirmed = await context.confirm(
          `Remove directory '${path}' and all its contents?`
        );
        if (!confirmed) {
          output.write("Cancelled");
          continue;
        }
      }

      const deleted = deleter.delete(path);
      if (!deleted.success) {
        errors.push(deleted.error);
        continue;
      }

      const entry = deleted.value;
      if (entry.dryRun) {
        output.write(
          colors.dim(`DRY RUN: Would move ${path} to ${entry.recyclePath}`)
        );
      } else if (flags.has("verbose")) {
        output.write(`Removed: ${path} (recycled as ${entry.name})`);
      }
    }

    return outcomeFrom(errors);
  },
};
