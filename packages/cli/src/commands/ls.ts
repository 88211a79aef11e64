// pattern: Imperative Shell

import Table from "cli-table3";
import { lstatSync, readdirSync, type Stats, statSync } from "node:fs";
import { basename, join } from "node:path";

import { PermissionKind } from "../sandbox/types.js";
import {
  CommandError,
  errorMessage,
  FileSystemError,
  PermissionDenied,
} from "../utils/errors.js";

import { parseArgs } from "./flags.js";
import { formatMode, formatModified, formatSize } from "./format.js";
import { failure, SUCCESS, type ShellCommand, type ShellContext } from "./types.js";

interface ListingEntry {
  name: string;
  /** lstat of the entry; undefined when it could not be read */
  stats: Stats | undefined;
}

function safeLstat(path: string): Stats | undefined {
  try {
    return lstatSync(path);
  } catch {
    return undefined;
  }
}

function isDirectoryEntry(entry: ListingEntry): boolean {
  return entry.stats?.isDirectory() ?? false;
}

/**
 * Directories first, then by lower-cased name
 */
export function compareEntries(a: ListingEntry, b: ListingEntry): number {
  const aDir = isDirectoryEntry(a);
  const bDir = isDirectoryEntry(b);
  if (aDir !== bDir) {
    return aDir ? -1 : 1;
  }
  const aName = a.name.toLowerCase();
  const bName = b.name.toLowerCase();
  return aName < bName ? -1 : aName > bName ? 1 : 0;
}

function renderName(entry: ListingEntry, context: ShellContext): string {
  const { colors } = context;
  const { stats, name } = entry;
  if (!stats) {
    return colors.red(name);
  }
  if (stats.isDirectory()) {
    return colors.blue(`${name}/`);
  }
  if (stats.isSymbolicLink()) {
    return colors.cyan(name);
  }
  if (stats.mode & 0o111) {
    return colors.green(name);
  }
  return name;
}

function writeLongFormat(entries: ListingEntry[], context: ShellContext): void {
  const table = new Table({
    chars: {
      top: "",
      "top-mid": "",
      "top-left": "",
      "top-right": "",
      bottom: "",
      "bottom-mid": "",
      "bottom-left": "",
      "bottom-right": "",
      left: "",
      "left-mid": "",
      mid: "",
      "mid-mid": "",
      right: "",
      "right-mid": "",
      middle: "  ",
    },
    style: { head: [], border: [], "padding-left": 0, "padding-right": 0 },
    colAligns: ["left", "right", "left", "left"],
  });

  for (const entry of entries) {
    const { stats } = entry;
    if (!stats) {
      table.push(["?", "?", "?", renderName(entry, context)]);
      continue;
    }
    table.push([
      context.colors.dim(formatMode(stats)),
      context.colors.dim(stats.isDirectory() ? "-" : formatSize(stats.size)),
      context.colors.dim(formatModified(stats.mtime)),
      renderName(entry, context),
    ]);
  }

  // Empty border characters still leave blank top and bottom lines
  for (const line of table.toString().split("\n")) {
    if (line.trim()) {
      context.output.write(line.trimEnd());
    }
  }
}

export const lsCommand: ShellCommand = {
  name: "ls",
  summary: "List directory contents",
  usage: "ls [-a|--all] [-l|--long] [path]",

  async execute(args, context) {
    const parsed = parseArgs("ls", args, [
      { name: "all", short: ["a"], long: "all" },
      { name: "long", short: ["l"], long: "long" },
    ]);
    if (!parsed.success) {
      return failure(parsed.error);
    }
    const { flags, operands } = parsed.value;
    if (operands.length > 1) {
      return failure(new CommandError("ls: too many arguments", "ls"));
    }
    const target = operands[0] ?? ".";

    const resolved = context.sandbox.resolve(target);
    if (!resolved.success) {
      return failure(resolved.error);
    }
    const path = resolved.value;

    let targetStats: Stats;
    try {
      targetStats = statSync(path);
    } catch (error) {
      return failure(
        new FileSystemError(
          `ls: cannot access ${target}: ${errorMessage(error)}`,
          "read",
          path
        )
      );
    }

    if (!context.sandbox.checkPermission(path, PermissionKind.Read)) {
      return failure(new PermissionDenied(path, PermissionKind.Read));
    }

    let entries: ListingEntry[];
    if (targetStats.isDirectory()) {
      let names: string[];
      try {
        names = readdirSync(path);
      } catch (error) {
        return failure(
          new FileSystemError(
            `Permission denied reading directory: ${path} (${errorMessage(error)})`,
            "read",
            path
          )
        );
      }
      entries = names
        .filter(name => flags.has("all") || !name.startsWith("."))
        .map(name => ({ name, stats: safeLstat(join(path, name)) }))
        .sort(compareEntries);
    } else {
      entries = [{ name: basename(path), stats: targetStats }];
    }

    if (flags.has("long")) {
      writeLongFormat(entries, context);
    } else {
      for (const entry of entries) {
        context.output.write(renderName(entry, context));
      }
    }
    return SUCCESS;
  },
};
