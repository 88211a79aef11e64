// pattern: Imperative Shell
// Confines caller-supplied path strings to the allowed root. Resolution is
// synchronous on purpose: nothing can run between canonicalizing a path and
// deciding whether it is inside the root.

import {
  accessSync,
  constants,
  existsSync,
  lstatSync,
  readlinkSync,
  realpathSync,
} from "node:fs";
import { homedir } from "node:os";
import { dirname, isAbsolute, join, parse, relative, sep } from "node:path";

import { errnoCode, errorMessage, SandboxViolation } from "../utils/errors.js";
import { fail, type OperationResult, succeed } from "../utils/result.js";

import { PermissionKind, type ResolvedPath } from "./types.js";

import type { SandboxConfig } from "./config.js";
import type { Logger } from "pino";

const SEGMENT_SEPARATOR = process.platform === "win32" ? /[\\/]+/ : /\/+/;

/** Dangling links followed before giving up, as with the kernel's ELOOP */
const MAX_SYMLINK_HOPS = 40;

/**
 * Answers whether the current user has `mode` (an `fs.constants` access
 * mask) on `path`
 */
export type AccessCheck = (path: string, mode: number) => boolean;

export const nodeAccessCheck: AccessCheck = (path, mode) => {
  try {
    accessSync(path, mode);
    return true;
  } catch {
    return false;
  }
};

/**
 * True when `candidate` is `root` itself or lies beneath it. Compares whole
 * path components, so `/root2` is not inside `/root`.
 */
export function isSameOrDescendant(candidate: string, root: string): boolean {
  const rel = relative(root, candidate);
  if (rel === "") {
    return true;
  }
  if (isAbsolute(rel)) {
    return false;
  }
  return rel.split(sep)[0] !== "..";
}

/**
 * Expand a leading `~` to the user's home directory. `~user` forms are
 * left alone.
 */
export function expandHome(pathStr: string, home: string = homedir()): string {
  if (pathStr === "~") {
    return home;
  }
  if (pathStr.startsWith("~/") || pathStr.startsWith(`~${sep}`)) {
    return join(home, pathStr.slice(2));
  }
  return pathStr;
}

/**
 * Canonicalize an absolute path one segment at a time. Existing prefixes go
 * through realpath, so symlinks are followed before any later `..` is
 * applied. A dangling symlink is followed through its target; only a
 * segment with nothing at all behind it is appended as-is.
 *
 * @throws the underlying fs error for anything other than ENOENT, and an
 * ELOOP error after too many dangling links
 */
export function canonicalize(absolutePath: string): string {
  const { root: fsRoot } = parse(absolutePath);
  const pending = splitSegments(absolutePath.slice(fsRoot.length));

  let current = fsRoot;
  let hops = 0;
  for (;;) {
    const segment = pending.shift();
    if (segment === undefined) {
      break;
    }
    if (segment === "" || segment === ".") {
      continue;
    }
    if (segment === "..") {
      current = dirname(current);
      continue;
    }

    const next = join(current, segment);
    try {
      current = realpathSync.native(next);
      continue;
    } catch (error) {
      if (errnoCode(error) !== "ENOENT") {
        throw error;
      }
    }

    if (!lstatSync(next, { throwIfNoEntry: false })?.isSymbolicLink()) {
      current = next;
      continue;
    }

    hops += 1;
    if (hops > MAX_SYMLINK_HOPS) {
      throw Object.assign(
        new Error(`Too many levels of symbolic links: ${next}`),
        { code: "ELOOP" }
      );
    }
    const target = readlinkSync(next);
    if (isAbsolute(target)) {
      const targetRoot = parse(target).root;
      current = targetRoot;
      pending.unshift(...splitSegments(target.slice(targetRoot.length)));
    } else {
      // Relative targets are read from the link's own directory
      pending.unshift(...splitSegments(target));
    }
  }

  return current;
}

function splitSegments(pathStr: string): string[] {
  return pathStr.split(SEGMENT_SEPARATOR);
}

/**
 * Resolves user-supplied paths against the allowed root and answers
 * advisory permission questions. Also holds the session working directory
 * that relative paths are joined to.
 */
export class PathSandbox {
  private readonly config: SandboxConfig;
  private readonly logger: Logger;
  private readonly access: AccessCheck;
  private workingDir: ResolvedPath;

  constructor(
    config: SandboxConfig,
    logger: Logger,
    access: AccessCheck = nodeAccessCheck
  ) {
    this.config = config;
    this.access = access;
    this.logger = logger.child({ component: "path-sandbox" });
    this.workingDir = config.allowedRoot;
  }

  get allowedRoot(): ResolvedPath {
    return this.config.allowedRoot;
  }

  /** Directory relative paths are resolved against */
  get cwd(): ResolvedPath {
    return this.workingDir;
  }

  /**
   * Turn any path string into a canonical path inside the allowed root.
   */
  resolve(pathStr: string): OperationResult<ResolvedPath, SandboxViolation> {
    const root = this.config.allowedRoot;
    const expanded = expandHome(pathStr);
    // Plain concatenation: path.join would collapse `link/..` before the
    // symlink is looked at.
    const absolute = isAbsolute(expanded)
      ? expanded
      : `${this.workingDir}${sep}${expanded}`;

    let candidate: string;
    try {
      candidate = canonicalize(absolute);
    } catch (error) {
      const code = errnoCode(error);
      const violation = new SandboxViolation(
        pathStr,
        root,
        `could not be resolved (${code ?? errorMessage(error)})`
      );
      this.logger.warn(
        { path: pathStr, code },
        "Rejected path that could not be canonicalized"
      );
      return fail(violation);
    }

    if (!isSameOrDescendant(candidate, root)) {
      this.logger.warn(
        { path: pathStr, resolved: candidate, allowedRoot: root },
        "Rejected path outside allowed root"
      );
      return fail(
        new SandboxViolation(
          pathStr,
          root,
          "is outside the allowed root",
          candidate
        )
      );
    }

    this.logger.trace({ path: pathStr, resolved: candidate }, "Resolved path");
    return succeed(candidate as ResolvedPath);
  }

  /**
   * Advisory permission check. The operation that follows can still fail
   * with an OS permission error.
   */
  checkPermission(path: ResolvedPath, kind: PermissionKind): boolean {
    if (!existsSync(path)) {
      return kind === PermissionKind.Write;
    }

    switch (kind) {
      case PermissionKind.Read:
        return this.access(path, constants.R_OK);
      case PermissionKind.Write:
        return this.access(path, constants.W_OK);
      case PermissionKind.Delete:
        return (
          this.access(path, constants.W_OK) &&
          this.access(dirname(path), constants.W_OK)
        );
      default:
        return false;
    }
  }

  /**
   * Move the session to another directory. The caller has already checked
   * that it exists and is a readable directory.
   */
  changeDirectory(path: ResolvedPath): void {
    this.logger.debug({ from: this.workingDir, to: path }, "Changed directory");
    this.workingDir = path;
  }

  /**
   * Render a confined path relative to the root: `/` for the root itself,
   * `/sub/dir` below it.
   */
  displayPath(path: ResolvedPath): string {
    const rel = relative(this.config.allowedRoot, path);
    return `/${rel.split(sep).join("/")}`;
  }
}

