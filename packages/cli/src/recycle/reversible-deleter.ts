// pattern: Imperative Shell
// Soft delete: paths are moved into the recycle directory under a
// collision-free name instead of being destroyed.

import { basename, extname, join } from "node:path";

import { isSameOrDescendant } from "../sandbox/path-sandbox.js";
import { DeleteFailed, errnoCode, errorMessage } from "../utils/errors.js";
import { fail, type OperationResult, succeed } from "../utils/result.js";

import { nodeRecycleFileOps, type RecycleFileOps } from "./file-ops.js";

import type { SandboxConfig } from "../sandbox/config.js";
import type { RecycleEntry, ResolvedPath } from "../sandbox/types.js";
import type { Logger } from "pino";

/**
 * Split a base name into stem and last extension: `a.tar.gz` gives
 * `a.tar` and `.gz`; `.bashrc` has no extension.
 */
export function splitExtension(name: string): { stem: string; ext: string } {
  const ext = extname(name);
  return { stem: name.slice(0, name.length - ext.length), ext };
}

export class ReversibleDeleter {
  private readonly config: SandboxConfig;
  private readonly logger: Logger;
  private readonly fs: RecycleFileOps;

  constructor(
    config: SandboxConfig,
    logger: Logger,
    fileOps: RecycleFileOps = nodeRecycleFileOps
  ) {
    this.config = config;
    this.logger = logger.child({ component: "reversible-deleter" });
    this.fs = fileOps;
  }

  /**
   * Move `path` into the recycle directory. `path` must come from
   * PathSandbox.resolve.
   */
  delete(path: ResolvedPath): OperationResult<RecycleEntry, DeleteFailed> {
    // Read once: a toggle between commands must not affect this call halfway.
    const dryRun = this.config.dryRun;
    const { recycleDir, allowedRoot } = this.config;

    if (path === allowedRoot || isSameOrDescendant(recycleDir, path)) {
      return fail(
        new DeleteFailed(
          path,
          "refusing to delete the allowed root or the recycle directory"
        )
      );
    }
    if (isSameOrDescendant(path, recycleDir)) {
      return fail(
        new DeleteFailed(path, "path is already in the recycle directory")
      );
    }
    if (!this.fs.exists(path)) {
      return fail(new DeleteFailed(path, "no such file or directory", "ENOENT"));
    }

    const name = this.nextFreeName(basename(path));
    const entry: RecycleEntry = {
      originalPath: path,
      recyclePath: join(recycleDir, name),
      name,
      dryRun,
    };

    if (dryRun) {
      this.logger.info(
        { path, recyclePath: entry.recyclePath },
        `DRY RUN: Would move ${path} to recycle bin`
      );
      return succeed(entry);
    }

    const moved = this.move(path, entry.recyclePath);
    if (!moved.success) {
      this.logger.error(
        { path, code: moved.error.code, reason: moved.error.reason },
        `Failed to delete ${path}`
      );
      return moved;
    }

    this.logger.info(
      { path, recyclePath: entry.recyclePath },
      `Moved ${path} to recycle bin as ${entry.recyclePath}`
    );
    return succeed(entry);
  }

  /**
   * First unused name for `baseName` in the recycle directory: the name
   * itself, then `stem_1.ext`, `stem_2.ext`, ...
   */
  nextFreeName(baseName: string): string {
    const { stem, ext } = splitExtension(baseName);
    let candidate = baseName;
    let counter = 1;
    while (this.fs.exists(join(this.config.recycleDir, candidate))) {
      candidate = `${stem}_${counter}${ext}`;
      counter++;
    }
    return candidate;
  }

  private move(
    source: string,
    dest: string
  ): OperationResult<void, DeleteFailed> {
    try {
      this.fs.rename(source, dest);
      return succeed(undefined);
    } catch (error) {
      const code = errnoCode(error);
      if (code !== "EXDEV") {
        return fail(new DeleteFailed(source, errorMessage(error), code));
      }
    }

    this.logger.debug(
      { source, dest },
      "Recycle directory is on another volume, copying instead"
    );
    return this.copyThenRemove(source, dest);
  }

  private copyThenRemove(
    source: string,
    dest: string
  ): OperationResult<void, DeleteFailed> {
    const isDirectory = this.fs.isDirectory(source);

    try {
      this.fs.copy(source, dest);
    } catch (error) {
      this.discardCopy(dest);
      return fail(
        new DeleteFailed(
          source,
          `copy to recycle directory failed: ${errorMessage(error)}`,
          errnoCode(error)
        )
      );
    }

    try {
      this.fs.remove(source);
    } catch (error) {
      if (!isDirectory) {
        // Unlinking a file is all-or-nothing, so the original is intact.
        this.discardCopy(dest);
        return fail(
          new DeleteFailed(
            source,
            `could not remove original after copying: ${errorMessage(error)}`,
            errnoCode(error)
          )
        );
      }
      // Part of the directory may already be gone; the copy is the only
      // complete version, so it stays.
      return fail(
        new DeleteFailed(
          source,
          `original only partially removed, complete copy kept at ${dest}: ${errorMessage(error)}`,
          errnoCode(error)
        )
      );
    }

    return succeed(undefined);
  }

  private discardCopy(dest: string): void {
    try {
      this.fs.remove(dest);
    } catch (error) {
      this.logger.error(
        { dest, err: error },
        "Could not remove partial copy from recycle bin"
      );
    }
  }
}
