// pattern: Imperative Shell
// The handful of blocking filesystem calls the reversible deleter needs,
// behind an interface so cross-volume behaviour can be exercised in tests.

import { cpSync, lstatSync, renameSync, rmSync } from "node:fs";

export interface RecycleFileOps {
  /** True if anything (including a dangling symlink) exists at `path` */
  exists(path: string): boolean;
  isDirectory(path: string): boolean;
  /** Atomic same-volume move; throws EXDEV across volumes */
  rename(from: string, to: string): void;
  /** Recursive copy that never overwrites and keeps symlinks as symlinks */
  copy(from: string, to: string): void;
  /** Recursive removal; missing paths are not an error */
  remove(path: string): void;
}

export const nodeRecycleFileOps: RecycleFileOps = {
  exists(path) {
    return lstatSync(path, { throwIfNoEntry: false }) !== undefined;
  },
  isDirectory(path) {
    return lstatSync(path).isDirectory();
  },
  rename(from, to) {
    renameSync(from, to);
  },
  copy(from, to) {
    cpSync(from, to, {
      recursive: true,
      errorOnExist: true,
      force: false,
      preserveTimestamps: true,
      verbatimSymlinks: true,
    });
  },
  remove(path) {
    rmSync(path, { recursive: true, force: true });
  },
};
