// pattern: Functional Core
// Types shared by the sandbox core: the confined path brand, permission
// kinds, and the record a reversible delete produces.

import { brandedString } from "@coderspirit/nominal-typebox";
import { type Static } from "@sinclair/typebox";

export const ResolvedPath = brandedString<"ResolvedPath">({
  description:
    "A canonical absolute path that lies inside the allowed root at resolution time.",
});
export type ResolvedPath = Static<typeof ResolvedPath>;

/**
 * Kinds of access the advisory permission check understands
 */
export enum PermissionKind {
  Read = "read",
  Write = "write",
  /** Write access on the target and on its parent directory */
  Delete = "delete",
}

/**
 * What a reversible delete did, or would have done in dry-run mode
 */
export interface RecycleEntry {
  /** Where the path lived before the delete */
  originalPath: ResolvedPath;
  /** Where the path lives now, inside the recycle directory */
  recyclePath: string;
  /** Base name inside the recycle directory, including any `_<n>` suffix */
  name: string;
  /** True when nothing was moved */
  dryRun: boolean;
}

/**
 * Options accepted when building a SandboxConfig
 */
export interface SandboxOptions {
  /** Confinement boundary; resolved against `baseDir` when relative */
  allowedRoot: string;
  /** Recycle directory; resolved against the allowed root when relative */
  recycleBin?: string;
  dryRun?: boolean;
  safeMode?: boolean;
  /** Directory relative roots are resolved against (defaults to process.cwd()) */
  baseDir?: string;
}
