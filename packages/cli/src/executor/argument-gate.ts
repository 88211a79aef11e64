// pattern: Functional Core
// Pre-flight filter on raw argument strings. It only looks at the shape of
// the arguments; PathSandbox.resolve still decides every path afterwards.

import { ArgumentRejected } from "../utils/errors.js";
import { fail, type OperationResult, succeed } from "../utils/result.js";

import type { SandboxConfig } from "../sandbox/config.js";
import type { Logger } from "pino";

/** Substrings that mark an argument as dangerous (matched case-insensitively) */
export const DANGEROUS_PATTERNS: readonly string[] = [
  "../",
  "..\\",
  "~/",
  "/etc/",
  "/sys/",
  "/proc/",
];

/**
 * Find the first denylisted substring in `arg`, if any
 */
export function findDangerousPattern(arg: string): string | undefined {
  const lower = arg.toLowerCase();
  return DANGEROUS_PATTERNS.find(pattern => lower.includes(pattern));
}

export class ArgumentGate {
  private readonly config: SandboxConfig;
  private readonly logger: Logger;

  constructor(config: SandboxConfig, logger: Logger) {
    this.config = config;
    this.logger = logger.child({ component: "argument-gate" });
  }

  /**
   * Scan every argument. Hits are always logged as warnings; they only
   * reject the arguments while safe mode is on.
   */
  checkArgs(args: readonly string[]): OperationResult<void, ArgumentRejected> {
    const safeMode = this.config.safeMode;

    for (const arg of args) {
      const pattern = findDangerousPattern(arg);
      if (pattern === undefined) {
        continue;
      }

      this.logger.warn(
        { argument: arg, pattern, safeMode },
        `Potentially dangerous argument: ${arg}`
      );

      if (safeMode) {
        return fail(new ArgumentRejected(arg, pattern));
      }
    }

    return succeed(undefined);
  }

  validateArgs(args: readonly string[]): boolean {
    return this.checkArgs(args).success;
  }
}
