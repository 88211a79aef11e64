// pattern: Imperative Shell

import { CLI_LOGGER } from "../_deps.js";

import { analyzeError } from "./error-analysis.js";

/**
 * Wraps a Commander action so that anything it throws (bad settings, an
 * unusable root) is logged as a user message plus suggestions and the
 * process exits with status 1
 */
export function withErrorHandling<T extends unknown[]>(
  action: (...args: T) => Promise<void> | void
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      const analyzed = analyzeError(error);

      CLI_LOGGER.error(analyzed.userMessage);
      for (const suggestion of analyzed.suggestions) {
        CLI_LOGGER.error(`  • ${suggestion}`);
      }

      if (CLI_LOGGER.isLevelEnabled("debug")) {
        CLI_LOGGER.debug("Technical error details:");
        CLI_LOGGER.debug(analyzed.technicalMessage);
        if (error instanceof Error && error.stack) {
          CLI_LOGGER.debug(error.stack);
        }
      }

      CLI_LOGGER.flush();
      process.exitCode = 1;
    }
  };
}
