// pattern: Imperative Shell

import type { ShellOutput } from "../../commands/types.js";

/**
 * Command output goes to stdout; logs go to stderr
 */
export const consoleOutput: ShellOutput = {
  write(line: string): void {
    // eslint-disable-next-line no-console
    console.log(line);
  },
};
