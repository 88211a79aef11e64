// pattern: Functional Core

import { type Logger, type LoggerOptions, pino } from "pino";

import createRenderer from "./renderer.js";

import type { LogFormat } from "./types.js";

/**
 * Error serializer for the `err` key. On an interactive terminal only the
 * message and the top of the stack are kept; JSON output gets pino's full
 * serialization.
 */
function errorSerializer(compact: boolean): (err: unknown) => unknown {
  return err => {
    if (!(err instanceof Error)) {
      return err;
    }
    if (!compact) {
      return pino.stdSerializers.err(err);
    }
    return {
      message: err.message,
      stack: err.stack?.split("\n").slice(1, 9),
    };
  };
}

/**
 * Build the CLI's pino logger. `nice` renders short lines through the
 * renderer transform, `json` writes pino's own lines; both go to stderr so
 * command output on stdout stays clean.
 */
export function createLogger(format: LogFormat, nonInteractive: boolean): Logger {
  const options: LoggerOptions = {
    name: "sandshell",
    level: "info",
    serializers: {
      err: errorSerializer(format === "nice" && !nonInteractive),
    },
  };

  if (format === "json") {
    return pino(options, pino.destination(2));
  }

  const renderer = createRenderer({ colorize: !nonInteractive });
  renderer.pipe(process.stderr);
  return pino(options, renderer);
}
