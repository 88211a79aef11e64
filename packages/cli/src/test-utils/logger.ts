// pattern: Imperative Shell

import { type Logger, pino } from "pino";

export interface CapturedLogEntry {
  level: number;
  msg: string;
  /** The whole parsed log line, bindings included */
  raw: object;
}

export interface CapturingLogger {
  logger: Logger;
  entries: () => CapturedLogEntry[];
  /** Entries at pino's warn level (40) */
  warnings: () => CapturedLogEntry[];
}

function parseLine(line: string): CapturedLogEntry {
  const parsed: unknown = JSON.parse(line);
  if (typeof parsed !== "object" || parsed === null) {
    throw new Error(`Unexpected log line: ${line}`);
  }
  return {
    level: "level" in parsed && typeof parsed.level === "number" ? parsed.level : 0,
    msg: "msg" in parsed && typeof parsed.msg === "string" ? parsed.msg : "",
    raw: parsed,
  };
}

/**
 * A pino logger that records every line in memory instead of writing it
 */
export function createCapturingLogger(): CapturingLogger {
  const lines: string[] = [];
  const logger = pino(
    { level: "trace" },
    {
      write(msg: string): void {
        lines.push(msg);
      },
    }
  );

  const entries = (): CapturedLogEntry[] => lines.map(parseLine);
  return {
    logger,
    entries,
    warnings: () => entries().filter(entry => entry.level === 40),
  };
}
