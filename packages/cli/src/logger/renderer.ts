// pattern: Functional Core

import chalk, { Chalk, type ChalkInstance } from "chalk";
import { Transform } from "node:stream";

// Pino log object interface
interface PinoLogObject {
  level: number;
  time?: number;
  pid?: number;
  hostname?: string;
  msg?: string;
  [key: string]: unknown;
}

interface RendererOptions {
  colorize?: boolean;
}

function isPinoLogObject(value: unknown): value is PinoLogObject {
  return (
    typeof value === "object" &&
    value !== null &&
    "level" in value &&
    typeof value.level === "number"
  );
}

// Format error object with stack trace
function formatErrorObject(err: unknown, colors: ChalkInstance): string {
  if (!err || typeof err !== "object") {
    return "";
  }

  const lines: string[] = [];

  if ("message" in err && typeof err.message === "string") {
    lines.push(colors.yellow(`    ${err.message}`));
  }

  // Stack arrives either as a string (json serializer) or pre-split lines
  if ("stack" in err) {
    const stackLines =
      typeof err.stack === "string"
        ? err.stack.split("\n").slice(1, 9)
        : Array.isArray(err.stack)
          ? err.stack
          : [];

    for (const line of stackLines) {
      const trimmedLine = String(line).trim();
      if (trimmedLine) {
        lines.push(colors.dim(colors.yellow(`        ${trimmedLine}`)));
      }
    }
  }

  return lines.length > 0 ? `\n${lines.join("\n")}` : "";
}

/**
 * Format a single pino log object as one short line
 */
export function formatLogObject(
  logObj: PinoLogObject,
  colors: ChalkInstance
): string {
  const {
    level,
    msg,
    err,
    time: _time,
    pid: _pid,
    hostname: _hostname,
    name: _name,
    component,
    ...extra
  } = logObj;

  let levelDisplay: string;
  let msgColor: ChalkInstance = colors.reset;

  switch (level) {
    case 10: // trace
      levelDisplay = colors.green("+");
      break;
    case 20: // debug
      levelDisplay = colors.cyan("=");
      break;
    case 30: // info
      levelDisplay = colors.gray(">");
      break;
    case 40: // warn
      levelDisplay = colors.yellowBright("W");
      msgColor = colors.yellow;
      break;
    case 50: // error
      levelDisplay = colors.inverse.red("E");
      msgColor = colors.red;
      break;
    case 60: // fatal
      levelDisplay = colors.inverse.redBright("E");
      msgColor = colors.red;
      break;
    default:
      levelDisplay = colors.gray("  LOG  ");
  }

  const componentStr =
    typeof component === "string" ? `${colors.dim(`[${component}]`)} ` : "";
  const formattedMsg = msgColor(msg ?? "");
  const errorStr = err ? formatErrorObject(err, colors) : "";
  const extraStr =
    Object.keys(extra).length > 0 ? ` ${colors.dim(JSON.stringify(extra))}` : "";

  return `${levelDisplay} ${componentStr}${formattedMsg}${extraStr}${errorStr}\n`;
}

// Create a pretty renderer stream like pino-pretty
export default function createRenderer(options: RendererOptions = {}): Transform {
  const colors = new Chalk({
    level: options.colorize === false ? 0 : chalk.level,
  });

  return new Transform({
    objectMode: false, // Pino sends newline-delimited JSON strings, not objects
    transform(chunk: Buffer | string, _encoding, callback) {
      const formattedLines: string[] = [];

      for (const line of chunk.toString().split("\n")) {
        if (!line.trim()) {
          continue;
        }
        try {
          const parsed: unknown = JSON.parse(line);
          formattedLines.push(
            isPinoLogObject(parsed)
              ? formatLogObject(parsed, colors)
              : `${line}\n`
          );
        } catch {
          // Not JSON: pass it through as-is
          formattedLines.push(`${line}\n`);
        }
      }

      callback(null, formattedLines.join(""));
    },
  });
}
