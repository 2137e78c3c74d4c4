// pattern: Functional Core

import { Chalk, type ChalkInstance } from "chalk";
import { Transform } from "node:stream";

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

function formatErrorObject(err: unknown, chalk: ChalkInstance): string {
  if (!err || typeof err !== "object") {
    return "";
  }

  const lines: string[] = [];

  if ("message" in err && typeof err.message === "string") {
    lines.push(chalk.yellow(`    ${err.message}`));
  }

  // The nice-format serializer already trims the stack to an array of lines
  if ("stack" in err) {
    const stackLines = Array.isArray(err.stack)
      ? err.stack
      : typeof err.stack === "string"
        ? err.stack.split("\n").slice(1, 9)
        : [];

    for (const line of stackLines) {
      const trimmedLine = String(line).trim();
      if (trimmedLine) {
        lines.push(chalk.dim(chalk.yellow(`        ${trimmedLine}`)));
      }
    }
  }

  return lines.length > 0 ? `\n${lines.join("\n")}` : "";
}

/**
 * Format a single pino record to one display line
 */
export function formatLogObject(
  logObj: PinoLogObject,
  chalk: ChalkInstance
): string {
  const {
    level,
    time: _time,
    msg,
    pid: _pid,
    hostname: _hostname,
    err,
    ...extra
  } = logObj;

  delete extra["name"];

  let levelDisplay: string;
  let msgColor: ChalkInstance = chalk.reset;

  switch (level) {
    case 10: // trace
      levelDisplay = chalk.green("+");
      break;
    case 20: // debug
      levelDisplay = chalk.cyan("=");
      break;
    case 30: // info
      levelDisplay = chalk.gray(">");
      break;
    case 40: // warn
      levelDisplay = chalk.yellowBright("W");
      msgColor = chalk.yellow;
      break;
    case 50: // error
      levelDisplay = chalk.inverse.red("E");
      msgColor = chalk.red;
      break;
    case 60: // fatal
      levelDisplay = chalk.inverse.redBright("E");
      msgColor = chalk.red;
      break;
    default:
      levelDisplay = chalk.gray("  LOG  ");
  }

  const formattedMsg = msgColor(msg ?? "");
  const errorStr = err ? formatErrorObject(err, chalk) : "";
  const extraStr =
    Object.keys(extra).length > 0 ? ` ${chalk.dim(JSON.stringify(extra))}` : "";

  return `${levelDisplay} ${formattedMsg}${extraStr}${errorStr}\n`;
}

/**
 * Transform stream turning pino's newline-delimited JSON into readable lines
 */
export default function createRenderer(
  options: RendererOptions = {}
): Transform {
  const chalk = new Chalk({ level: options.colorize === false ? 0 : 1 });

  return new Transform({
    objectMode: false,
    transform(chunk: Buffer | string, _encoding, callback): void {
      const formattedLines: string[] = [];

      for (const line of chunk.toString().split("\n")) {
        if (!line.trim()) continue;
        try {
          const parsed: unknown = JSON.parse(line);
          formattedLines.push(
            isPinoLogObject(parsed)
              ? formatLogObject(parsed, chalk)
              : `${line}\n`
          );
        } catch {
          // Not JSON; pass the line through untouched
          formattedLines.push(`${line}\n`);
        }
      }

      callback(null, formattedLines.join(""));
    },
  });
}
