// pattern: Functional Core

import { type DestinationStream, pino } from "pino";

import createRenderer from "./renderer.js";

import type { LogFormat, LogLevel } from "./types.js";

export function mapLogLevelToPinoLevel(
  logLevel: LogLevel
): pino.LevelWithSilent {
  switch (logLevel) {
    case "error":
      return "error";
    case "warn":
      return "warn";
    case "info":
      return "info";
    case "debug":
      return "debug";
    case "trace":
      return "trace";
    default:
      return "info";
  }
}

/**
 * Create the CLI logger. `nice` output goes through the chalk renderer,
 * `json` goes to stderr untouched. stdout is left alone for command output.
 */
export function createLogger(
  format: LogFormat,
  nonInteractive: boolean
): pino.Logger {
  const baseConfig: pino.LoggerOptions = {
    name: "norun",
    level: "info",
    serializers: {
      err: (err: unknown) => {
        if (!(err instanceof Error)) return err;

        if (format === "nice" && !nonInteractive) {
          return {
            message: err.message,
            stack: err.stack ? err.stack.split("\n").slice(1, 9) : undefined,
          };
        }

        return pino.stdSerializers.err(err);
      },
    },
  };

  let stream: DestinationStream;
  if (format === "nice") {
    const renderer = createRenderer({ colorize: !nonInteractive });
    renderer.pipe(process.stderr);
    stream = renderer;
  } else {
    stream = pino.destination(2);
  }

  return pino(baseConfig, stream);
}
