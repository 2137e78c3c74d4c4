// pattern: Imperative Shell

import { Command, Option } from "@commander-js/extra-typings";

import {
  LOG_FORMATS,
  LOG_LEVELS,
  type LogFormat,
  type LogLevel,
} from "../logger/index.js";

import { CLI_LOGGER, initializeLogger, setCliLogLevel } from "./_deps.js";
import { isNonInteractive, setNonInteractive } from "./_globals.js";
import { makeAddCommand } from "./add.js";
import { makeDiagCommand } from "./diag.js";
import { makeLogsCommand } from "./logs.js";
import { makeLsCommand } from "./ls.js";
import { makeOpenCommand } from "./open.js";
import { makeRunCommand } from "./run.js";
import { makeUninstallCommand } from "./uninstall.js";

function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some(level => level === value);
}

function isLogFormat(value: string): value is LogFormat {
  return LOG_FORMATS.some(format => format === value);
}

function parseLogLevel(value: string): LogLevel {
  if (!isLogLevel(value)) {
    throw new Error(
      `Invalid log level: ${value}. Valid levels are: ${LOG_LEVELS.join(", ")}`
    );
  }
  return value;
}

function parseLogFormat(value: string): LogFormat {
  if (!isLogFormat(value)) {
    throw new Error(
      `Invalid log format: ${value}. Valid formats are: ${LOG_FORMATS.join(", ")}`
    );
  }
  return value;
}

// Determine defaults based on environment
function getDefaultLogLevel(): LogLevel {
  const envLevel = process.env["NORUN_LOG_LEVEL"];
  return envLevel && isLogLevel(envLevel) ? envLevel : "info";
}

export function getDefaultLogFormat(): LogFormat {
  return isNonInteractive() ? "json" : "nice";
}

export const rootCommand = new Command("norun")
  .version("0.1.0")
  .description("Run Windows apps under Wine or Proton, optionally sandboxed")
  .addOption(
    new Option("-l, --log-level <level>", "Set log level")
      .choices(LOG_LEVELS)
      .default(getDefaultLogLevel())
      .argParser(parseLogLevel)
  )
  .addOption(
    new Option("--non-interactive", "Disable interactive features").default(
      isNonInteractive()
    )
  )
  .addOption(
    new Option("-f, --format <format>", "Log output format")
      .choices(LOG_FORMATS)
      .default(getDefaultLogFormat())
      .argParser(parseLogFormat)
  )
  .hook("preAction", thisCommand => {
    const { logLevel, format, nonInteractive } = thisCommand.opts();

    setNonInteractive(nonInteractive);
    initializeLogger(format, nonInteractive);
    setCliLogLevel(logLevel);
    CLI_LOGGER.debug(
      `Log level configured to: ${logLevel}, format: ${format}, non-interactive: ${nonInteractive}`
    );
  })
  .addCommand(makeAddCommand())
  .addCommand(makeRunCommand())
  .addCommand(makeOpenCommand())
  .addCommand(makeLsCommand())
  .addCommand(makeUninstallCommand())
  .addCommand(makeLogsCommand())
  .addCommand(makeDiagCommand());
