#!/usr/bin/env node
// pattern: Imperative Shell

import { getDefaultLogFormat, rootCommand } from "./cli/index.js";
import { isNonInteractive } from "./cli/_globals.js";
import { initializeLogger } from "./logger/index.js";

// Errors raised while commander parses arguments are logged with the default
// format; the preAction hook re-initializes from the parsed flags
initializeLogger(getDefaultLogFormat(), isNonInteractive());

await rootCommand.parseAsync(process.argv);
