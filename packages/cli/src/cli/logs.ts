// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";

import { withErrorHandling } from "./_utils/with-error-handling.js";
import { CommonArguments } from "./utils/command-factory.js";
import { createOrchestrator } from "./_deps.js";

import type { LogPaths } from "../runner/orchestrator/index.js";

export function formatLogPaths(paths: LogPaths): string {
  return [
    `Log directory: ${paths.logDir}`,
    `Install log: ${paths.installLog ?? "(none yet)"}`,
    `Run log: ${paths.runLog ?? "(none yet)"}`,
  ].join("\n");
}

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeLogsCommand() {
  return new Command("logs")
    .description("Show where an app's logs are written")
    .argument(CommonArguments.appName, "Name of the app")
    .action(
      withErrorHandling(async (name: string) => {
        const orchestrator = createOrchestrator();
        await orchestrator.loadApp(name);

        // eslint-disable-next-line no-console
        console.log(formatLogPaths(orchestrator.logPaths(name)));
      })
    );
}
