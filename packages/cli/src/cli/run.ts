// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";

import { withErrorHandling } from "./_utils/with-error-handling.js";
import { CommonArguments, HelpTextPatterns } from "./utils/command-factory.js";
import { CLI_LOGGER, createOrchestrator } from "./_deps.js";

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeRunCommand() {
  return new Command("run")
    .description("Run an app in its prefix")
    .argument(CommonArguments.appName, "Name of the app to run")
    .option(
      "--exe <path>",
      "Executable to launch instead of the remembered one (C:\\ or host path)"
    )
    .addHelpText(
      "before",
      HelpTextPatterns.beforeHelp("Launches an app under its runner.", [
        "Without --exe the last executable is used, or one is detected in",
        "the prefix's Program Files directories and remembered.",
        "If the app exits non-zero, norun exits with the same code.",
      ])
    )
    .addHelpText(
      "after",
      HelpTextPatterns.examples([
        "norun run notes",
        "norun run notes --exe 'C:\\Program Files\\Notes\\settings.exe'",
      ])
    )
    .action(
      withErrorHandling(
        async (name: string, options: { exe?: string | undefined }) => {
          const orchestrator = createOrchestrator();
          const result = await orchestrator.run(name, options.exe);

          CLI_LOGGER.info(
            { app: name, exitCode: result.exitCode, logPath: result.logPath },
            "App exited"
          );
        }
      )
    );
}
