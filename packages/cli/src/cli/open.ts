// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";

import { withErrorHandling } from "./_utils/with-error-handling.js";
import { CommonArguments, HelpTextPatterns } from "./utils/command-factory.js";
import { createOrchestrator } from "./_deps.js";

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeOpenCommand() {
  return new Command("open")
    .description("Add and install an app straight from an installer file")
    .argument(CommonArguments.installer, "Installer to open")
    .addHelpText(
      "before",
      HelpTextPatterns.beforeHelp(
        "Names the app after the installer file and uses default settings:",
        ["general profile, wine runner, no sandbox."]
      )
    )
    .action(
      withErrorHandling(async (installer: string) => {
        const orchestrator = createOrchestrator();
        const config = await orchestrator.openInstaller(installer);

        // eslint-disable-next-line no-console
        console.log(`Added app: ${config.name}`);
        // eslint-disable-next-line no-console
        console.log(`Run it with: norun run ${config.name}`);
      })
    );
}
