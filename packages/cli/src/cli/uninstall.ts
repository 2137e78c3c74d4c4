// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";

import { promptForConfirmation } from "../cli-helpers/interactive-prompts.js";
import { UserCancellationError } from "../utils/errors.js";

import { withErrorHandling } from "./_utils/with-error-handling.js";
import {
  CommonArguments,
  CommonOptions,
  HelpTextPatterns,
} from "./utils/command-factory.js";
import { createOrchestrator } from "./_deps.js";

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeUninstallCommand() {
  return new Command("uninstall")
    .description("Remove an app with its prefix, files and logs")
    .argument(CommonArguments.appName, "Name of the app to remove")
    .option(...CommonOptions.yes)
    .addHelpText(
      "before",
      HelpTextPatterns.beforeHelp("Deletes everything norun stored for an app.", [
        "You will be asked for confirmation unless --yes is given.",
        "In non-interactive mode, --yes is required.",
      ])
    )
    .action(
      withErrorHandling(
        async (name: string, options: { yes?: boolean | undefined }) => {
          const orchestrator = createOrchestrator();
          // Fails with AppNotFoundError before prompting
          const config = await orchestrator.loadApp(name);

          if (!options.yes) {
            const confirmed = await promptForConfirmation(
              `Remove '${name}' and its prefix at ${config.prefix}?`
            );
            if (!confirmed) {
              throw new UserCancellationError("Uninstall cancelled", false);
            }
          }

          await orchestrator.uninstallApp(name);
          // eslint-disable-next-line no-console
          console.log(`Removed app: ${name}`);
        }
      )
    );
}
