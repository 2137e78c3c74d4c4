// pattern: Imperative Shell
// Reports which external programs norun can find

import { Command } from "@commander-js/extra-typings";

import { formatToolReport } from "../diagnostics/index.js";
import { isSandboxSupported } from "../utils/sandbox/index.js";

import { withErrorHandling } from "./_utils/with-error-handling.js";
import { CLI_LOGGER, createOrchestrator } from "./_deps.js";

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeDiagCommand() {
  return new Command("diag")
    .description("Check for wine, winetricks, umu-run and bubblewrap")
    .option("--json", "Output the report as JSON")
    .action(
      withErrorHandling(async (options: { json?: boolean | undefined }) => {
        CLI_LOGGER.debug("Looking up external tools...");
        const tools = await createOrchestrator().doctor();

        if (options.json) {
          process.stdout.write(
            `${JSON.stringify({ sandboxSupported: isSandboxSupported(), tools }, null, 2)}\n`
          );
          return;
        }

        // eslint-disable-next-line no-console
        console.log(formatToolReport(tools));
        if (!isSandboxSupported()) {
          // eslint-disable-next-line no-console
          console.log(`Sandboxing is not supported on ${process.platform}`);
        }
      })
    );
}
