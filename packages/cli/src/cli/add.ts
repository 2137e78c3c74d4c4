// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";

import { DEFAULT_PROFILE, listProfiles } from "../config/profiles.js";
import { parseSandboxMode } from "../utils/sandbox/index.js";

import { withErrorHandling } from "./_utils/with-error-handling.js";
import {
  CommonArguments,
  CommonOptions,
  HelpTextPatterns,
} from "./utils/command-factory.js";
import { CLI_LOGGER, createOrchestrator } from "./_deps.js";

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeAddCommand() {
  return new Command("add")
    .description("Add an app: create its prefix and run its installer")
    .argument(CommonArguments.appName, "Name for the new app")
    .argument(
      CommonArguments.installer,
      "Installer or portable executable (globs and ~ allowed)"
    )
    .option(
      "-p, --profile <profile>",
      `Profile: ${listProfiles().join(", ")}`,
      DEFAULT_PROFILE
    )
    .option("-r, --runner <runner>", "Runner: auto, wine or proton", "auto")
    .option("--portable", "Copy the executable instead of running an installer")
    .option("--sandbox", "Run the app inside a bubblewrap sandbox")
    .option(CommonOptions.sandboxMode[0], CommonOptions.sandboxMode[1], "full")
    .option("--sandbox-install", "Also sandbox the installer")
    .option(
      "--installer-sandbox-mode <mode>",
      "Sandbox mode for the installer (default: full)"
    )
    .addHelpText(
      "after",
      HelpTextPatterns.examples([
        "norun add notes ~/Downloads/notes-setup.exe",
        "norun add game '~/Downloads/Game*.exe' --profile games --sandbox --sandbox-mode strict",
        "norun add tool ./tool.exe --portable",
      ])
    )
    .action(
      withErrorHandling(
        async (
          name: string,
          installer: string,
          options: {
            profile: string;
            runner: string;
            portable?: boolean | undefined;
            sandbox?: boolean | undefined;
            sandboxMode: string;
            sandboxInstall?: boolean | undefined;
            installerSandboxMode?: string | undefined;
          }
        ) => {
          const installerSandboxMode =
            options.installerSandboxMode === undefined
              ? undefined
              : parseSandboxMode(options.installerSandboxMode);

          const orchestrator = createOrchestrator();
          const installed = await orchestrator.addApp(name, installer, {
            profile: options.profile,
            runner: options.runner,
            sandbox: options.sandbox ?? false,
            sandboxMode: options.sandboxMode,
            portable: options.portable ?? false,
            sandboxInstall: options.sandboxInstall ?? false,
            ...(installerSandboxMode && { installerSandboxMode }),
          });

          CLI_LOGGER.info(
            { app: installed.name, runner: installed.runner },
            "App added"
          );
          // eslint-disable-next-line no-console
          console.log(`Added app: ${installed.name}`);
        }
      )
    );
}
