// pattern: Imperative Shell

import { Command } from "@commander-js/extra-typings";
import Table from "cli-table3";

import { withErrorHandling } from "./_utils/with-error-handling.js";
import { createOrchestrator } from "./_deps.js";

import type { AppConfig } from "../config/types/app-config.js";

export const APP_TABLE_HEAD = [
  "Name",
  "Runner",
  "Profile",
  "Sandbox",
  "Executable",
] as const;

export function formatAppRow(config: AppConfig): string[] {
  return [
    config.name,
    config.runner,
    config.profile,
    config.sandbox ? config.sandboxMode : "off",
    config.lastExe ?? "-",
  ];
}

// eslint-disable-next-line @typescript-eslint/explicit-function-return-type
export function makeLsCommand() {
  return new Command("ls")
    .description("List configured apps")
    .option("--json", "Output app configs as JSON instead of a table")
    .action(
      withErrorHandling(async (options: { json?: boolean | undefined }) => {
        const orchestrator = createOrchestrator();
        const configs: AppConfig[] = [];
        for (const name of await orchestrator.listApps()) {
          configs.push(await orchestrator.loadApp(name));
        }

        if (options.json) {
          process.stdout.write(`${JSON.stringify(configs, null, 2)}\n`);
          return;
        }

        if (configs.length === 0) {
          process.stdout.write("No apps configured.\n");
          return;
        }

        const table = new Table({
          head: [...APP_TABLE_HEAD],
          wordWrap: true,
        });
        for (const config of configs) {
          table.push(formatAppRow(config));
        }

        // eslint-disable-next-line no-console
        console.log(table.toString());
      })
    );
}
