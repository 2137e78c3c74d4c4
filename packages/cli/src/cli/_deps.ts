// pattern: Imperative Shell
// Shared dependencies for CLI commands

import { FileAppConfigStore } from "../config/store.js";
import { CLI_LOGGER } from "../logger/index.js";
import { createDirectoryResolver } from "../runner/directory-resolver/index.js";
import { RunOrchestrator } from "../runner/orchestrator/index.js";
import { ProcessSupervisor } from "../runner/supervisor/index.js";
import { WinePathTranslator } from "../runner/winepath/index.js";
import { createHostProbe } from "../utils/sandbox/index.js";

export { CLI_LOGGER, initializeLogger, setCliLogLevel } from "../logger/index.js";

/**
 * Wire the orchestrator to the real host, filesystem and process table
 */
export function createOrchestrator(
  env: Record<string, string | undefined> = process.env
): RunOrchestrator {
  const dirs = createDirectoryResolver(env);
  const host = createHostProbe(env);

  CLI_LOGGER.debug({ data: dirs.data, config: dirs.config }, "Resolved directories");

  return new RunOrchestrator({
    logger: CLI_LOGGER,
    dirs,
    store: new FileAppConfigStore(dirs.appConfigs),
    launcher: new ProcessSupervisor({
      logger: CLI_LOGGER,
      host,
      dataRoot: dirs.data,
    }),
    pathTranslator: new WinePathTranslator(CLI_LOGGER),
    parentEnv: env,
  });
}
