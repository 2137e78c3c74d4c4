// pattern: Imperative Shell

import { CLI_LOGGER } from "../_deps.js";

import { analyzeError } from "./error-analysis.js";

/**
 * Higher-order function that wraps Commander.js actions with consistent error handling
 *
 * Errors are analyzed into a user message, suggestions and an exit code. A
 * failed launch exits with the child's own code.
 */
export function withErrorHandling<T extends unknown[]>(
  action: (...args: T) => Promise<void> | void
): (...args: T) => Promise<void> {
  return async (...args: T): Promise<void> => {
    try {
      await action(...args);
    } catch (error) {
      const isDebugMode = CLI_LOGGER.isLevelEnabled("debug");

      const analyzed = analyzeError(error);

      // Empty for silent cancellation
      if (analyzed.userMessage) {
        CLI_LOGGER.error(analyzed.userMessage);
      }

      if (analyzed.suggestions.length > 0) {
        analyzed.suggestions.forEach(suggestion => {
          CLI_LOGGER.error(`  • ${suggestion}`);
        });
      }

      if (isDebugMode) {
        CLI_LOGGER.debug("Technical error details:");
        CLI_LOGGER.debug(analyzed.technicalMessage);
        if (error instanceof Error && error.stack) {
          CLI_LOGGER.debug("Stack trace:");
          CLI_LOGGER.debug(error.stack);
        }
        CLI_LOGGER.debug({ error, analyzed }, "Full error analysis");
      }

      // Ensure logs are flushed before exit
      CLI_LOGGER.flush();

      setTimeout(() => {
        process.exit(analyzed.exitCode);
      }, 100);
    }
  };
}
