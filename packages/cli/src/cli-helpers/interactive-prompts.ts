// pattern: Imperative Shell

import { confirm } from "@inquirer/prompts";

import { isNonInteractive } from "../cli/_globals.js";
import { UserCancellationError } from "../utils/errors.js";

/**
 * TTY detection utility
 * @returns True if we're in an interactive terminal environment
 */
export function isInteractiveEnvironment(): boolean {
  return !isNonInteractive();
}

/**
 * Prompts user for confirmation with a yes/no question, defaulting to no
 */
export async function promptForConfirmation(message: string): Promise<boolean> {
  if (!isInteractiveEnvironment()) {
    throw new UserCancellationError(
      "Cannot prompt for input in non-interactive environment; pass --yes",
      false
    );
  }

  return await confirm({
    message,
    default: false,
  });
}
