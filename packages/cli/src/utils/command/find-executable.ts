// pattern: Imperative Shell

import which from "which";

/**
 * Resolve a command name against a search path. Tokens containing a slash are
 * checked in place. Returns null when nothing executable is found.
 */
export async function findExecutable(
  command: string,
  searchPath?: string
): Promise<string | null> {
  if (searchPath === undefined) {
    return which(command, { nothrow: true });
  }
  return which(command, { path: searchPath, nothrow: true });
}
