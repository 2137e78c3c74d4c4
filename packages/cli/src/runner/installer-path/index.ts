// pattern: Imperative Shell

import fg from "fast-glob";
import { existsSync } from "node:fs";
import { homedir } from "node:os";
import { basename, dirname, isAbsolute, join, resolve } from "node:path";

import { InstallerNotFoundError, NoGlobMatchError } from "../../utils/errors.js";

export interface InstallerPathOptions {
  homeDir?: string;
  cwd?: string;
}

export function containsGlobChars(pattern: string): boolean {
  return pattern.includes("*") || pattern.includes("?") || pattern.includes("[");
}

/**
 * Split an absolute pattern before its first segment with a wildcard. The
 * literal head becomes the glob's cwd, so `(`, `{` or `!` in directory names
 * are not read as pattern syntax.
 */
export function splitGlobPattern(pattern: string): {
  base: string;
  glob: string;
} {
  const segments = pattern.split("/");
  const firstGlob = segments.findIndex(containsGlobChars);
  if (firstGlob === -1) {
    return { base: dirname(pattern), glob: basename(pattern) };
  }
  return {
    base: segments.slice(0, firstGlob).join("/") || "/",
    glob: segments.slice(firstGlob).join("/"),
  };
}

/**
 * Expand a leading `~` to the home directory
 */
export function expandHome(rawPath: string, homeDir: string): string {
  if (rawPath === "~") {
    return homeDir;
  }
  if (rawPath.startsWith("~/")) {
    return join(homeDir, rawPath.slice(2));
  }
  return rawPath;
}

/**
 * Turn a user-supplied installer argument into an absolute path to an existing
 * file. A glob pattern takes its first match in sorted order.
 *
 * @throws NoGlobMatchError when a pattern matches nothing
 * @throws InstallerNotFoundError when the resulting path does not exist
 */
export async function resolveInstallerPath(
  rawPath: string,
  options: InstallerPathOptions = {}
): Promise<string> {
  const cwd = options.cwd ?? process.cwd();
  let candidate = expandHome(rawPath, options.homeDir ?? homedir());

  if (containsGlobChars(candidate)) {
    const pattern = isAbsolute(candidate) ? candidate : join(cwd, candidate);
    const { base, glob } = splitGlobPattern(pattern);
    const matches = (
      await fg(glob, { cwd: base, absolute: true, onlyFiles: false })
    ).sort();
    const [first] = matches;
    if (first === undefined) {
      throw new NoGlobMatchError(pattern);
    }
    candidate = first;
  }

  const installer = resolve(cwd, candidate);
  if (!existsSync(installer)) {
    throw new InstallerNotFoundError(installer);
  }
  return installer;
}
