// pattern: Imperative Shell

import fg from "fast-glob";
import { join } from "node:path";

import { pickBestExecutable } from "./scoring.js";

import type { WindowsPath } from "../types/index.js";
import type { Logger } from "pino";

export {
  compareExeCandidates,
  isDenied,
  pickBestExecutable,
  scoreCandidate,
} from "./scoring.js";
export type { ExeCandidate, ExeScore } from "./scoring.js";

const SCAN_ROOTS = ["Program Files", "Program Files (x86)"] as const;

/**
 * Render a drive_c-relative path as a `C:\` path
 */
export function toDriveCPath(relativePath: string): WindowsPath {
  return `C:\\${relativePath.replace(/\//g, "\\")}` as WindowsPath;
}

/**
 * Find the most plausible GUI entry point installed in a prefix. Only the
 * Program Files trees are scanned. Returns null when nothing qualifies.
 */
export async function detectExecutable(
  prefixRoot: string,
  logger?: Logger
): Promise<WindowsPath | null> {
  const driveC = join(prefixRoot, "drive_c");
  const candidates: string[] = [];

  for (const root of SCAN_ROOTS) {
    const matches = await fg("**/*.exe", {
      cwd: join(driveC, root),
      caseSensitiveMatch: false,
      dot: true,
      onlyFiles: true,
      followSymbolicLinks: false,
      suppressErrors: true,
    });
    candidates.push(...matches.map(match => `${root}/${match}`));
  }

  logger?.debug(
    { prefixRoot, candidateCount: candidates.length },
    "Scanned prefix for executables"
  );

  const best = pickBestExecutable(candidates);
  return best === null ? null : toDriveCPath(best);
}
