// pattern: Functional Core
// Ranking of executable candidates found inside a prefix.

import { posix } from "node:path";

const DENIED_NAMES: ReadonlySet<string> = new Set([
  "iexplore.exe",
  "wmplayer.exe",
  "notepad.exe",
  "wordpad.exe",
  "explorer.exe",
  "rundll32.exe",
  "regedit.exe",
  "taskmgr.exe",
  "mshta.exe",
  "cmd.exe",
  "powershell.exe",
  "conhost.exe",
  "winecfg.exe",
  "uninstaller.exe",
  "setup.exe",
]);

const DENIED_DIR_TOKENS: readonly string[] = [
  "Internet Explorer",
  "Windows Media Player",
  "Windows NT",
  "Common Files",
];

const PREFERRED_NAMES: ReadonlySet<string> = new Set([
  "7zfm.exe",
  "notepad++.exe",
  "launcher.exe",
  "start.exe",
  "app.exe",
]);

/**
 * Sort key, compared left to right. Lower is better.
 */
export interface ExeScore {
  preferred: 0 | 1;
  depth: number;
  length: number;
}

export interface ExeCandidate {
  /** Path relative to drive_c, forward slashes */
  path: string;
  score: ExeScore;
}

function baseName(path: string): string {
  return posix.basename(path).toLowerCase();
}

/**
 * Whether a candidate is a system or uninstaller binary to ignore
 */
export function isDenied(path: string): boolean {
  if (DENIED_NAMES.has(baseName(path))) {
    return true;
  }
  return DENIED_DIR_TOKENS.some(token => path.includes(token));
}

export function scoreCandidate(path: string): ExeCandidate {
  return {
    path,
    score: {
      preferred: PREFERRED_NAMES.has(baseName(path)) ? 0 : 1,
      depth: path.split("/").length,
      length: path.length,
    },
  };
}

/**
 * Total order on candidates: preferred name, then shallower, then shorter,
 * then plain code-unit order of the path.
 */
export function compareExeCandidates(a: ExeCandidate, b: ExeCandidate): number {
  return (
    a.score.preferred - b.score.preferred ||
    a.score.depth - b.score.depth ||
    a.score.length - b.score.length ||
    (a.path < b.path ? -1 : a.path > b.path ? 1 : 0)
  );
}

/**
 * Pick the best candidate from drive_c-relative paths, or null if every path
 * is denied
 */
export function pickBestExecutable(paths: readonly string[]): string | null {
  const ranked = paths
    .filter(path => !isDenied(path))
    .map(scoreCandidate)
    .sort(compareExeCandidates);

  return ranked[0]?.path ?? null;
}
