// pattern: Functional Core

/**
 * A path in native Windows syntax, e.g. `C:\Program Files\App\app.exe`
 */
export type WindowsPath = string & { readonly __brand: "WindowsPath" };

/**
 * A directory path resolved from the host environment
 */
export type ResolvedPath = string & { readonly __brand: "ResolvedPath" };

const WINDOWS_DRIVE_PATH = /^[A-Za-z]:\\/;

export function isWindowsPath(value: string): value is WindowsPath {
  return WINDOWS_DRIVE_PATH.test(value);
}

/**
 * Outcome of one supervised launch. A non-zero exit code is data, not an error.
 */
export interface LaunchResult {
  exitCode: number;
  logPath?: string;
}

export type Runner = "wine" | "proton";

export const RUNNERS: readonly Runner[] = ["wine", "proton"];

export function isRunner(value: string): value is Runner {
  return RUNNERS.some(runner => runner === value);
}
