// pattern: Functional Core
// Defines the types for the sandboxing system. These describe the policy a
// launch runs under and the host facts it is built from, without performing
// any I/O.

/**
 * Confinement level for one launch.
 *
 * - `full` binds the user's home directory read-write
 * - `strict` hides home, exposing only the private data root and allow-listed paths
 */
export type SandboxMode = "full" | "strict";

export const SANDBOX_MODES: readonly SandboxMode[] = ["full", "strict"];

/**
 * One host path made visible inside the sandbox
 */
export interface BindDirective {
  readonly hostPath: string;
  readonly sandboxPath: string;
  readonly readOnly: boolean;
  /** Device bind; takes precedence over readOnly */
  readonly device?: boolean;
}

interface SandboxPolicyBase {
  /** Whether ~/Downloads is bound read-write when present */
  readonly allowDownloadsDir: boolean;
  /** Caller-supplied binds, appended after everything else */
  readonly extraDirectives: readonly BindDirective[];
}

export interface FullSandboxPolicy extends SandboxPolicyBase {
  readonly mode: "full";
}

export interface StrictSandboxPolicy extends SandboxPolicyBase {
  readonly mode: "strict";
}

/**
 * Immutable description of what one launch may see. Built fresh per
 * invocation by createSandboxPolicy.
 */
export type SandboxPolicy = FullSandboxPolicy | StrictSandboxPolicy;

export interface SandboxPolicyOptions {
  allowDownloadsDir?: boolean;
  extraDirectives?: BindDirective[];
}

/**
 * Host facts consulted while building isolation arguments. Injected so tests
 * can describe any host without touching the real filesystem.
 */
export interface HostProbe {
  exists(path: string): boolean;
  readonly env: Readonly<Record<string, string | undefined>>;
  readonly homeDir: string;
}

export interface SandboxContext {
  host: HostProbe;
  /** Private data root; bound read-write in strict mode */
  dataRoot: string;
}

/**
 * Arguments needed to execute a command within a sandbox
 */
export interface SandboxArgs {
  /** The sandbox executable to run */
  executable: string;
  /** Sandbox arguments, ending with `--` and the wrapped command */
  args: string[];
}

/**
 * Platform identifiers for sandbox implementations
 */
export enum SandboxPlatform {
  Linux = "linux",
  MacOS = "darwin",
  Windows = "win32",
  Unknown = "unknown",
}
