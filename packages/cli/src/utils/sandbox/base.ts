// pattern: Mixed (unavoidable)
// Abstract base class for sandbox implementations. While it defines pure interfaces,
// concrete implementations need to probe the host for their binary.

import type {
  SandboxArgs,
  SandboxContext,
  SandboxPolicy,
} from "./types.js";
import type { Logger } from "pino";

/**
 * Abstract base class for platform-specific sandbox implementations.
 * Holds the policy and host context a launch was built for.
 */
export abstract class SandboxImplementation {
  protected logger: Logger;
  protected policy: SandboxPolicy;
  protected context: SandboxContext;

  constructor(logger: Logger, policy: SandboxPolicy, context: SandboxContext) {
    this.logger = logger;
    this.policy = policy;
    this.context = context;
  }

  /**
   * Wrap a command and its arguments in the sandbox invocation
   */
  abstract buildSandboxArgs(command: string, args: string[]): SandboxArgs;

  /**
   * Whether the sandbox binary is available. Call before buildSandboxArgs.
   */
  abstract validate(): Promise<boolean>;

  /**
   * Get a human-readable name for this sandbox implementation
   */
  abstract get name(): string;
}
