// pattern: Mixed (unavoidable)
// Bubblewrap sandbox implementation for Linux.
// Builds command-line arguments for bwrap while also performing validation.

import { findExecutable } from "../command/find-executable.js";

import { SandboxImplementation } from "./base.js";
import { buildIsolationArgs } from "./policy.js";

import type { SandboxArgs } from "./types.js";

/**
 * Bubblewrap (bwrap) sandbox implementation for Linux.
 * Unshares every namespace except the network and exposes the host read-only,
 * with read-write binds chosen by the policy mode.
 */
export class BwrapSandbox extends SandboxImplementation {
  private bwrapPath: string | null = null;
  private validated = false;

  readonly name = "bubblewrap";

  buildSandboxArgs(command: string, args: string[]): SandboxArgs {
    const bwrapArgs = buildIsolationArgs(this.policy, this.context, this.logger);

    bwrapArgs.push("--");
    bwrapArgs.push(command);
    bwrapArgs.push(...args);

    return {
      executable: this.bwrapPath ?? "bwrap",
      args: bwrapArgs,
    };
  }

  async validate(): Promise<boolean> {
    if (this.validated) {
      return this.bwrapPath !== null;
    }

    this.bwrapPath = await findExecutable(
      "bwrap",
      this.context.host.env["PATH"]
    );
    this.validated = true;

    if (this.bwrapPath === null) {
      this.logger.debug("Bwrap not found in PATH");
      return false;
    }

    this.logger.debug({ bwrapPath: this.bwrapPath }, "Found bwrap binary");
    return true;
  }
}
