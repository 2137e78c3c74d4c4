// pattern: Imperative Shell
// Factory for creating the sandbox implementation for the current platform.

import { SandboxUnavailableError } from "../errors.js";

import { SandboxImplementation } from "./base.js";
import { BwrapSandbox } from "./bwrap.js";
import { getPlatform, isSandboxSupported } from "./platform.js";

import type { SandboxContext, SandboxPolicy } from "./types.js";
import type { Logger } from "pino";

export const INSTALL_BWRAP_HINT =
  "Install bubblewrap (the 'bwrap' command) from your distribution's packages, or run without sandboxing";

/**
 * Create a sandbox implementation appropriate for the current platform
 *
 * @throws SandboxUnavailableError when the platform cannot sandbox at all
 */
export function createSandbox(
  logger: Logger,
  policy: SandboxPolicy,
  context: SandboxContext,
  platform: NodeJS.Platform = process.platform
): SandboxImplementation {
  if (!isSandboxSupported(platform)) {
    throw new SandboxUnavailableError(
      `Sandboxing is not supported on platform '${getPlatform(platform)}'`
    );
  }

  logger.debug({ mode: policy.mode }, "Using bubblewrap sandbox for Linux");
  return new BwrapSandbox(logger, policy, context);
}
