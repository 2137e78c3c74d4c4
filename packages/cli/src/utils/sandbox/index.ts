// pattern: Imperative Shell
// Main entry point for the sandboxing module.

export { SandboxImplementation } from "./base.js";
export { BwrapSandbox } from "./bwrap.js";
export { createSandbox, INSTALL_BWRAP_HINT } from "./factory.js";
export { createHostProbe } from "./host-probe.js";
export { getPlatform, isSandboxSupported } from "./platform.js";
export {
  bindDirective,
  buildIsolationArgs,
  createSandboxPolicy,
  isSandboxMode,
  parseSandboxMode,
  renderDirective,
  resolveDirectives,
} from "./policy.js";
export type {
  BindDirective,
  HostProbe,
  SandboxArgs,
  SandboxContext,
  SandboxMode,
  SandboxPolicy,
  SandboxPolicyOptions,
} from "./types.js";
export { SANDBOX_MODES, SandboxPlatform } from "./types.js";
