// pattern: Functional Core
// Sandbox policy construction and rendering to bubblewrap arguments.
// Every host lookup goes through the injected HostProbe.

import { join } from "node:path";

import { InvalidPolicyError } from "../errors.js";

import {
  type BindDirective,
  SANDBOX_MODES,
  type SandboxContext,
  type SandboxMode,
  type SandboxPolicy,
  type SandboxPolicyOptions,
} from "./types.js";

import type { Logger } from "pino";

export function isSandboxMode(value: string): value is SandboxMode {
  return SANDBOX_MODES.some(mode => mode === value);
}

/**
 * Parse a user-supplied mode name, rejecting anything outside the closed set
 */
export function parseSandboxMode(value: string): SandboxMode {
  if (!isSandboxMode(value)) {
    throw new InvalidPolicyError(value);
  }
  return value;
}

/**
 * Build a frozen policy. An unknown mode raises InvalidPolicyError before
 * anything else is constructed.
 */
export function createSandboxPolicy(
  mode: string,
  options: SandboxPolicyOptions = {}
): SandboxPolicy {
  const validMode = parseSandboxMode(mode);

  const extraDirectives = Object.freeze(
    (options.extraDirectives ?? []).map(directive => Object.freeze({ ...directive }))
  );
  const allowDownloadsDir = options.allowDownloadsDir ?? false;

  switch (validMode) {
    case "full":
      return Object.freeze({ mode: "full", allowDownloadsDir, extraDirectives });
    case "strict":
      return Object.freeze({
        mode: "strict",
        allowDownloadsDir,
        extraDirectives,
      });
  }
}

export function bindDirective(
  hostPath: string,
  options: { readOnly?: boolean; device?: boolean; sandboxPath?: string } = {}
): BindDirective {
  const directive: BindDirective = {
    hostPath,
    sandboxPath: options.sandboxPath ?? hostPath,
    readOnly: options.readOnly ?? false,
  };
  return options.device ? { ...directive, device: true } : directive;
}

export function renderDirective(directive: BindDirective): string[] {
  const flag = directive.device
    ? "--dev-bind"
    : directive.readOnly
      ? "--ro-bind"
      : "--bind";
  return [flag, directive.hostPath, directive.sandboxPath];
}

// Namespace setup and the read-only view of the host. Always emitted.
const GLOBAL_ISOLATION_ARGS: readonly string[] = [
  "--unshare-all",
  "--share-net",
  "--die-with-parent",
  "--new-session",
  "--dev-bind",
  "/dev",
  "/dev",
  "--ro-bind",
  "/",
  "/",
  "--proc",
  "/proc",
  "--tmpfs",
  "/tmp",
];

/**
 * Binds that make GPU, session bus and X11 usable inside the sandbox
 */
function hostSessionDirectives(context: SandboxContext): BindDirective[] {
  const { env } = context.host;
  const directives: BindDirective[] = [
    bindDirective("/dev/dri", { device: true }),
  ];

  const runtimeDir = env["XDG_RUNTIME_DIR"];
  if (runtimeDir) {
    directives.push(bindDirective(runtimeDir));
  }

  if (env["DISPLAY"]) {
    directives.push(bindDirective("/tmp/.X11-unix"));
    directives.push(bindDirective("/tmp/.ICE-unix"));
  }

  return directives;
}

function downloadsDirective(
  policy: SandboxPolicy,
  context: SandboxContext
): BindDirective[] {
  return policy.allowDownloadsDir
    ? [bindDirective(join(context.host.homeDir, "Downloads"))]
    : [];
}

function modeDirectives(
  policy: SandboxPolicy,
  context: SandboxContext
): BindDirective[] {
  const { host } = context;

  switch (policy.mode) {
    case "full":
      return [
        bindDirective(host.homeDir),
        ...downloadsDirective(policy, context),
      ];
    case "strict": {
      const xauthority =
        host.env["XAUTHORITY"] || join(host.homeDir, ".Xauthority");
      return [
        bindDirective(context.dataRoot),
        ...downloadsDirective(policy, context),
        bindDirective(xauthority, { readOnly: true }),
      ];
    }
  }
}

/**
 * Resolve the ordered directive list for a policy. Directives whose host path
 * is missing are dropped; missing caller extras are reported.
 */
export function resolveDirectives(
  policy: SandboxPolicy,
  context: SandboxContext,
  logger?: Logger
): BindDirective[] {
  const { host } = context;
  const builtIn = [
    ...hostSessionDirectives(context),
    ...modeDirectives(policy, context),
  ].filter(directive => host.exists(directive.hostPath));

  const extras = policy.extraDirectives.filter(directive => {
    if (host.exists(directive.hostPath)) {
      return true;
    }
    logger?.warn(
      { path: directive.hostPath },
      "Skipping non-existent extra bind path"
    );
    return false;
  });

  return [...builtIn, ...extras];
}

/**
 * Render a policy to the bubblewrap arguments that precede `--` and the
 * wrapped command
 */
export function buildIsolationArgs(
  policy: SandboxPolicy,
  context: SandboxContext,
  logger?: Logger
): string[] {
  return [
    ...GLOBAL_ISOLATION_ARGS,
    ...resolveDirectives(policy, context, logger).flatMap(renderDirective),
  ];
}
