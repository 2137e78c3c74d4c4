// pattern: Imperative Shell

import { mkdir, open } from "node:fs/promises";
import { basename, dirname } from "node:path";

import { findExecutable } from "../../utils/command/find-executable.js";
import {
  CommandNotFoundError,
  ProcessError,
  SandboxUnavailableError,
} from "../../utils/errors.js";
import { createSandbox, INSTALL_BWRAP_HINT } from "../../utils/sandbox/index.js";

import { spawnChild } from "./spawn.js";

import type {
  HostProbe,
  SandboxArgs,
  SandboxImplementation,
  SandboxPolicy,
} from "../../utils/sandbox/index.js";
import type { LaunchResult } from "../types/index.js";
import type { Logger } from "pino";

export { exitStatusFor, spawnChild } from "./spawn.js";

const WINE_LOADERS: ReadonlySet<string> = new Set(["wine", "wine64"]);

export interface LaunchRequest {
  /** Executable and arguments; the executable is resolved through env.PATH */
  command: readonly string[];
  /** Complete child environment */
  env: Readonly<Record<string, string>>;
  /** Append child output here instead of inheriting the caller's streams */
  logPath?: string;
  /** Confine the child with this policy */
  sandbox?: SandboxPolicy;
}

export interface ProcessSupervisorOptions {
  logger: Logger;
  host: HostProbe;
  /** Private data root, reachable from strict sandboxes */
  dataRoot: string;
  now?: () => Date;
  platform?: NodeJS.Platform;
}

/**
 * Header written to a log file before each launch
 */
export function formatLogHeader(commandLine: readonly string[], at: Date): string {
  return `\n\n$ ${commandLine.join(" ")}\n--- ${at.toISOString()} ---\n`;
}

/**
 * Runs one child at a time to completion. Resolves the executable, wraps it in
 * bubblewrap when a policy is given, tees output to a log file and returns the
 * exit status. No retries and no timeout.
 */
export class ProcessSupervisor {
  private readonly logger: Logger;
  private readonly host: HostProbe;
  private readonly dataRoot: string;
  private readonly now: () => Date;
  private readonly platform: NodeJS.Platform;

  constructor(options: ProcessSupervisorOptions) {
    this.logger = options.logger.child({ component: "supervisor" });
    this.host = options.host;
    this.dataRoot = options.dataRoot;
    this.now = options.now ?? (() => new Date());
    this.platform = options.platform ?? process.platform;
  }

  async run(request: LaunchRequest): Promise<LaunchResult> {
    const sandbox = request.sandbox
      ? await this.prepareSandbox(request.sandbox)
      : undefined;

    const [head, ...rest] = request.command;
    if (head === undefined) {
      throw new ProcessError("Cannot launch an empty command");
    }

    const executable = await findExecutable(head, request.env["PATH"]);
    if (executable === null) {
      throw new CommandNotFoundError(head);
    }

    const env: Record<string, string> = { ...request.env };
    if (WINE_LOADERS.has(basename(executable))) {
      const wineserver = await findExecutable("wineserver", env["PATH"]);
      if (wineserver !== null) {
        env["WINESERVER"] = wineserver;
      }
    }

    const invocation: SandboxArgs = sandbox
      ? sandbox.buildSandboxArgs(executable, rest)
      : { executable, args: rest };

    this.logger.debug(
      {
        command: invocation.executable,
        argCount: invocation.args.length,
        sandboxed: sandbox !== undefined,
        logPath: request.logPath,
      },
      "Launching process"
    );

    const exitCode =
      request.logPath === undefined
        ? await spawnChild(invocation.executable, invocation.args, {
            env,
            output: "inherit",
          })
        : await this.runLogged(invocation, env, request.logPath);

    this.logger.debug({ exitCode }, "Process exited");

    return request.logPath === undefined
      ? { exitCode }
      : { exitCode, logPath: request.logPath };
  }

  private async prepareSandbox(
    policy: SandboxPolicy
  ): Promise<SandboxImplementation> {
    const sandbox = createSandbox(
      this.logger,
      policy,
      { host: this.host, dataRoot: this.dataRoot },
      this.platform
    );

    if (!(await sandbox.validate())) {
      throw new SandboxUnavailableError(
        `Sandbox requested but bubblewrap (bwrap) is not installed. ${INSTALL_BWRAP_HINT}`
      );
    }
    return sandbox;
  }

  private async runLogged(
    invocation: SandboxArgs,
    env: Record<string, string>,
    logPath: string
  ): Promise<number> {
    await mkdir(dirname(logPath), { recursive: true });

    const handle = await open(logPath, "a");
    try {
      await handle.write(
        formatLogHeader([invocation.executable, ...invocation.args], this.now())
      );
      return await spawnChild(invocation.executable, invocation.args, {
        env,
        output: handle.fd,
      });
    } finally {
      await handle.close();
    }
  }
}
