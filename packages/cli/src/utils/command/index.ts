// pattern: Mixed (unavoidable)
// Command execution requires integration of pure logic with side effects
import { execa, ExecaError, type Options } from "execa";

import { ProcessError } from "../errors.js";

import type { Logger } from "pino";

export { findExecutable } from "./find-executable.js";

/**
 * A command builder for short-lived helper commands whose stdout we need
 * (winepath and friends). Long-running launches go through ProcessSupervisor.
 */
export class CommandBuilder {
  private command: string;
  private args: string[];
  private env: Record<string, string>;
  private childLogger: Logger;
  private cwd?: string;

  constructor(command: string, logger: Logger) {
    this.command = command;
    this.args = [];
    this.env = {};

    // Extract process name (first part of command, without path or extension)
    const processName = command.split(/[/\\]/).pop()?.split(".")[0] ?? command;
    this.childLogger = logger.child({ process: processName });
  }

  /**
   * Add a command argument
   */
  arg(arg: string): this {
    this.args.push(arg);
    return this;
  }

  /**
   * Add multiple command arguments
   */
  addArgs(args: string[]): this {
    this.args.push(...args);
    return this;
  }

  /**
   * Set environment variables (merged with the parent environment)
   */
  envs(envVars: Record<string, string>): this {
    Object.assign(this.env, envVars);
    return this;
  }

  /**
   * Set working directory
   */
  currentDir(path: string): this {
    this.cwd = path;
    return this;
  }

  /**
   * Execute the command and return trimmed stdout.
   * stderr is logged at DEBUG level.
   *
   * @throws ProcessError when the command exits non-zero or cannot start
   */
  async output(): Promise<string> {
    this.childLogger.debug(
      { command: this.command, args: this.args, cwd: this.cwd },
      "Executing command"
    );

    const options: Options = {
      env: this.env,
      stderr: "pipe",
      stdout: "pipe",
      stdin: "ignore",
      ...(this.cwd !== undefined && { cwd: this.cwd }),
    };

    try {
      const result = await execa(this.command, this.args, options);

      if (typeof result.stderr === "string" && result.stderr.trim()) {
        this.childLogger.debug({ stderr: result.stderr }, "Command stderr output");
      }

      this.childLogger.debug(
        { exitCode: result.exitCode, duration: result.durationMs },
        "Command completed successfully"
      );

      return typeof result.stdout === "string" ? result.stdout.trim() : "";
    } catch (error) {
      if (error instanceof ExecaError) {
        this.childLogger.debug(
          {
            error: error.shortMessage,
            stderr: error.stderr,
            exitCode: error.exitCode,
          },
          "Command execution failed"
        );
        throw new ProcessError(
          `${this.command} failed: ${error.shortMessage}`,
          this.command,
          error.exitCode
        );
      }
      throw error;
    }
  }
}

/**
 * Create a new command builder with the specified command and logger
 */
export function createCommand(command: string, logger: Logger): CommandBuilder {
  return new CommandBuilder(command, logger);
}
