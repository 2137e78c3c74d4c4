// pattern: Imperative Shell

import { execa, ExecaError } from "execa";
import { constants } from "node:os";

import { LaunchFailedError } from "../../utils/errors.js";

export interface SpawnOptions {
  /** Complete child environment; nothing is inherited beyond it */
  env: Record<string, string>;
  /** File descriptor receiving stdout and stderr, or inherit the caller's */
  output: number | "inherit";
}

/**
 * Exit status in shell convention: a signal-terminated child reports
 * 128 + the signal number.
 */
export function exitStatusFor(
  exitCode: number | undefined,
  signal: string | undefined
): number | undefined {
  if (exitCode !== undefined) {
    return exitCode;
  }
  if (signal === undefined) {
    return undefined;
  }
  const signalNumber = Object.entries(constants.signals).find(
    ([name]) => name === signal
  )?.[1];
  return signalNumber === undefined ? 1 : 128 + signalNumber;
}

/**
 * Run one child to completion. Only a child that could not be started at all
 * is an error; any exit status is returned.
 *
 * @throws LaunchFailedError when the process cannot be started
 */
export async function spawnChild(
  executable: string,
  args: string[],
  options: SpawnOptions
): Promise<number> {
  const result = await execa(executable, args, {
    env: options.env,
    extendEnv: false,
    reject: false,
    stdin: "inherit",
    stdout: options.output,
    stderr: options.output,
  });

  const status = exitStatusFor(result.exitCode, result.signal);
  if (status !== undefined) {
    return status;
  }

  const reason =
    result instanceof ExecaError ? result.shortMessage : "unknown error";
  throw new LaunchFailedError(`Failed to start ${executable}: ${reason}`, [
    executable,
    ...args,
  ]);
}
