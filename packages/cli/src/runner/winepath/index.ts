// pattern: Imperative Shell

import { createCommand } from "../../utils/command/index.js";
import { ProcessError } from "../../utils/errors.js";

import type { Logger } from "pino";

/**
 * Converts between host paths and paths inside a prefix
 */
export interface PathTranslator {
  /** Host path to `C:\` syntax, or null if the conversion failed */
  toWindows(hostPath: string, env: Record<string, string>): Promise<string | null>;
  /** `C:\` path to a host path, or null if the conversion failed */
  toUnix(windowsPath: string, env: Record<string, string>): Promise<string | null>;
}

/**
 * PathTranslator backed by Wine's `winepath`. The prefix is taken from
 * WINEPREFIX in the given environment.
 */
export class WinePathTranslator implements PathTranslator {
  constructor(private readonly logger: Logger) {}

  toWindows(hostPath: string, env: Record<string, string>): Promise<string | null> {
    return this.convert("-w", hostPath, env);
  }

  toUnix(windowsPath: string, env: Record<string, string>): Promise<string | null> {
    return this.convert("-u", windowsPath, env);
  }

  private async convert(
    flag: "-w" | "-u",
    path: string,
    env: Record<string, string>
  ): Promise<string | null> {
    try {
      const converted = await createCommand("winepath", this.logger)
        .addArgs([flag, path])
        .envs(env)
        .output();
      return converted === "" ? null : converted;
    } catch (error) {
      if (error instanceof ProcessError) {
        this.logger.debug({ path, flag, error: error.message }, "winepath failed");
        return null;
      }
      throw error;
    }
  }
}
