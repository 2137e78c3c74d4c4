// pattern: Imperative Shell
// Advisory per-prefix lock. Two launches against one prefix would race on
// wineserver and the registry files, so they are serialized here.

import { promises as fs } from "node:fs";
import path from "node:path";

import { FileSystemError, PrefixLockedError } from "../../utils/errors.js";

import type { Logger } from "pino";

export const LOCK_FILE_NAME = ".norun.lock";

export interface PrefixLockOptions {
  /** pid recorded as owner */
  pid?: number;
  /** Liveness check for a recorded owner */
  isAlive?: (pid: number) => boolean;
}

function hasErrorCode(error: unknown, code: string): boolean {
  return error instanceof Error && "code" in error && error.code === code;
}

/**
 * Whether a process with this pid exists. EPERM means it exists but belongs
 * to someone else.
 */
export function isProcessAlive(pid: number): boolean {
  try {
    process.kill(pid, 0);
    return true;
  } catch (error: unknown) {
    return hasErrorCode(error, "EPERM");
  }
}

export class PrefixLock {
  private readonly pid: number;
  private readonly isAlive: (pid: number) => boolean;
  private held = false;

  constructor(
    private readonly prefixPath: string,
    private readonly logger: Logger,
    options: PrefixLockOptions = {}
  ) {
    this.pid = options.pid ?? process.pid;
    this.isAlive = options.isAlive ?? isProcessAlive;
  }

  getLockFilePath(): string {
    return path.join(this.prefixPath, LOCK_FILE_NAME);
  }

  /**
   * Read the owner pid from an existing lock file, or null if there is no
   * lock or its content is not a pid
   */
  async readOwner(): Promise<number | null> {
    try {
      const content = await fs.readFile(this.getLockFilePath(), "utf8");
      const pid = Number.parseInt(content.trim(), 10);
      return Number.isInteger(pid) && pid > 0 ? pid : null;
    } catch (error: unknown) {
      if (hasErrorCode(error, "ENOENT")) {
        return null;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new FileSystemError(
        `Failed to read prefix lock file: ${message}`,
        "read",
        this.getLockFilePath()
      );
    }
  }

  /**
   * Take the lock. A lock left by a dead process is reclaimed once.
   *
   * @throws PrefixLockedError when a live process holds the lock
   */
  async acquire(): Promise<void> {
    await fs.mkdir(this.prefixPath, { recursive: true });

    if (await this.tryCreate()) {
      return;
    }

    const owner = await this.readOwner();
    if (owner !== null && this.isAlive(owner)) {
      throw new PrefixLockedError(this.prefixPath, owner);
    }

    this.logger.warn(
      { prefixPath: this.prefixPath, stalePid: owner },
      "Reclaiming stale prefix lock"
    );
    await fs.rm(this.getLockFilePath(), { force: true });

    if (!(await this.tryCreate())) {
      throw new PrefixLockedError(this.prefixPath);
    }
  }

  async release(): Promise<void> {
    if (!this.held) {
      return;
    }
    await fs.rm(this.getLockFilePath(), { force: true });
    this.held = false;
    this.logger.debug({ prefixPath: this.prefixPath }, "Released prefix lock");
  }

  private async tryCreate(): Promise<boolean> {
    try {
      await fs.writeFile(this.getLockFilePath(), `${this.pid}\n`, {
        encoding: "utf8",
        flag: "wx",
      });
      this.held = true;
      this.logger.debug({ prefixPath: this.prefixPath }, "Acquired prefix lock");
      return true;
    } catch (error: unknown) {
      if (hasErrorCode(error, "EEXIST")) {
        return false;
      }
      const message = error instanceof Error ? error.message : String(error);
      throw new FileSystemError(
        `Failed to create prefix lock file: ${message}`,
        "write",
        this.getLockFilePath()
      );
    }
  }
}

/**
 * Run `fn` while holding the lock for `prefixPath`
 */
export async function withPrefixLock<T>(
  prefixPath: string,
  logger: Logger,
  fn: () => Promise<T>
): Promise<T> {
  const lock = new PrefixLock(prefixPath, logger);
  await lock.acquire();
  try {
    return await fn();
  } finally {
    await lock.release();
  }
}
