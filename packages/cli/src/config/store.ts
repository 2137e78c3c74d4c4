// pattern: Imperative Shell

import { readdir, rm } from "node:fs/promises";
import { join } from "node:path";

import { FileSystemError } from "../utils/errors.js";

import { loadAndValidateAppConfig } from "./loaders/app-config.js";
import { writeAppConfigToFile } from "./writers/app-config-writer.js";

import type { AppConfig } from "./types/app-config.js";

const CONFIG_EXTENSION = ".yaml";

/**
 * Persistence for per-app configuration records
 */
export interface AppConfigStore {
  /** Load an app's config, or null if there is none */
  load(name: string): Promise<AppConfig | null>;
  save(config: AppConfig): Promise<void>;
  /** Remove an app's config; a missing config is not an error */
  remove(name: string): Promise<void>;
  /** Names of all configured apps, sorted */
  list(): Promise<string[]>;
}

function isMissingFileError(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "ENOENT";
}

/**
 * Stores each app as `<dir>/<name>.yaml`
 */
export class FileAppConfigStore implements AppConfigStore {
  constructor(private readonly directory: string) {}

  getConfigPath(name: string): string {
    return join(this.directory, `${name}${CONFIG_EXTENSION}`);
  }

  async load(name: string): Promise<AppConfig | null> {
    try {
      return await loadAndValidateAppConfig(this.getConfigPath(name));
    } catch (error) {
      if (error instanceof FileSystemError && error.operation === "read") {
        return null;
      }
      throw error;
    }
  }

  async save(config: AppConfig): Promise<void> {
    await writeAppConfigToFile(this.getConfigPath(config.name), config);
  }

  async remove(name: string): Promise<void> {
    await rm(this.getConfigPath(name), { force: true });
  }

  async list(): Promise<string[]> {
    let entries: string[];
    try {
      entries = await readdir(this.directory);
    } catch (error) {
      if (isMissingFileError(error)) {
        return [];
      }
      throw error;
    }

    return entries
      .filter(entry => entry.endsWith(CONFIG_EXTENSION))
      .map(entry => entry.slice(0, -CONFIG_EXTENSION.length))
      .sort();
  }
}
