// pattern: Functional Core

import { mkdir, rename, writeFile } from "node:fs/promises";
import { dirname } from "node:path";
import { stringify } from "yaml";

import type { AppConfig } from "../types/app-config.js";

/**
 * Writes an app config as YAML, replacing any existing file by rename
 */
export async function writeAppConfigToFile(
  filePath: string,
  config: AppConfig
): Promise<void> {
  await mkdir(dirname(filePath), { recursive: true });

  const tempPath = `${filePath}.${process.pid}.tmp`;
  await writeFile(tempPath, stringify(config), "utf8");
  await rename(tempPath, filePath);
}
