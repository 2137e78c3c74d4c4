// pattern: Functional Core

import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";

import { ajv } from "../../utils/ajv.js";
import { FileSystemError, ValidationError } from "../../utils/errors.js";
import { AppConfig } from "../types/app-config.js";

// Compile schema once for reuse
const validateAppConfig = ajv.compile<AppConfig>(AppConfig);

/**
 * Read and parse an app config file without validating it
 */
export async function loadAppConfigFromFile(filePath: string): Promise<unknown> {
  let content: string;
  try {
    content = await readFile(filePath, "utf8");
  } catch (error) {
    if (error instanceof Error && "code" in error && error.code === "ENOENT") {
      throw new FileSystemError(
        `App config file not found: ${filePath}`,
        "read",
        filePath
      );
    }
    throw error;
  }

  try {
    return parseYaml(content);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw new ValidationError(`App config ${filePath} is not valid YAML: ${message}`);
  }
}

/**
 * Validates a JavaScript object against the AppConfig schema
 */
export function validateAppConfigObject(data: unknown): data is AppConfig {
  if (!validateAppConfig(data)) {
    const errorMessages = (validateAppConfig.errors ?? []).map(
      err => `${err.instancePath || "root"}: ${err.message}`
    );
    throw new ValidationError(
      `AppConfig validation failed: ${errorMessages.join(", ")}`,
      errorMessages
    );
  }

  return true;
}

/**
 * Loads and validates an app config from file
 */
export async function loadAndValidateAppConfig(
  filePath: string
): Promise<AppConfig> {
  const data = await loadAppConfigFromFile(filePath);

  if (validateAppConfigObject(data)) {
    return data;
  }

  // This should never be reached due to the throw in validateAppConfigObject
  throw new Error("Unexpected validation state");
}
