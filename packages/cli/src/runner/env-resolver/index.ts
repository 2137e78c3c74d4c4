// pattern: Functional Core

import { join } from "node:path";

export interface RunEnvironmentOptions {
  /** Parent environment variables (usually process.env); never mutated */
  parentEnv: Readonly<Record<string, string | undefined>>;
  /** Wine prefix the launch runs against */
  prefixPath: string;
  /** Shader cache root */
  cacheDir: string;
}

/**
 * Build the environment for a compatibility-layer invocation: a copy of the
 * parent environment with the prefix, debug verbosity and shader caches set.
 * An inherited non-empty WINEDEBUG is kept.
 */
export function composeRunEnvironment(
  options: RunEnvironmentOptions
): Record<string, string> {
  const { parentEnv, prefixPath, cacheDir } = options;

  const env: Record<string, string> = {};
  for (const [key, value] of Object.entries(parentEnv)) {
    if (value !== undefined) {
      env[key] = value;
    }
  }

  env["WINEPREFIX"] = prefixPath;
  if (!env["WINEDEBUG"]) {
    env["WINEDEBUG"] = "-all";
  }
  env["DXVK_STATE_CACHE_PATH"] = join(cacheDir, "dxvk");
  env["VKD3D_SHADER_CACHE_PATH"] = join(cacheDir, "vkd3d");

  return env;
}
