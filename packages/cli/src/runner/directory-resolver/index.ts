// pattern: Functional Core
import envPaths from "env-paths";
import { homedir } from "node:os";
import { join } from "node:path";

import type { ResolvedPath } from "../types/index.js";

/**
 * Every directory norun reads or writes. Prefixes, caches, logs and portable
 * app copies live under the data root so strict sandboxes can reach them.
 */
export interface DirectoryResolver {
  /** User's home directory */
  home: ResolvedPath;
  /** Private data root, bound read-write in strict sandboxes */
  data: ResolvedPath;
  /** Configuration root */
  config: ResolvedPath;
  /** Shader caches (DXVK, VKD3D) */
  cache: ResolvedPath;
  /** Per-app log directories */
  logs: ResolvedPath;
  /** Per-app Wine prefixes */
  prefixes: ResolvedPath;
  /** Per-app portable executables */
  apps: ResolvedPath;
  /** Per-app YAML configs */
  appConfigs: ResolvedPath;
}

/**
 * Creates a directory resolver from the environment. `NORUN_DATA_DIR` and
 * `NORUN_CONFIG_DIR` override the env-paths defaults.
 */
export function createDirectoryResolver(
  env: Record<string, string | undefined> = process.env
): DirectoryResolver {
  const paths = envPaths("norun", { suffix: "" });

  const data = env["NORUN_DATA_DIR"] ?? paths.data;
  const config = env["NORUN_CONFIG_DIR"] ?? paths.config;

  return {
    home: (env["HOME"] ?? homedir()) as ResolvedPath,
    data: data as ResolvedPath,
    config: config as ResolvedPath,
    cache: join(data, "cache") as ResolvedPath,
    logs: join(data, "logs") as ResolvedPath,
    prefixes: join(data, "prefixes") as ResolvedPath,
    apps: join(data, "apps") as ResolvedPath,
    appConfigs: join(config, "apps") as ResolvedPath,
  };
}

export function getPrefixPath(dirs: DirectoryResolver, appName: string): string {
  return join(dirs.prefixes, appName);
}

export function getAppDir(dirs: DirectoryResolver, appName: string): string {
  return join(dirs.apps, appName);
}

export function getLogDir(dirs: DirectoryResolver, appName: string): string {
  return join(dirs.logs, appName);
}

export function getInstallLogPath(
  dirs: DirectoryResolver,
  appName: string
): string {
  return join(getLogDir(dirs, appName), "install.log");
}

export function getRunLogPath(dirs: DirectoryResolver, appName: string): string {
  return join(getLogDir(dirs, appName), "run.log");
}
