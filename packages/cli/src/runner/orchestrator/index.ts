// pattern: Imperative Shell
// Composes environment, sandbox policy and supervision into the app lifecycle:
// create, initialize, install, run, uninstall.

import { existsSync } from "node:fs";
import { copyFile, mkdir, rm } from "node:fs/promises";
import { basename, extname, join } from "node:path";

import { getProfile, listProfiles } from "../../config/profiles.js";
import { detectTools } from "../../diagnostics/index.js";
import { findExecutable as defaultFindExecutable } from "../../utils/command/find-executable.js";
import {
  AppNotFoundError,
  CommandNotFoundError,
  ConfigurationError,
  ExecutableNotFoundError,
  LaunchFailedError,
} from "../../utils/errors.js";
import { createSandboxPolicy, parseSandboxMode } from "../../utils/sandbox/index.js";
import {
  getAppDir,
  getInstallLogPath,
  getLogDir,
  getPrefixPath,
  getRunLogPath,
} from "../directory-resolver/index.js";
import { composeRunEnvironment } from "../env-resolver/index.js";
import { detectExecutable } from "../exe-detector/index.js";
import { resolveInstallerPath } from "../installer-path/index.js";
import { withPrefixLock } from "../prefix-lock/index.js";
import { isRunner, isWindowsPath } from "../types/index.js";

import type { AppConfig } from "../../config/types/app-config.js";
import type { AppConfigStore } from "../../config/store.js";
import type { ToolStatus } from "../../diagnostics/index.js";
import type { SandboxMode, SandboxPolicy } from "../../utils/sandbox/index.js";
import type { DirectoryResolver } from "../directory-resolver/index.js";
import type { LaunchRequest } from "../supervisor/index.js";
import type { LaunchResult, Runner } from "../types/index.js";
import type { PathTranslator } from "../winepath/index.js";
import type { Logger } from "pino";

// Console tools; running one should not replace the app's remembered entry point
const CLI_EXECUTABLES: ReadonlySet<string> = new Set([
  "7z.exe",
  "cmd.exe",
  "powershell.exe",
]);

const PROTON_KEYWORDS = [
  "steam",
  "epic",
  "gog",
  "unity",
  "unreal",
  "dx12",
  "vulkan",
] as const;

const MAX_DERIVED_NAME_LENGTH = 32;

/**
 * Anything that can run a launch request to completion
 */
export interface Launcher {
  run(request: LaunchRequest): Promise<LaunchResult>;
}

export interface RunOrchestratorDeps {
  logger: Logger;
  dirs: DirectoryResolver;
  store: AppConfigStore;
  launcher: Launcher;
  pathTranslator: PathTranslator;
  /** Environment children inherit from; never mutated */
  parentEnv: Readonly<Record<string, string | undefined>>;
  /** Base for relative installer paths */
  cwd?: string;
  findExecutable?: (name: string, searchPath?: string) => Promise<string | null>;
}

export interface CreateAppOptions {
  profile?: string;
  /** `auto` picks a runner from the profile and installer name */
  runner?: string;
  sandbox?: boolean;
  sandboxMode?: string;
}

export interface InstallOptions {
  /** Copy the installer into the app directory instead of running it */
  portable?: boolean;
  /** Run the installer inside the sandbox */
  sandboxInstall?: boolean;
  /** Sandbox mode for the installer; full unless overridden */
  installerSandboxMode?: SandboxMode;
}

export type AddAppOptions = CreateAppOptions & InstallOptions;

export interface LogPaths {
  logDir: string;
  runLog: string | null;
  installLog: string | null;
}

/**
 * Pick the compatibility layer for an installer: Proton for games and for
 * installers whose name mentions a game store or engine, Wine otherwise.
 */
export function chooseRunner(profile: string, installerPath: string): Runner {
  if (profile === "games") {
    return "proton";
  }
  const lowered = installerPath.toLowerCase();
  return PROTON_KEYWORDS.some(keyword => lowered.includes(keyword))
    ? "proton"
    : "wine";
}

/**
 * Derive an app name from an installer file: the lowercased stem with spaces
 * replaced, truncated, and suffixed `_2`, `_3`… until it is unused.
 */
export function deriveAppName(
  installerPath: string,
  existingNames: ReadonlySet<string>
): string {
  const file = basename(installerPath);
  const stem = file.slice(0, file.length - extname(file).length);
  const derived = stem
    .toLowerCase()
    .replace(/ /g, "_")
    .slice(0, MAX_DERIVED_NAME_LENGTH);
  const base = isValidAppName(derived) ? derived : "app";

  let name = base;
  for (let i = 2; existingNames.has(name); i++) {
    name = `${base}_${i}`;
  }
  return name;
}

export function isValidAppName(name: string): boolean {
  return (
    name.length > 0 &&
    name.length <= 64 &&
    name !== "." &&
    name !== ".." &&
    !/[/\\]/.test(name)
  );
}

function windowsBaseName(target: string): string {
  return (target.split(/[\\/]/).pop() ?? target).toLowerCase();
}

export class RunOrchestrator {
  private readonly logger: Logger;
  private readonly dirs: DirectoryResolver;
  private readonly store: AppConfigStore;
  private readonly launcher: Launcher;
  private readonly pathTranslator: PathTranslator;
  private readonly parentEnv: Readonly<Record<string, string | undefined>>;
  private readonly cwd: string;
  private readonly findExecutable: (
    name: string,
    searchPath?: string
  ) => Promise<string | null>;

  constructor(deps: RunOrchestratorDeps) {
    this.logger = deps.logger.child({ component: "orchestrator" });
    this.dirs = deps.dirs;
    this.store = deps.store;
    this.launcher = deps.launcher;
    this.pathTranslator = deps.pathTranslator;
    this.parentEnv = deps.parentEnv;
    this.cwd = deps.cwd ?? process.cwd();
    this.findExecutable = deps.findExecutable ?? defaultFindExecutable;
  }

  /**
   * Validate settings, create the prefix directory and persist the config
   *
   * @throws ConfigurationError for an invalid name, unknown profile or runner,
   *   or an app that already exists
   * @throws InvalidPolicyError for an unknown sandbox mode
   */
  async createApp(
    name: string,
    options: CreateAppOptions = {}
  ): Promise<AppConfig> {
    if (!isValidAppName(name)) {
      throw new ConfigurationError(
        `Invalid app name '${name}': must be 1-64 characters without path separators`
      );
    }

    const profile = options.profile ?? "general";
    if (!getProfile(profile)) {
      throw new ConfigurationError(
        `Unknown profile: ${profile} (choose from ${listProfiles().join(", ")})`
      );
    }

    const runner = options.runner ?? "wine";
    if (!isRunner(runner)) {
      throw new ConfigurationError(
        `Unknown runner '${runner}': must be wine or proton`
      );
    }

    const sandboxMode = parseSandboxMode(options.sandboxMode ?? "full");

    if ((await this.store.load(name)) !== null) {
      throw new ConfigurationError(`App already exists: ${name}`);
    }

    const prefix = getPrefixPath(this.dirs, name);
    await mkdir(prefix, { recursive: true });

    const config: AppConfig = {
      version: 1,
      name,
      profile,
      runner,
      prefix,
      sandbox: options.sandbox ?? false,
      sandboxMode,
    };
    await this.store.save(config);

    this.logger.info(
      { app: name, profile, runner, sandbox: config.sandbox, sandboxMode },
      "Created app"
    );
    return config;
  }

  /**
   * Boot the prefix and apply the profile's winetricks verbs, unsandboxed,
   * logging to install.log
   *
   * @throws LaunchFailedError when a step exits non-zero
   */
  async initPrefix(config: AppConfig): Promise<void> {
    const profile = getProfile(config.profile);
    if (!profile) {
      throw new ConfigurationError(
        `App '${config.name}' uses unknown profile '${config.profile}'`
      );
    }

    const env = this.environmentFor(config);
    const logPath = getInstallLogPath(this.dirs, config.name);

    const steps: { description: string; command: string[] }[] = [
      { description: "Initializing prefix", command: ["wineboot", "-u"] },
      {
        description: "Setting Windows version",
        command: ["winetricks", "-q", profile.windowsVersion],
      },
    ];
    if (profile.dependencyPackages.length > 0) {
      steps.push({
        description: "Installing dependencies",
        command: ["winetricks", "-q", ...profile.dependencyPackages],
      });
    }
    if (profile.graphicsPackages.length > 0) {
      steps.push({
        description: "Enabling graphics layers",
        command: ["winetricks", "-q", ...profile.graphicsPackages],
      });
    }

    await withPrefixLock(config.prefix, this.logger, async () => {
      for (const step of steps) {
        this.logger.info({ app: config.name, command: step.command }, step.description);
        const result = await this.launcher.run({
          command: step.command,
          env,
          logPath,
        });
        if (result.exitCode !== 0) {
          throw new LaunchFailedError(
            `${step.description} failed (${result.exitCode}). See: ${logPath}`,
            step.command,
            result.exitCode,
            logPath
          );
        }
      }
    });
  }

  /**
   * Run an installer in the app's prefix, or copy a portable executable into
   * the app directory. Returns the config as saved afterwards.
   *
   * @throws NoGlobMatchError, InstallerNotFoundError for a bad installer path
   * @throws LaunchFailedError when the installer exits non-zero
   */
  async install(
    config: AppConfig,
    rawInstallerPath: string,
    options: InstallOptions = {}
  ): Promise<AppConfig> {
    const installer = await this.resolveInstaller(rawInstallerPath);
    return this.installResolved(config, installer, options);
  }

  /**
   * Resolve the installer, then create, initialize and install the app. A
   * bad installer path fails before anything is written.
   *
   * @throws NoGlobMatchError, InstallerNotFoundError for a bad installer path
   */
  async addApp(
    name: string,
    rawInstallerPath: string,
    options: AddAppOptions = {}
  ): Promise<AppConfig> {
    const installer = await this.resolveInstaller(rawInstallerPath);
    const profile = options.profile ?? "general";
    const runner =
      options.runner === undefined || options.runner === "auto"
        ? chooseRunner(profile, installer)
        : options.runner;

    const config = await this.createApp(name, { ...options, profile, runner });
    await this.initPrefix(config);
    return this.installResolved(config, installer, options);
  }

  private async installResolved(
    config: AppConfig,
    installer: string,
    options: InstallOptions
  ): Promise<AppConfig> {
    const env = this.environmentFor(config);

    if (options.portable) {
      return this.installPortable(config, installer, env);
    }

    const logPath = getInstallLogPath(this.dirs, config.name);
    const command = ["wine", installer];
    const sandbox = options.sandboxInstall
      ? createSandboxPolicy(options.installerSandboxMode ?? "full", {
          allowDownloadsDir: true,
        })
      : undefined;

    this.logger.info(
      { app: config.name, installer, sandboxMode: sandbox?.mode },
      "Running installer"
    );

    const result = await withPrefixLock(config.prefix, this.logger, () =>
      this.launcher.run(this.request(command, env, logPath, sandbox))
    );
    if (result.exitCode !== 0) {
      throw new LaunchFailedError(
        `Installer failed (${result.exitCode}). See: ${logPath}`,
        command,
        result.exitCode,
        logPath
      );
    }
    return config;
  }

  /**
   * Launch an app. The target is the explicit executable, else the
   * remembered one, else one autodetected in the prefix.
   *
   * @throws AppNotFoundError, ExecutableNotFoundError
   * @throws CommandNotFoundError when the Proton runner is not installed
   * @throws LaunchFailedError when the app exits non-zero
   */
  async run(name: string, exe?: string): Promise<LaunchResult> {
    let config = await this.requireApp(name);
    const env = this.environmentFor(config);
    const logPath = getRunLogPath(this.dirs, name);

    let target = exe || config.lastExe;
    if (!target) {
      const detected = await detectExecutable(config.prefix, this.logger);
      if (detected === null) {
        throw new ExecutableNotFoundError(name);
      }
      this.logger.info({ app: name, exe: detected }, "Autodetected executable");
      target = detected;
    }

    if (
      !CLI_EXECUTABLES.has(windowsBaseName(target)) &&
      config.lastExe !== target
    ) {
      config = { ...config, lastExe: target };
      await this.store.save(config);
    }

    const command = await this.runCommandFor(config.runner, target, env);
    const sandbox = config.sandbox
      ? createSandboxPolicy(config.sandboxMode, { allowDownloadsDir: false })
      : undefined;

    this.logger.info(
      { app: name, runner: config.runner, target, sandboxMode: sandbox?.mode },
      "Running app"
    );

    const result = await withPrefixLock(config.prefix, this.logger, () =>
      this.launcher.run(this.request(command, env, logPath, sandbox))
    );
    if (result.exitCode !== 0) {
      throw new LaunchFailedError(
        `Run failed (${result.exitCode}). See: ${logPath}`,
        command,
        result.exitCode,
        logPath
      );
    }
    return result;
  }

  /**
   * Add an app for an installer file with default settings, then initialize
   * and install it. Returns the new app's config.
   */
  async openInstaller(rawInstallerPath: string): Promise<AppConfig> {
    const installer = await this.resolveInstaller(rawInstallerPath);
    const name = deriveAppName(installer, new Set(await this.store.list()));

    const config = await this.createApp(name, {
      profile: "general",
      runner: "wine",
      sandbox: false,
      sandboxMode: "full",
    });
    await this.initPrefix(config);
    return this.installResolved(config, installer, {});
  }

  /**
   * Remove an app's prefix, portable copy, logs and config
   *
   * @throws AppNotFoundError
   */
  async uninstallApp(name: string): Promise<void> {
    const config = await this.requireApp(name);

    await withPrefixLock(config.prefix, this.logger, async () => {
      await rm(config.prefix, { recursive: true, force: true });
    });
    await rm(getAppDir(this.dirs, name), { recursive: true, force: true });
    await rm(getLogDir(this.dirs, name), { recursive: true, force: true });
    await this.store.remove(name);

    this.logger.info({ app: name }, "Uninstalled app");
  }

  async listApps(): Promise<string[]> {
    return this.store.list();
  }

  /**
   * Log locations for an app; files that do not exist yet are null
   */
  logPaths(name: string): LogPaths {
    const runLog = getRunLogPath(this.dirs, name);
    const installLog = getInstallLogPath(this.dirs, name);
    return {
      logDir: getLogDir(this.dirs, name),
      runLog: existsSync(runLog) ? runLog : null,
      installLog: existsSync(installLog) ? installLog : null,
    };
  }

  /**
   * Availability of every external program, looked up on the parent PATH
   */
  async doctor(): Promise<ToolStatus[]> {
    return detectTools(this.parentEnv["PATH"]);
  }

  async loadApp(name: string): Promise<AppConfig> {
    return this.requireApp(name);
  }

  private async requireApp(name: string): Promise<AppConfig> {
    const config = await this.store.load(name);
    if (config === null) {
      throw new AppNotFoundError(name);
    }
    return config;
  }

  private resolveInstaller(rawInstallerPath: string): Promise<string> {
    return resolveInstallerPath(rawInstallerPath, {
      homeDir: this.dirs.home,
      cwd: this.cwd,
    });
  }

  private environmentFor(config: AppConfig): Record<string, string> {
    return composeRunEnvironment({
      parentEnv: this.parentEnv,
      prefixPath: config.prefix,
      cacheDir: this.dirs.cache,
    });
  }

  private async installPortable(
    config: AppConfig,
    installer: string,
    env: Record<string, string>
  ): Promise<AppConfig> {
    const appDir = getAppDir(this.dirs, config.name);
    await mkdir(appDir, { recursive: true });
    const destination = join(appDir, basename(installer));

    this.logger.info({ from: installer, to: destination }, "Copying portable executable");
    await copyFile(installer, destination);

    const windowsPath = await this.pathTranslator.toWindows(destination, env);
    if (windowsPath === null) {
      this.logger.warn(
        { path: destination },
        "Could not convert portable executable path; pass --exe when running"
      );
      return config;
    }

    const updated: AppConfig = { ...config, lastExe: windowsPath };
    await this.store.save(updated);
    return updated;
  }

  private async runCommandFor(
    runner: Runner,
    target: string,
    env: Record<string, string>
  ): Promise<string[]> {
    switch (runner) {
      case "wine":
        return ["wine", target];
      case "proton": {
        if ((await this.findExecutable("umu-run", env["PATH"])) === null) {
          throw new CommandNotFoundError("umu-run");
        }
        const hostPath = isWindowsPath(target)
          ? ((await this.pathTranslator.toUnix(target, env)) ?? target)
          : target;
        return ["umu-run", hostPath];
      }
    }
  }

  private request(
    command: string[],
    env: Record<string, string>,
    logPath: string,
    sandbox: SandboxPolicy | undefined
  ): LaunchRequest {
    return sandbox === undefined
      ? { command, env, logPath }
      : { command, env, logPath, sandbox };
  }
}
