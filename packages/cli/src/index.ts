// pattern: Imperative Shell
// Public API for embedding norun's launch machinery

export { getProfile, listProfiles, PROFILES } from "./config/profiles.js";
export type { Profile } from "./config/profiles.js";
export { FileAppConfigStore } from "./config/store.js";
export type { AppConfigStore } from "./config/store.js";
export type { AppConfig } from "./config/types/app-config.js";
export { createLogger } from "./logger/index.js";
export { createDirectoryResolver } from "./runner/directory-resolver/index.js";
export type { DirectoryResolver } from "./runner/directory-resolver/index.js";
export { composeRunEnvironment } from "./runner/env-resolver/index.js";
export {
  detectExecutable,
  pickBestExecutable,
} from "./runner/exe-detector/index.js";
export { resolveInstallerPath } from "./runner/installer-path/index.js";
export {
  chooseRunner,
  deriveAppName,
  RunOrchestrator,
} from "./runner/orchestrator/index.js";
export type {
  AddAppOptions,
  Launcher,
  RunOrchestratorDeps,
} from "./runner/orchestrator/index.js";
export { PrefixLock, withPrefixLock } from "./runner/prefix-lock/index.js";
export { ProcessSupervisor } from "./runner/supervisor/index.js";
export type { LaunchRequest } from "./runner/supervisor/index.js";
export type { LaunchResult, Runner, WindowsPath } from "./runner/types/index.js";
export { WinePathTranslator } from "./runner/winepath/index.js";
export type { PathTranslator } from "./runner/winepath/index.js";
export * from "./utils/errors.js";
export {
  buildIsolationArgs,
  createHostProbe,
  createSandboxPolicy,
} from "./utils/sandbox/index.js";
export type {
  BindDirective,
  HostProbe,
  SandboxMode,
  SandboxPolicy,
} from "./utils/sandbox/index.js";
