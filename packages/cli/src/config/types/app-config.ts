// pattern: Functional Core
import { type Static, Type } from "@sinclair/typebox";

export const RunnerSchema = Type.Union([
  Type.Literal("wine"),
  Type.Literal("proton"),
]);

export const SandboxModeSchema = Type.Union([
  Type.Literal("full"),
  Type.Literal("strict"),
]);

// App names become directory and file names
export const AppNameSchema = Type.String({
  minLength: 1,
  maxLength: 64,
  pattern: "^(?!\\.\\.?$)[^/\\\\]+$",
});

/**
 * Persisted per-app settings, one YAML file per app
 */
export const AppConfigV1 = Type.Object({
  version: Type.Literal(1),
  name: AppNameSchema,
  profile: Type.String({ minLength: 1 }),
  runner: RunnerSchema,
  /** Absolute path of the Wine prefix */
  prefix: Type.String({ minLength: 1 }),
  /** Last executable launched successfully, in `C:\` syntax or a host path */
  lastExe: Type.Optional(Type.String()),
  /** Whether runs are confined with bubblewrap */
  sandbox: Type.Boolean(),
  sandboxMode: SandboxModeSchema,
});
export type AppConfigV1 = Static<typeof AppConfigV1>;

export const AppConfig = AppConfigV1;
export type AppConfig = AppConfigV1;
