// pattern: Functional Core

import type { Level } from "pino";

export type LogLevel = Extract<Level, "error" | "warn" | "info" | "debug" | "trace">;

export type LogFormat = "nice" | "json";

export const LOG_LEVELS: readonly LogLevel[] = [
  "error",
  "warn",
  "info",
  "debug",
  "trace",
];

export const LOG_FORMATS: readonly LogFormat[] = ["nice", "json"];
