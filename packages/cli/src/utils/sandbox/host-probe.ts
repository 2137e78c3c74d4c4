// pattern: Imperative Shell
// The one place policy building touches the real host.

import { existsSync } from "node:fs";
import { homedir } from "node:os";

import type { HostProbe } from "./types.js";

export function createHostProbe(
  env: Record<string, string | undefined> = process.env
): HostProbe {
  return {
    exists: path => existsSync(path),
    env: { ...env },
    homeDir: env["HOME"] ?? homedir(),
  };
}
