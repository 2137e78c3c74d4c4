// pattern: Functional Core
// Platform detection utilities for determining whether sandboxing is possible.

import { SandboxPlatform } from "./types.js";

export { SandboxPlatform };

/**
 * Detect the current platform for sandbox selection
 */
export function getPlatform(
  platform: NodeJS.Platform = process.platform
): SandboxPlatform {
  switch (platform) {
    case "linux":
      return SandboxPlatform.Linux;
    case "darwin":
      return SandboxPlatform.MacOS;
    case "win32":
      return SandboxPlatform.Windows;
    default:
      return SandboxPlatform.Unknown;
  }
}

/**
 * Bubblewrap needs Linux namespaces; nothing else is supported
 */
export function isSandboxSupported(
  platform: NodeJS.Platform = process.platform
): boolean {
  return getPlatform(platform) === SandboxPlatform.Linux;
}
