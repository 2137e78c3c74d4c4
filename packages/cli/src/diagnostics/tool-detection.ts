// pattern: Imperative Shell
// Lookup of the external programs norun drives

import { findExecutable } from "../utils/command/find-executable.js";

import type { ToolStatus } from "./types.js";

export const EXTERNAL_TOOLS: readonly { name: string; purpose: string }[] = [
  { name: "wine", purpose: "Wine runner" },
  { name: "wineserver", purpose: "Wine runner inside sandboxes" },
  { name: "wineboot", purpose: "prefix initialization" },
  { name: "winetricks", purpose: "profile packages" },
  { name: "winepath", purpose: "path conversion" },
  { name: "umu-run", purpose: "Proton runner" },
  { name: "bwrap", purpose: "sandboxing" },
];

// Test a specific tool and return its status
async function testTool(
  tool: { name: string; purpose: string },
  searchPath: string | undefined
): Promise<ToolStatus> {
  const path = await findExecutable(tool.name, searchPath);
  return {
    name: tool.name,
    available: path !== null,
    purpose: tool.purpose,
    ...(path !== null && { path }),
  };
}

/**
 * Check every external tool against the search path, in a fixed order
 */
export async function detectTools(
  searchPath: string | undefined = process.env["PATH"]
): Promise<ToolStatus[]> {
  return Promise.all(EXTERNAL_TOOLS.map(tool => testTool(tool, searchPath)));
}
