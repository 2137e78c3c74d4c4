// pattern: Functional Core
// Plain-text diagnostic report

import type { ToolStatus } from "./types.js";

function formatToolStatus(tool: ToolStatus): string {
  return tool.available
    ? `${tool.name}: OK (${tool.path ?? "found"})`
    : `${tool.name}: MISSING (needed for ${tool.purpose})`;
}

export function formatToolReport(tools: readonly ToolStatus[]): string {
  return tools.map(formatToolStatus).join("\n");
}
