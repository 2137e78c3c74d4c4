// pattern: Functional Core
// Types for diagnosis data structures

export interface ToolStatus {
  name: string;
  available: boolean;
  /** Resolved location when available */
  path?: string;
  /** What norun needs the tool for */
  purpose: string;
}
