// pattern: Functional Core
// Barrel file for diagnosis library exports

export * from "./formatter.js";
export * from "./tool-detection.js";
export * from "./types.js";
