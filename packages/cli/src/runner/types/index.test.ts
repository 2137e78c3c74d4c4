// pattern: Functional Core

import { describe, expect, it } from "vitest";

import { isRunner, isWindowsPath } from "./index.js";

describe("isWindowsPath", () => {
  it("accepts drive-letter paths", () => {
    expect(isWindowsPath("C:\\Games\\game.exe")).toBe(true);
    expect(isWindowsPath("z:\\tmp\\tool.exe")).toBe(true);
  });

  it("rejects host paths and relative Windows paths", () => {
    expect(isWindowsPath("/opt/games/game.exe")).toBe(false);
    expect(isWindowsPath("Games\\game.exe")).toBe(false);
    expect(isWindowsPath("C:/Games/game.exe")).toBe(false);
  });
});

describe("isRunner", () => {
  it("knows wine and proton only", () => {
    expect(isRunner("wine")).toBe(true);
    expect(isRunner("proton")).toBe(true);
    expect(isRunner("dosbox")).toBe(false);
  });
});
