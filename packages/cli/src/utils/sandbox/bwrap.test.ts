// Unit tests for BwrapSandbox
import { pino } from "pino";
import { beforeEach, describe, expect, it, vi } from "vitest";

import { findExecutable } from "../command/find-executable.js";

import { BwrapSandbox } from "./bwrap.js";
import { createSandboxPolicy } from "./policy.js";

import type { SandboxContext } from "./types.js";

vi.mock("../command/find-executable.js", () => ({
  findExecutable: vi.fn(),
}));

describe("BwrapSandbox", () => {
  const logger = pino({ level: "silent" });
  const mockFindExecutable = vi.mocked(findExecutable);

  const context: SandboxContext = {
    host: {
      exists: path => path === "/home/u",
      env: { PATH: "/usr/local/bin:/usr/bin" },
      homeDir: "/home/u",
    },
    dataRoot: "/home/u/.local/share/norun",
  };

  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe("buildSandboxArgs", () => {
    it("wraps the command after the isolation arguments and a separator", () => {
      const sandbox = new BwrapSandbox(
        logger,
        createSandboxPolicy("full"),
        context
      );

      const result = sandbox.buildSandboxArgs("/usr/bin/wine", ["app.exe"]);

      expect(result.executable).toBe("bwrap");
      expect(result.args.slice(-6)).toEqual([
        "--bind",
        "/home/u",
        "/home/u",
        "--",
        "/usr/bin/wine",
        "app.exe",
      ]);
      expect(result.args[0]).toBe("--unshare-all");
    });

    it("uses the resolved bwrap path after validation", async () => {
      mockFindExecutable.mockResolvedValue("/usr/bin/bwrap");
      const sandbox = new BwrapSandbox(
        logger,
        createSandboxPolicy("strict"),
        context
      );

      await sandbox.validate();

      expect(sandbox.buildSandboxArgs("wine", []).executable).toBe(
        "/usr/bin/bwrap"
      );
    });
  });

  describe("validate", () => {
    it("searches the host PATH for bwrap", async () => {
      mockFindExecutable.mockResolvedValue("/usr/bin/bwrap");
      const sandbox = new BwrapSandbox(
        logger,
        createSandboxPolicy("full"),
        context
      );

      await expect(sandbox.validate()).resolves.toBe(true);
      expect(mockFindExecutable).toHaveBeenCalledWith(
        "bwrap",
        "/usr/local/bin:/usr/bin"
      );
    });

    it("reports false when bwrap is missing", async () => {
      mockFindExecutable.mockResolvedValue(null);
      const sandbox = new BwrapSandbox(
        logger,
        createSandboxPolicy("full"),
        context
      );

      await expect(sandbox.validate()).resolves.toBe(false);
    });

    it("caches the lookup", async () => {
      mockFindExecutable.mockResolvedValue("/usr/bin/bwrap");
      const sandbox = new BwrapSandbox(
        logger,
        createSandboxPolicy("full"),
        context
      );

      await sandbox.validate();
      await sandbox.validate();

      expect(mockFindExecutable).toHaveBeenCalledTimes(1);
    });
  });
});
