// pattern: Imperative Shell
import { mkdtemp, readFile, rm } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { pino } from "pino";
import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";

import { findExecutable } from "../../utils/command/find-executable.js";
import {
  CommandNotFoundError,
  SandboxUnavailableError,
} from "../../utils/errors.js";
import { createSandboxPolicy } from "../../utils/sandbox/index.js";

import { formatLogHeader, ProcessSupervisor } from "./index.js";
import { spawnChild } from "./spawn.js";

import type { HostProbe } from "../../utils/sandbox/index.js";

vi.mock("../../utils/command/find-executable.js", () => ({
  findExecutable: vi.fn(),
}));

vi.mock("./spawn.js", () => ({
  spawnChild: vi.fn(),
}));

const KNOWN_BINARIES: Record<string, string> = {
  wine: "/usr/bin/wine",
  wineserver: "/usr/lib/wine/wineserver",
  bwrap: "/usr/bin/bwrap",
  "umu-run": "/usr/bin/umu-run",
};

describe("ProcessSupervisor", () => {
  const logger = pino({ level: "silent" });
  const mockFindExecutable = vi.mocked(findExecutable);
  const mockSpawnChild = vi.mocked(spawnChild);
  const fixedTime = new Date("2024-05-01T12:00:00.000Z");

  const host: HostProbe = {
    exists: path => path === "/home/u",
    env: {},
    homeDir: "/home/u",
  };

  let tempDir: string;

  function createSupervisor(): ProcessSupervisor {
    return new ProcessSupervisor({
      logger,
      host,
      dataRoot: "/home/u/.local/share/norun",
      now: () => fixedTime,
      platform: "linux",
    });
  }

  beforeEach(async () => {
    vi.clearAllMocks();
    tempDir = await mkdtemp(join(tmpdir(), "norun-supervisor-"));
    mockFindExecutable.mockImplementation(async command =>
      command.startsWith("/") ? command : (KNOWN_BINARIES[command] ?? null)
    );
    mockSpawnChild.mockResolvedValue(0);
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("resolves the command through the request PATH", async () => {
    const env = { PATH: "/usr/bin" };

    const result = await createSupervisor().run({
      command: ["umu-run", "/games/app.exe"],
      env,
    });

    expect(result).toEqual({ exitCode: 0 });
    expect(mockFindExecutable).toHaveBeenCalledWith("umu-run", "/usr/bin");
    expect(mockSpawnChild).toHaveBeenCalledWith(
      "/usr/bin/umu-run",
      ["/games/app.exe"],
      { env: { PATH: "/usr/bin" }, output: "inherit" }
    );
  });

  it("sets WINESERVER for wine launches without touching the request", async () => {
    const env = { PATH: "/usr/bin" };

    await createSupervisor().run({ command: ["wine", "C:\\app.exe"], env });

    expect(mockSpawnChild).toHaveBeenCalledWith(
      "/usr/bin/wine",
      ["C:\\app.exe"],
      {
        env: { PATH: "/usr/bin", WINESERVER: "/usr/lib/wine/wineserver" },
        output: "inherit",
      }
    );
    expect(env).toEqual({ PATH: "/usr/bin" });
  });

  it("raises CommandNotFoundError for an unresolvable command", async () => {
    await expect(
      createSupervisor().run({ command: ["winetricks", "-q"], env: {} })
    ).rejects.toThrow(CommandNotFoundError);
    expect(mockSpawnChild).not.toHaveBeenCalled();
  });

  it("returns a non-zero exit code instead of throwing", async () => {
    mockSpawnChild.mockResolvedValue(3);

    await expect(
      createSupervisor().run({ command: ["wine", "app.exe"], env: {} })
    ).resolves.toEqual({ exitCode: 3 });
  });

  it("wraps the resolved command in bubblewrap when sandboxed", async () => {
    await createSupervisor().run({
      command: ["wine", "C:\\app.exe"],
      env: {},
      sandbox: createSandboxPolicy("full"),
    });

    expect(mockSpawnChild).toHaveBeenCalledTimes(1);
    const [executable, args] = mockSpawnChild.mock.calls[0] ?? [];
    expect(executable).toBe("/usr/bin/bwrap");
    expect(args?.slice(-5)).toEqual([
      "/home/u",
      "/home/u",
      "--",
      "/usr/bin/wine",
      "C:\\app.exe",
    ]);
  });

  it("refuses to run sandboxed without bubblewrap", async () => {
    mockFindExecutable.mockImplementation(async command =>
      command === "bwrap" ? null : (KNOWN_BINARIES[command] ?? null)
    );

    await expect(
      createSupervisor().run({
        command: ["wine", "app.exe"],
        env: {},
        sandbox: createSandboxPolicy("strict"),
      })
    ).rejects.toThrow(SandboxUnavailableError);
    expect(mockSpawnChild).not.toHaveBeenCalled();
  });

  it("appends a header to the log and hands the child its descriptor", async () => {
    const logPath = join(tempDir, "logs", "notes", "run.log");

    const result = await createSupervisor().run({
      command: ["wine", "app.exe"],
      env: {},
      logPath,
    });
    await createSupervisor().run({
      command: ["wine", "other.exe"],
      env: {},
      logPath,
    });

    expect(result).toEqual({ exitCode: 0, logPath });
    expect(await readFile(logPath, "utf-8")).toBe(
      "\n\n$ /usr/bin/wine app.exe\n--- 2024-05-01T12:00:00.000Z ---\n" +
        "\n\n$ /usr/bin/wine other.exe\n--- 2024-05-01T12:00:00.000Z ---\n"
    );
    const options = mockSpawnChild.mock.calls[0]?.[2];
    expect(typeof options?.output).toBe("number");
  });
});

describe("formatLogHeader", () => {
  it("joins the command line and stamps the time", () => {
    expect(
      formatLogHeader(["wine", "app.exe"], new Date("2024-01-02T03:04:05.000Z"))
    ).toBe("\n\n$ wine app.exe\n--- 2024-01-02T03:04:05.000Z ---\n");
  });
});
