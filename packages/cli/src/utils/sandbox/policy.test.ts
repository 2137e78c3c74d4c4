// pattern: Functional Core
import * as fc from "fast-check";
import { pino } from "pino";
import { describe, expect, it, vi } from "vitest";

import { InvalidPolicyError } from "../errors.js";

import {
  bindDirective,
  buildIsolationArgs,
  createSandboxPolicy,
  parseSandboxMode,
  renderDirective,
} from "./policy.js";

import type { HostProbe, SandboxContext } from "./types.js";

const GLOBAL_ARGS = [
  "--unshare-all",
  "--share-net",
  "--die-with-parent",
  "--new-session",
  "--dev-bind",
  "/dev",
  "/dev",
  "--ro-bind",
  "/",
  "/",
  "--proc",
  "/proc",
  "--tmpfs",
  "/tmp",
];

const HOME = "/home/u";
const DATA_ROOT = "/home/u/.local/share/norun";

function fakeHost(
  existing: string[],
  env: Record<string, string | undefined> = {}
): HostProbe {
  const paths = new Set(existing);
  return {
    exists: path => paths.has(path),
    env,
    homeDir: HOME,
  };
}

function contextFor(host: HostProbe): SandboxContext {
  return { host, dataRoot: DATA_ROOT };
}

function bindTriples(args: string[]): string[][] {
  const rest = args.slice(GLOBAL_ARGS.length);
  const triples: string[][] = [];
  for (let i = 0; i < rest.length; i += 3) {
    triples.push(rest.slice(i, i + 3));
  }
  return triples;
}

describe("createSandboxPolicy", () => {
  it("rejects an unknown mode", () => {
    expect(() => createSandboxPolicy("loose")).toThrow(InvalidPolicyError);
    expect(() => createSandboxPolicy("loose")).toThrow(
      "Invalid sandbox mode 'loose': must be one of full, strict"
    );
  });

  it("defaults to no downloads and no extras", () => {
    const policy = createSandboxPolicy("strict");

    expect(policy).toEqual({
      mode: "strict",
      allowDownloadsDir: false,
      extraDirectives: [],
    });
  });

  it("freezes the policy and its extra directives", () => {
    const extras = [bindDirective("/srv/games")];
    const policy = createSandboxPolicy("full", { extraDirectives: extras });

    expect(Object.isFrozen(policy)).toBe(true);
    expect(Object.isFrozen(policy.extraDirectives)).toBe(true);
    expect(Object.isFrozen(policy.extraDirectives[0])).toBe(true);

    extras.push(bindDirective("/srv/other"));
    expect(policy.extraDirectives).toHaveLength(1);
  });

  it("parses known modes", () => {
    expect(parseSandboxMode("full")).toBe("full");
    expect(parseSandboxMode("strict")).toBe("strict");
    expect(() => parseSandboxMode("FULL")).toThrow(InvalidPolicyError);
  });
});

describe("renderDirective", () => {
  it("uses --bind for read-write directives", () => {
    expect(renderDirective(bindDirective("/a"))).toEqual(["--bind", "/a", "/a"]);
  });

  it("uses --ro-bind for read-only directives", () => {
    expect(
      renderDirective(bindDirective("/a", { readOnly: true, sandboxPath: "/b" }))
    ).toEqual(["--ro-bind", "/a", "/b"]);
  });

  it("gives device binds precedence over read-only", () => {
    expect(
      renderDirective(bindDirective("/dev/dri", { device: true, readOnly: true }))
    ).toEqual(["--dev-bind", "/dev/dri", "/dev/dri"]);
  });
});

describe("buildIsolationArgs", () => {
  it("binds home and Downloads in full mode with downloads allowed", () => {
    const host = fakeHost([HOME, `${HOME}/Downloads`, DATA_ROOT]);
    const policy = createSandboxPolicy("full", { allowDownloadsDir: true });

    const args = buildIsolationArgs(policy, contextFor(host));

    expect(args).toEqual([
      ...GLOBAL_ARGS,
      "--bind",
      "/home/u",
      "/home/u",
      "--bind",
      "/home/u/Downloads",
      "/home/u/Downloads",
    ]);
    expect(args).not.toContain(DATA_ROOT);
  });

  it("omits Downloads in full mode when not allowed", () => {
    const host = fakeHost([HOME, `${HOME}/Downloads`]);
    const policy = createSandboxPolicy("full");

    expect(buildIsolationArgs(policy, contextFor(host))).toEqual([
      ...GLOBAL_ARGS,
      "--bind",
      "/home/u",
      "/home/u",
    ]);
  });

  it("emits only the global arguments in strict mode when the data root is missing", () => {
    const host = fakeHost([HOME]);
    const policy = createSandboxPolicy("strict");

    expect(buildIsolationArgs(policy, contextFor(host))).toEqual(GLOBAL_ARGS);
  });

  it("builds the full strict directive list on a desktop session", () => {
    const host = fakeHost(
      [
        HOME,
        `${HOME}/Downloads`,
        DATA_ROOT,
        "/dev/dri",
        "/run/user/1000",
        "/run/user/1000/xauth",
        "/tmp/.X11-unix",
        "/tmp/.ICE-unix",
      ],
      {
        XDG_RUNTIME_DIR: "/run/user/1000",
        DISPLAY: ":0",
        XAUTHORITY: "/run/user/1000/xauth",
      }
    );
    const policy = createSandboxPolicy("strict", { allowDownloadsDir: true });

    expect(bindTriples(buildIsolationArgs(policy, contextFor(host)))).toEqual([
      ["--dev-bind", "/dev/dri", "/dev/dri"],
      ["--bind", "/run/user/1000", "/run/user/1000"],
      ["--bind", "/tmp/.X11-unix", "/tmp/.X11-unix"],
      ["--bind", "/tmp/.ICE-unix", "/tmp/.ICE-unix"],
      ["--bind", DATA_ROOT, DATA_ROOT],
      ["--bind", "/home/u/Downloads", "/home/u/Downloads"],
      ["--ro-bind", "/run/user/1000/xauth", "/run/user/1000/xauth"],
    ]);
  });

  it("falls back to ~/.Xauthority when XAUTHORITY is unset", () => {
    const host = fakeHost([`${HOME}/.Xauthority`]);
    const policy = createSandboxPolicy("strict");

    expect(bindTriples(buildIsolationArgs(policy, contextFor(host)))).toEqual([
      ["--ro-bind", "/home/u/.Xauthority", "/home/u/.Xauthority"],
    ]);
  });

  it("skips X11 sockets when DISPLAY is unset", () => {
    const host = fakeHost([HOME, "/tmp/.X11-unix", "/tmp/.ICE-unix"]);
    const policy = createSandboxPolicy("full");

    expect(bindTriples(buildIsolationArgs(policy, contextFor(host)))).toEqual([
      ["--bind", "/home/u", "/home/u"],
    ]);
  });

  it("appends extras last and drops missing ones with a warning", () => {
    const logger = pino({ level: "silent" });
    const warn = vi.spyOn(logger, "warn");
    const host = fakeHost([HOME, "/srv/games"]);
    const policy = createSandboxPolicy("full", {
      extraDirectives: [
        bindDirective("/srv/missing"),
        bindDirective("/srv/games", { readOnly: true }),
      ],
    });

    expect(
      bindTriples(buildIsolationArgs(policy, contextFor(host), logger))
    ).toEqual([
      ["--bind", "/home/u", "/home/u"],
      ["--ro-bind", "/srv/games", "/srv/games"],
    ]);
    expect(warn).toHaveBeenCalledWith(
      { path: "/srv/missing" },
      "Skipping non-existent extra bind path"
    );
  });

  describe("properties", () => {
    const candidatePaths = [
      HOME,
      `${HOME}/Downloads`,
      `${HOME}/.Xauthority`,
      DATA_ROOT,
      "/dev/dri",
      "/run/user/1000",
      "/tmp/.X11-unix",
      "/tmp/.ICE-unix",
      "/srv/extra",
    ];

    const scenarioArbitrary = fc.record({
      mode: fc.constantFrom("full", "strict"),
      allowDownloadsDir: fc.boolean(),
      existing: fc.subarray(candidatePaths),
      runtimeDir: fc.constantFrom(undefined, "/run/user/1000"),
      display: fc.constantFrom(undefined, ":0"),
      withExtra: fc.boolean(),
    });

    function buildScenario(scenario: {
      mode: string;
      allowDownloadsDir: boolean;
      existing: string[];
      runtimeDir: string | undefined;
      display: string | undefined;
      withExtra: boolean;
    }): { host: HostProbe; args: string[] } {
      const host = fakeHost(scenario.existing, {
        XDG_RUNTIME_DIR: scenario.runtimeDir,
        DISPLAY: scenario.display,
      });
      const policy = createSandboxPolicy(scenario.mode, {
        allowDownloadsDir: scenario.allowDownloadsDir,
        extraDirectives: scenario.withExtra ? [bindDirective("/srv/extra")] : [],
      });
      return { host, args: buildIsolationArgs(policy, contextFor(host)) };
    }

    it("never emits a bind for a missing host path", () => {
      fc.assert(
        fc.property(scenarioArbitrary, scenario => {
          const { host, args } = buildScenario(scenario);

          for (const [, hostPath] of bindTriples(args)) {
            expect(hostPath !== undefined && host.exists(hostPath)).toBe(true);
          }
        }),
        { numRuns: 200 }
      );
    });

    it("always starts with the global isolation arguments", () => {
      fc.assert(
        fc.property(scenarioArbitrary, scenario => {
          const { args } = buildScenario(scenario);
          expect(args.slice(0, GLOBAL_ARGS.length)).toEqual(GLOBAL_ARGS);
        })
      );
    });

    it("binds home in full mode and never in strict mode", () => {
      fc.assert(
        fc.property(scenarioArbitrary, scenario => {
          const { args } = buildScenario(scenario);
          const bindsHome = bindTriples(args).some(
            ([, hostPath]) => hostPath === HOME
          );

          expect(bindsHome).toBe(
            scenario.mode === "full" && scenario.existing.includes(HOME)
          );
        })
      );
    });

    it("binds Downloads exactly when allowed and present", () => {
      fc.assert(
        fc.property(scenarioArbitrary, scenario => {
          const { args } = buildScenario(scenario);
          const bindsDownloads = bindTriples(args).some(
            ([, hostPath]) => hostPath === `${HOME}/Downloads`
          );

          expect(bindsDownloads).toBe(
            scenario.allowDownloadsDir &&
              scenario.existing.includes(`${HOME}/Downloads`)
          );
        })
      );
    });
  });
});
