// pattern: Imperative Shell
import { mkdtemp, readFile, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { ValidationError } from "../utils/errors.js";

import { FileAppConfigStore } from "./store.js";

import type { AppConfig } from "./types/app-config.js";

describe("FileAppConfigStore", () => {
  let tempDir: string;
  let store: FileAppConfigStore;

  const notes: AppConfig = {
    version: 1,
    name: "notes",
    profile: "general",
    runner: "wine",
    prefix: "/data/prefixes/notes",
    sandbox: true,
    sandboxMode: "strict",
  };

  beforeEach(async () => {
    tempDir = await mkdtemp(join(tmpdir(), "norun-store-"));
    store = new FileAppConfigStore(join(tempDir, "apps"));
  });

  afterEach(async () => {
    await rm(tempDir, { recursive: true, force: true });
  });

  it("returns null for an unknown app", async () => {
    await expect(store.load("missing")).resolves.toBeNull();
  });

  it("saves and loads a config", async () => {
    await store.save(notes);

    await expect(store.load("notes")).resolves.toEqual(notes);
  });

  it("writes YAML to <dir>/<name>.yaml", async () => {
    await store.save({ ...notes, lastExe: "C:\\Program Files\\Notes\\notes.exe" });

    const content = await readFile(join(tempDir, "apps", "notes.yaml"), "utf8");
    expect(content).toContain("name: notes\n");
    expect(content).toContain("sandboxMode: strict\n");
    expect(content).toContain("lastExe: C:\\Program Files\\Notes\\notes.exe\n");
  });

  it("rejects a config that fails validation", async () => {
    await store.save(notes);
    await writeFile(
      join(tempDir, "apps", "notes.yaml"),
      "version: 1\nname: notes\nprofile: general\nrunner: dosbox\nprefix: /p\nsandbox: false\nsandboxMode: full\n"
    );

    await expect(store.load("notes")).rejects.toThrow(ValidationError);
  });

  it("lists app names in sorted order", async () => {
    await store.save({ ...notes, name: "zip" });
    await store.save(notes);
    await writeFile(join(tempDir, "apps", "README.txt"), "ignored");

    await expect(store.list()).resolves.toEqual(["notes", "zip"]);
  });

  it("lists nothing before the directory exists", async () => {
    await expect(store.list()).resolves.toEqual([]);
  });

  it("removes a config and tolerates a missing one", async () => {
    await store.save(notes);

    await store.remove("notes");
    await store.remove("notes");

    await expect(store.load("notes")).resolves.toBeNull();
  });
});
