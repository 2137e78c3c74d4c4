// pattern: Imperative Shell
import { mkdir, mkdtemp, rm, writeFile } from "node:fs/promises";
import { tmpdir } from "node:os";
import { dirname, join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";

import { detectExecutable, toDriveCPath } from "./index.js";

describe("detectExecutable", () => {
  let prefix: string;

  async function touch(relativePath: string): Promise<void> {
    const fullPath = join(prefix, "drive_c", relativePath);
    await mkdir(dirname(fullPath), { recursive: true });
    await writeFile(fullPath, "");
  }

  beforeEach(async () => {
    prefix = await mkdtemp(join(tmpdir(), "norun-exe-detector-"));
  });

  afterEach(async () => {
    await rm(prefix, { recursive: true, force: true });
  });

  it("returns null for an empty prefix", async () => {
    await expect(detectExecutable(prefix)).resolves.toBeNull();
  });

  it("skips the uninstaller and renders a C: path", async () => {
    await touch("Program Files/MyApp/uninstaller.exe");
    await touch("Program Files/MyApp/app.exe");

    await expect(detectExecutable(prefix)).resolves.toBe(
      "C:\\Program Files\\MyApp\\app.exe"
    );
  });

  it("scans Program Files (x86) and matches upper-case extensions", async () => {
    await touch("Program Files (x86)/Game/Game.EXE");
    await touch("Program Files (x86)/Common Files/Shared/helper.exe");

    await expect(detectExecutable(prefix)).resolves.toBe(
      "C:\\Program Files (x86)\\Game\\Game.EXE"
    );
  });

  it("finds executables inside hidden directories", async () => {
    await touch("Program Files/.portable/tool.exe");

    await expect(detectExecutable(prefix)).resolves.toBe(
      "C:\\Program Files\\.portable\\tool.exe"
    );
  });

  it("ignores executables outside Program Files", async () => {
    await touch("windows/system32/winver.exe");
    await touch("users/u/Desktop/thing.exe");

    await expect(detectExecutable(prefix)).resolves.toBeNull();
  });

  it("returns the same answer on repeated scans", async () => {
    await touch("Program Files/A/b.exe");
    await touch("Program Files/B/a.exe");

    const first = await detectExecutable(prefix);
    const second = await detectExecutable(prefix);

    expect(first).toBe("C:\\Program Files\\A\\b.exe");
    expect(second).toBe(first);
  });
});

describe("toDriveCPath", () => {
  it("converts separators", () => {
    expect(toDriveCPath("Program Files/App/app.exe")).toBe(
      "C:\\Program Files\\App\\app.exe"
    );
  });
});
