import { describe, it, expect, beforeAll, afterAll } from "vitest";
import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import { which } from "../src/discovery/which.js";

// Windows has no execute bit: any existing file on PATH counts as a program there
const executableBitHonoured = os.platform() !== "win32";

describe("which", () => {
  let dir = "";
  // An explicit extension keeps lookup identical with and without PATHEXT
  const tool = "fake-latex-engine.exe";
  const data = "not-executable-tool.exe";

  beforeAll(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "make-latex-which-"));
    fs.writeFileSync(path.join(dir, tool), "#!/bin/sh\n", { mode: 0o755 });
    fs.writeFileSync(path.join(dir, data), "data", { mode: 0o644 });
  });

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("finds an executable on the given PATH", () => {
    expect(which(tool, dir)).toBe(path.join(dir, tool));
  });

  it("skips files without the execute bit where the platform has one", () => {
    expect(which(data, dir)).toBe(executableBitHonoured ? null : path.join(dir, data));
  });

  it("returns null for unknown commands", () => {
    expect(which("make-latex-no-such-tool.exe", dir)).toBeNull();
  });

  it("checks explicit paths directly", () => {
    expect(which(path.join(dir, tool), "")).toBe(path.join(dir, tool));
  });
});
