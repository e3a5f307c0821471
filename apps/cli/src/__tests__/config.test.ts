import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { loadConfig, ConfigError } from "../utils/config.js";

describe("loadConfig", () => {
  let dir: string;
  let path: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), "conda-portable-config-"));
    path = join(dir, "config.json");
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it("returns defaults when the file is missing", () => {
    expect(loadConfig(path)).toEqual({});
  });

  it("reads a valid file", () => {
    writeFileSync(path, JSON.stringify({ rules: ["/opt/rules.yaml"], solver_command: "conda-lock", mamba: false }));
    expect(loadConfig(path)).toEqual({ rules: ["/opt/rules.yaml"], solver_command: "conda-lock", mamba: false });
  });

  it("rejects malformed JSON", () => {
    writeFileSync(path, "{");
    expect(() => loadConfig(path)).toThrow(ConfigError);
  });

  it("rejects unknown keys", () => {
    writeFileSync(path, JSON.stringify({ solver: "conda-lock" }));
    expect(() => loadConfig(path)).toThrow(/Unrecognized key/);
  });

  it("rejects an empty target list", () => {
    writeFileSync(path, JSON.stringify({ targets: [] }));
    expect(() => loadConfig(path)).toThrow(/targets/);
  });
});
