import { mkdtempSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, it, expect } from "vitest";
import { ZodError } from "zod";
import {
  configFromEnv,
  deepMerge,
  getHardcodedDefaults,
  loadNavigationConfig,
} from "./navigation-config.js";

function writeConfig(contents: string): string {
  const dir = mkdtempSync(join(tmpdir(), "waymark-config-"));
  const file = join(dir, "default.json");
  writeFileSync(file, contents);
  return file;
}

describe("deepMerge", () => {
  it("overrides leaves and keeps untouched keys", () => {
    expect(deepMerge({ a: 1, nested: { b: 2, c: 3 } }, { nested: { c: 4 }, d: 5 })).toEqual({
      a: 1,
      nested: { b: 2, c: 4 },
      d: 5,
    });
  });

  it("skips undefined source values", () => {
    expect(deepMerge({ a: 1 }, { a: undefined })).toEqual({ a: 1 });
  });
});

describe("loadNavigationConfig", () => {
  it("reads the repository defaults", () => {
    expect(loadNavigationConfig()).toEqual(getHardcodedDefaults());
  });

  it("layers the file and overrides over built-in defaults", () => {
    const file = writeConfig(JSON.stringify({ debounceMs: 750, topology: "annex" }));
    const config = loadNavigationConfig({ topology: "lab" }, file);
    expect(config.debounceMs).toBe(750);
    expect(config.topology).toBe("lab");
    expect(config.idleScanMs).toBe(60_000);
  });

  it("falls back to built-in defaults when the file is missing", () => {
    const config = loadNavigationConfig({}, join(tmpdir(), "waymark-missing", "nope.json"));
    expect(config).toEqual(getHardcodedDefaults());
  });

  it("rejects invalid values", () => {
    const file = writeConfig(JSON.stringify({ debounceMs: -1 }));
    expect(() => loadNavigationConfig({}, file)).toThrow(ZodError);
  });

  it("rejects a file that is not an object", () => {
    const file = writeConfig("[1, 2]");
    expect(() => loadNavigationConfig({}, file)).toThrow("must contain a JSON object");
  });
});

describe("configFromEnv", () => {
  it("picks up topology and debounce", () => {
    expect(configFromEnv({ WAYMARK_TOPOLOGY: "annex", WAYMARK_DEBOUNCE_MS: "1500" })).toEqual({
      topology: "annex",
      debounceMs: 1500,
    });
  });

  it("returns no overrides for an empty environment", () => {
    expect(configFromEnv({})).toEqual({});
  });
});
