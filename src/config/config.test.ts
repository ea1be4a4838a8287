import { describe, it, expect, afterEach } from "vitest";
import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { defaultEngineConfig, validateEngineConfig } from "./schema.js";
import { loadEngineConfig, mergeConfig, resolveEngineConfig } from "./loader.js";
import { ConfigError, InvalidInputError } from "../errors.js";

describe("engine config schema", () => {
  it("fills every default", () => {
    expect(defaultEngineConfig()).toEqual({
      simultaneityWindowSeconds: 0.25,
      holdMinBeats: 1,
      holdReleaseToleranceBeats: 0.1,
      countdownSeconds: 3,
      fallbackTempo: 120,
      timing: { earlySeconds: 0.1, lateSeconds: 0.1 },
      hands: { left: true, right: true },
      mode: "practice",
    });
  });

  it("keeps nested defaults when one nested field is given", () => {
    const config = resolveEngineConfig({ timing: { lateSeconds: 0.2 }, hands: { left: false } });
    expect(config.timing).toEqual({ earlySeconds: 0.1, lateSeconds: 0.2 });
    expect(config.hands).toEqual({ left: false, right: true });
  });

  it("reports issues by field path", () => {
    const issues = validateEngineConfig({ mode: "fast", timing: { earlySeconds: -1 } });
    expect(issues.map((i) => i.field).sort()).toEqual(["mode", "timing.earlySeconds"]);
  });

  it("throws ConfigError with the issue list", () => {
    let caught: unknown;
    try {
      resolveEngineConfig({ countdownSeconds: "three" });
    } catch (err) {
      caught = err;
    }
    expect(caught).toBeInstanceOf(ConfigError);
    if (caught instanceof ConfigError) {
      expect(caught.code).toBe("INVALID_CONFIG");
      expect(caught.issues.map((i) => i.field)).toEqual(["countdownSeconds"]);
    }
  });
});

describe("loadEngineConfig", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  function writeConfig(content: string): string {
    dir = mkdtempSync(join(tmpdir(), "keyline-config-"));
    const path = join(dir, "engine.json");
    writeFileSync(path, content);
    return path;
  }

  it("loads a file and applies overrides on top", () => {
    const path = writeConfig(JSON.stringify({ mode: "tempo", timing: { earlySeconds: 0.05 } }));
    const config = loadEngineConfig(path, { timing: { lateSeconds: 0.3 }, countdownSeconds: 0 });

    expect(config.mode).toBe("tempo");
    expect(config.countdownSeconds).toBe(0);
    expect(config.timing).toEqual({ earlySeconds: 0.05, lateSeconds: 0.3 });
  });

  it("rejects a missing file", () => {
    expect(() => loadEngineConfig("/nonexistent/keyline/engine.json")).toThrow(InvalidInputError);
  });

  it("rejects invalid JSON", () => {
    const path = writeConfig("{ mode: ");
    expect(() => loadEngineConfig(path)).toThrow(ConfigError);
  });
});

describe("mergeConfig", () => {
  it("skips undefined overrides and replaces scalars", () => {
    expect(mergeConfig({ mode: "tempo", countdownSeconds: 2 }, { mode: undefined, countdownSeconds: 1 })).toEqual({
      mode: "tempo",
      countdownSeconds: 1,
    });
  });
});
