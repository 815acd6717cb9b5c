// =============================================================================
// Tests — CLI Config (.spendguardrc, environment, limit flags)
// =============================================================================

import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { readFileSync, writeFileSync, mkdirSync, rmSync, statSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";

let tempDir: string;

// Mock node:os so homedir() returns our temp directory
vi.mock("node:os", async () => {
  const actual = await vi.importActual<typeof import("node:os")>("node:os");
  return {
    ...actual,
    homedir: () => tempDir,
  };
});

describe("CLI Config", () => {
  beforeEach(() => {
    tempDir = join(tmpdir(), `spendguard-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
    mkdirSync(tempDir, { recursive: true });
    vi.resetModules();
  });

  afterEach(() => {
    rmSync(tempDir, { recursive: true, force: true });
  });

  it("loadConfig returns an empty object when no file exists", async () => {
    const { loadConfig } = await import("../config.js");
    expect(loadConfig()).toEqual({});
  });

  it("setSetting persists a parsed value", async () => {
    const { setSetting, loadConfig } = await import("../config.js");
    setSetting("maxCost", "2.5");
    setSetting("exitAtLimit", "yes");
    expect(loadConfig()).toEqual({ maxCost: 2.5, exitAtLimit: true });
  });

  it("setSetting clears a ceiling with none", async () => {
    const { setSetting, loadConfig } = await import("../config.js");
    setSetting("maxTokens", "1000");
    setSetting("maxTokens", "none");
    expect(loadConfig()).toEqual({ maxTokens: null });
  });

  it("setSetting rejects values of the wrong kind", async () => {
    const { setSetting } = await import("../config.js");
    const { ConfigValidationError } = await import("../../errors.js");
    expect(() => setSetting("maxCost", "lots")).toThrow(ConfigValidationError);
    expect(() => setSetting("showCost", "maybe")).toThrow('Invalid "showCost": expected true or false, got "maybe"');
  });

  it("unsetSetting removes a stored key", async () => {
    const { setSetting, unsetSetting, loadConfig } = await import("../config.js");
    setSetting("maxCost", "1");
    expect(unsetSetting("maxCost")).toBe(true);
    expect(unsetSetting("maxCost")).toBe(false);
    expect(loadConfig()).toEqual({});
  });

  it("saveConfig writes JSON readable only by the owner", async () => {
    const { saveConfig } = await import("../config.js");
    saveConfig({ maxCost: 3 });
    const path = join(tempDir, ".spendguardrc");
    expect(JSON.parse(readFileSync(path, "utf-8"))).toEqual({ maxCost: 3 });
    expect(statSync(path).mode & 0o777).toBe(0o600);
  });

  it("loadConfig warns and returns empty on malformed JSON", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const { loadConfig } = await import("../config.js");
    writeFileSync(join(tempDir, ".spendguardrc"), "not json", "utf-8");
    expect(loadConfig()).toEqual({});
    expect(error).toHaveBeenCalledWith("Warning: ~/.spendguardrc is corrupted or unreadable. Using empty config.");
  });

  it("loadConfig warns on values that fail validation", async () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => {});
    const { loadConfig } = await import("../config.js");
    writeFileSync(join(tempDir, ".spendguardrc"), JSON.stringify({ maxTokens: "many" }), "utf-8");
    expect(loadConfig()).toEqual({});
    expect(error).toHaveBeenCalledTimes(1);
  });
});

describe("parseLimitFlags", () => {
  it("parses --max-cost as a number", async () => {
    const { parseLimitFlags } = await import("../config.js");
    expect(parseLimitFlags({ "max-cost": "5.0" })).toEqual({ maxCost: 5 });
  });

  it("leaves absent flags out", async () => {
    const { parseLimitFlags } = await import("../config.js");
    expect(parseLimitFlags({})).toEqual({});
  });

  it("parses --max-tokens and the boolean switches", async () => {
    const { parseLimitFlags } = await import("../config.js");
    expect(parseLimitFlags({ "max-tokens": "10000", "exit-at-limit": true, "show-cost": true })).toEqual({
      maxTokens: 10000,
      exitAtLimit: true,
      showCost: true,
    });
  });

  it("rejects a fractional token ceiling", async () => {
    const { parseLimitFlags } = await import("../config.js");
    const { ConfigValidationError } = await import("../../errors.js");
    expect(() => parseLimitFlags({ "max-tokens": "1.5" })).toThrow(ConfigValidationError);
  });
});

describe("resolveSettings", () => {
  it("falls back to defaults with no sources", async () => {
    const { resolveSettings } = await import("../config.js");
    expect(resolveSettings({ rc: {}, env: {} })).toEqual({
      maxCost: null,
      maxTokens: null,
      exitAtLimit: false,
      showCost: false,
    });
  });

  it("reads ceilings from the environment", async () => {
    const { envSettings } = await import("../config.js");
    expect(envSettings({ SPENDGUARD_MAX_COST: "0.5", SPENDGUARD_SHOW_COST: "1", SPENDGUARD_MAX_TOKENS: "" })).toEqual({
      maxCost: 0.5,
      showCost: true,
    });
  });

  it("prefers flags over env over the rc file", async () => {
    const { resolveSettings } = await import("../config.js");
    const settings = resolveSettings({
      rc: { maxCost: 1, maxTokens: 100, exitAtLimit: true },
      env: { SPENDGUARD_MAX_COST: "2", SPENDGUARD_MAX_TOKENS: "200" },
      flags: { maxCost: 3 },
    });
    expect(settings).toEqual({ maxCost: 3, maxTokens: 200, exitAtLimit: true, showCost: false });
  });
});
