import { describe, it, expect } from "vitest";
import { InMemoryConfigStore } from "../in-memory-config.adapter.js";
import { readSettings } from "../../../domain/settings.schema.js";
import { ConfigValidationError } from "../../../errors.js";

describe("InMemoryConfigStore", () => {
  it("returns stored values and falls back to the default", () => {
    const store = new InMemoryConfigStore({ maxCost: 5 });
    expect(store.get("maxCost")).toBe(5);
    expect(store.get("maxTokens")).toBeUndefined();
    expect(store.get("exitAtLimit", false)).toBe(false);
  });

  it("keeps an explicit null instead of the default", () => {
    const store = new InMemoryConfigStore({ maxCost: null });
    expect(store.get("maxCost", 1)).toBeNull();
  });

  it("sets and deletes keys", () => {
    const store = new InMemoryConfigStore();
    store.set("showCost", true);
    expect(store.toJSON()).toEqual({ showCost: true });
    expect(store.delete("showCost")).toBe(true);
    expect(store.delete("showCost")).toBe(false);
  });
});

describe("readSettings", () => {
  it("fills defaults for missing and null values", () => {
    expect(readSettings(new InMemoryConfigStore({ maxTokens: null }))).toEqual({
      maxCost: null,
      maxTokens: null,
      exitAtLimit: false,
      showCost: false,
    });
  });

  it("reads valid values", () => {
    const settings = readSettings(new InMemoryConfigStore({ maxCost: 2.5, maxTokens: 1000, exitAtLimit: true }));
    expect(settings).toMatchObject({ maxCost: 2.5, maxTokens: 1000, exitAtLimit: true });
  });

  it("names the field that failed", () => {
    expect(() => readSettings(new InMemoryConfigStore({ maxTokens: 1.5 }))).toThrow(ConfigValidationError);

    let caught: unknown;
    try {
      readSettings(new InMemoryConfigStore({ exitAtLimit: "sometimes" }));
    } catch (error) {
      caught = error;
    }
    expect(caught).toBeInstanceOf(ConfigValidationError);
    expect(caught).toMatchObject({ field: "exitAtLimit", code: "CONFIG_VALIDATION_ERROR" });
  });

  it("defaults only the malformed key when a handler is given", () => {
    const invalid: ConfigValidationError[] = [];
    const settings = readSettings(
      new InMemoryConfigStore({ maxCost: 0.01, maxTokens: 100000.5, exitAtLimit: true, showCost: "yes" }),
      (error) => invalid.push(error),
    );

    expect(settings).toEqual({ maxCost: 0.01, maxTokens: null, exitAtLimit: true, showCost: false });
    expect(invalid.map((e) => e.field)).toEqual(["maxTokens", "showCost"]);
  });
});
