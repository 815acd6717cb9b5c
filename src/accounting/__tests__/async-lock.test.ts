import { describe, it, expect } from "vitest";
import { AsyncLock } from "../async-lock.js";

function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe("AsyncLock", () => {
  it("runs sections one at a time in call order", async () => {
    const lock = new AsyncLock();
    const events: string[] = [];

    const section = (name: string) => async () => {
      events.push(`${name}:start`);
      await tick();
      events.push(`${name}:end`);
      return name;
    };

    const results = await Promise.all([
      lock.runExclusive(section("a")),
      lock.runExclusive(section("b")),
      lock.runExclusive(section("c")),
    ]);

    expect(results).toEqual(["a", "b", "c"]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
  });

  it("releases the lock when a section throws", async () => {
    const lock = new AsyncLock();

    await expect(
      lock.runExclusive(() => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");

    await expect(lock.runExclusive(() => 42)).resolves.toBe(42);
  });
});
