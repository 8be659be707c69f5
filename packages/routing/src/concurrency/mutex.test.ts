import { describe, it, expect } from "vitest";
import { Mutex } from "./mutex.js";

function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}

describe("Mutex", () => {
  it("runs critical sections one at a time in call order", async () => {
    const mutex = new Mutex();
    const events: string[] = [];
    const section = (name: string) =>
      mutex.runExclusive(async () => {
        events.push(`${name}:start`);
        await tick();
        events.push(`${name}:end`);
      });

    await Promise.all([section("a"), section("b"), section("c")]);
    expect(events).toEqual(["a:start", "a:end", "b:start", "b:end", "c:start", "c:end"]);
  });

  it("releases the lock when a section throws", async () => {
    const mutex = new Mutex();
    await expect(
      mutex.runExclusive(() => {
        throw new Error("boom");
      }),
    ).rejects.toThrow("boom");
    expect(await mutex.runExclusive(() => 42)).toBe(42);
  });

  it("returns the section's value", async () => {
    const mutex = new Mutex();
    const [a, b] = await Promise.all([mutex.runExclusive(async () => "a"), mutex.runExclusive(() => "b")]);
    expect([a, b]).toEqual(["a", "b"]);
  });
});
