import { describe, expect, it } from "vitest";
import { GeminiKeyPool } from "./key-pool.js";

describe("GeminiKeyPool", () => {
  it("collects numbered keys from the environment in name order", () => {
    const keys = GeminiKeyPool.keysFromEnv({
      GEMINI_KEY_2: "test-key-b",
      OTHER: "ignored",
      GEMINI_KEY_1: "test-key-a",
      GEMINI_KEY_3: ""
    });

    expect(keys).toEqual(["test-key-a", "test-key-b"]);
  });

  it("orders keys by number rather than text", () => {
    const keys = GeminiKeyPool.keysFromEnv({
      GEMINI_KEY_10: "test-key-10",
      GEMINI_KEY_BACKUP: "test-key-backup",
      GEMINI_KEY_2: "test-key-2",
      GEMINI_KEY_1: "test-key-1"
    });

    expect(keys).toEqual(["test-key-1", "test-key-2", "test-key-10", "test-key-backup"]);
  });

  it("drops duplicates and blanks", () => {
    expect(new GeminiKeyPool(["k1", "", "k1", "k2"]).size()).toBe(2);
  });

  it("throws when empty", () => {
    expect(() => new GeminiKeyPool([]).next()).toThrow("No keys available in the pool.");
  });

  it("spreads concurrent requests across keys", () => {
    let now = 0;
    const pool = new GeminiKeyPool(["k1", "k2"], () => ++now);

    expect([pool.next(), pool.next()]).toEqual(["k1", "k2"]);
  });

  it("prefers the least recently used key once released", () => {
    let now = 0;
    const pool = new GeminiKeyPool(["k1", "k2"], () => ++now);

    pool.release(pool.next());
    expect(pool.next()).toBe("k2");
  });

  it("moves a rate-limited key to the back", () => {
    let now = 0;
    const pool = new GeminiKeyPool(["k1", "k2", "k3"], () => ++now);

    const first = pool.next();
    pool.deprioritize(first);
    const second = pool.next();
    pool.release(second);
    pool.release(pool.next());

    expect(first).toBe("k1");
    expect(second).toBe("k2");
    // k1 still carries a failure, so k2 and k3 come first
    expect(pool.next()).toBe("k2");
  });
});
