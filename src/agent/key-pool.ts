const KEY_PREFIX = "GEMINI_KEY_";

interface PooledKey {
  key: string;
  inFlight: number;
  lastUsed: number;
  failures: number;
}

/**
 * Round-robins Gemini API keys, preferring keys with the fewest in-flight
 * requests and the fewest recent quota failures.
 */
export class GeminiKeyPool {
  private keys: PooledKey[];

  constructor(keys: string[], private clock: () => number = Date.now) {
    this.keys = [...new Set(keys.filter(Boolean))].map(key => ({ key, inFlight: 0, lastUsed: 0, failures: 0 }));
  }

  /**
   * Collects GEMINI_KEY_1, GEMINI_KEY_2, ... from an environment map,
   * ordered by number. Names without a numeric suffix come last, by name.
   */
  static keysFromEnv(env: NodeJS.ProcessEnv): string[] {
    const suffix = (name: string) => {
      const n = Number(name.slice(KEY_PREFIX.length));
      return Number.isInteger(n) ? n : Number.POSITIVE_INFINITY;
    };
    return Object.keys(env)
      .filter(name => name.startsWith(KEY_PREFIX))
      .sort((a, b) => suffix(a) - suffix(b) || a.localeCompare(b))
      .map(name => env[name] ?? "")
      .filter(Boolean);
  }

  size(): number {
    return this.keys.length;
  }

  next(): string {
    if (this.keys.length === 0) {
      throw new Error("No keys available in the pool.");
    }

    this.keys.sort((a, b) =>
      a.failures - b.failures ||
      a.inFlight - b.inFlight ||
      a.lastUsed - b.lastUsed
    );

    const entry = this.keys[0];
    entry.inFlight++;
    entry.lastUsed = this.clock();
    return entry.key;
  }

  release(key: string) {
    const entry = this.keys.find(k => k.key === key);
    if (entry) {
      entry.inFlight = Math.max(0, entry.inFlight - 1);
      entry.failures = 0;
    }
  }

  /** Pushes a key that hit a quota/rate limit to the back of the queue. */
  deprioritize(key: string) {
    const entry = this.keys.find(k => k.key === key);
    if (entry) {
      entry.inFlight = Math.max(0, entry.inFlight - 1);
      entry.failures++;
      entry.lastUsed = this.clock();
    }
  }
}
