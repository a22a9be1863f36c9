import { describe, it, expect, vi } from "vitest";
import { TtlCache, seriesCacheKey } from "../cache-service";

describe("TtlCache", () => {
  it("computes once per key while the entry is fresh", async () => {
    const cache = new TtlCache<number>(1000, () => 0);
    const compute = vi.fn(() => 42);

    expect(await cache.getOrCompute("a", compute)).toBe(42);
    expect(await cache.getOrCompute("a", compute)).toBe(42);
    expect(compute).toHaveBeenCalledTimes(1);
    expect(cache.size).toBe(1);
  });

  it("recomputes after the lifetime passes", async () => {
    let now = 0;
    const cache = new TtlCache<number>(1000, () => now);
    const compute = vi.fn(() => now);

    await cache.getOrCompute("a", compute);
    now = 999;
    expect(await cache.getOrCompute("a", compute)).toBe(0);
    now = 1000;
    expect(await cache.getOrCompute("a", compute)).toBe(1000);
    expect(compute).toHaveBeenCalledTimes(2);
  });

  it("shares one computation between concurrent callers", async () => {
    const cache = new TtlCache<string>();
    const compute = vi.fn(async () => "series");

    const results = await Promise.all([
      cache.getOrCompute("k", compute),
      cache.getOrCompute("k", compute),
      cache.getOrCompute("k", compute),
    ]);

    expect(results).toEqual(["series", "series", "series"]);
    expect(compute).toHaveBeenCalledTimes(1);
  });

  it("does not store failures", async () => {
    const cache = new TtlCache<number>();
    const failing = vi.fn((): number => {
      throw new Error("boom");
    });

    await expect(cache.getOrCompute("k", failing)).rejects.toThrow("boom");
    expect(cache.size).toBe(0);
    expect(await cache.getOrCompute("k", () => 7)).toBe(7);
  });

  it("drops expired entries instead of keeping every key", async () => {
    let now = 0;
    const cache = new TtlCache<number>(1000, () => now);

    for (let i = 0; i < 500; i++) {
      await cache.getOrCompute(`window-${i}`, () => i);
      now += 1000;
    }

    expect(cache.size).toBe(1);
    expect(await cache.getOrCompute("window-499", () => -1)).toBe(-1);
    expect(cache.size).toBe(1);
  });

  it("keeps entries that are still fresh", async () => {
    let now = 0;
    const cache = new TtlCache<number>(1000, () => now);
    await cache.getOrCompute("a", () => 1);
    now = 500;
    await cache.getOrCompute("b", () => 2);
    expect(cache.size).toBe(2);
    now = 1200;
    await cache.getOrCompute("c", () => 3);
    expect(cache.size).toBe(2);
    expect(await cache.getOrCompute("b", () => 20)).toBe(2);
  });

  it("forgets everything on clear", async () => {
    const cache = new TtlCache<number>();
    await cache.getOrCompute("k", () => 1);
    cache.clear();
    expect(await cache.getOrCompute("k", () => 2)).toBe(2);
  });

  it("rejects a negative lifetime", () => {
    expect(() => new TtlCache<number>(-1)).toThrow(RangeError);
  });
});

describe("seriesCacheKey", () => {
  it("combines location, pollutant and window", () => {
    expect(
      seriesCacheKey({ lat: 13.74433, lon: 100.54365 }, "PM25", { start: 0, end: 3600000 })
    ).toBe("13.74433,100.54365|PM25|0-3600000");
  });
});
