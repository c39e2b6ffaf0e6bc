import { describe, expect, it, vi } from "vitest";
import { BoundedMap } from "./bounded-map.js";

describe("BoundedMap", () => {
  it("rejects a non-positive maxSize", () => {
    expect(() => new BoundedMap<string, number>({ maxSize: 0 })).toThrow("maxSize must be positive");
  });

  it("evicts the least recently used entry at capacity", () => {
    const onEvict = vi.fn();
    const map = new BoundedMap<string, number>({ maxSize: 2, onEvict });
    map.set("a", 1).set("b", 2);
    expect(map.get("a")).toBe(1); // touch a, so b is now the oldest
    map.set("c", 3);

    expect(map.has("a")).toBe(true);
    expect(map.has("b")).toBe(false);
    expect(map.has("c")).toBe(true);
    expect(onEvict).toHaveBeenCalledWith("b", 2);
    expect(map.getStats()).toEqual({ size: 2, maxSize: 2, evictionCount: 1, expiredCount: 0 });
  });

  it("updates an existing key without evicting", () => {
    const map = new BoundedMap<string, number>({ maxSize: 2 });
    map.set("a", 1).set("b", 2).set("a", 10);
    expect(map.size).toBe(2);
    expect(map.get("a")).toBe(10);
    expect(map.getStats().evictionCount).toBe(0);
  });

  it("expires entries after the TTL, measured from insertion", () => {
    let now = 0;
    const map = new BoundedMap<string, string>({ maxSize: 10, ttlMs: 100, clock: () => now });
    map.set("k", "v");

    now = 100;
    expect(map.get("k")).toBe("v");
    now = 101;
    expect(map.has("k")).toBe(false);
    expect(map.size).toBe(0);
    expect(map.getStats().expiredCount).toBe(1);
  });

  it("keeps the original insertion time when a key is overwritten", () => {
    let now = 0;
    const map = new BoundedMap<string, number>({ maxSize: 10, ttlMs: 100, clock: () => now });
    map.set("k", 1);
    now = 80;
    map.set("k", 2);
    now = 120;
    expect(map.has("k")).toBe(false);
  });

  it("purges every expired entry at once", () => {
    let now = 0;
    const map = new BoundedMap<string, number>({ maxSize: 10, ttlMs: 50, clock: () => now });
    map.set("a", 1).set("b", 2);
    now = 30;
    map.set("c", 3);
    now = 60;

    expect(map.purgeExpired()).toBe(2);
    expect(map.has("c")).toBe(true);
    expect(map.size).toBe(1);
  });

  it("never purges without a TTL", () => {
    const map = new BoundedMap<string, number>({ maxSize: 3 });
    map.set("a", 1);
    expect(map.purgeExpired(Number.MAX_SAFE_INTEGER)).toBe(0);
    expect(map.size).toBe(1);
  });
});
