import { LookupCache } from "../../src/services/lookup-cache";

describe("LookupCache", () => {
  it("should return stored values until they expire", () => {
    let now = 0;
    const cache = new LookupCache<string>(1000, () => now);

    cache.set("8.8.8.8", "US");
    now = 999;
    expect(cache.get("8.8.8.8")).toBe("US");

    now = 1000;
    expect(cache.get("8.8.8.8")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("should store nothing when the TTL is zero", () => {
    const cache = new LookupCache<string>(0);

    cache.set("8.8.8.8", "US");

    expect(cache.get("8.8.8.8")).toBeUndefined();
    expect(cache.size).toBe(0);
  });

  it("should sweep expired entries when new ones are written", () => {
    let now = 0;
    const cache = new LookupCache<string>(1000, () => now);
    for (let i = 0; i < 10000; i++) {
      cache.set(`198.51.100.${i % 256}:${i}`, "US");
    }
    expect(cache.size).toBe(10000);

    now = 1000;
    cache.set("8.8.8.8", "US");

    expect(cache.size).toBe(1);
    expect(cache.get("8.8.8.8")).toBe("US");
  });

  it("should keep entries that have not expired yet", () => {
    let now = 0;
    const cache = new LookupCache<string>(1000, () => now);
    cache.set("a", "1");
    now = 500;
    cache.set("b", "2");

    now = 1200;
    cache.set("c", "3");

    expect(cache.size).toBe(2);
    expect(cache.get("a")).toBeUndefined();
    expect(cache.get("b")).toBe("2");
  });

  it("should restart the TTL when a key is written again", () => {
    let now = 0;
    const cache = new LookupCache<string>(1000, () => now);
    cache.set("a", "1");
    cache.set("b", "2");
    now = 600;
    cache.set("a", "1");

    now = 1000;
    cache.set("c", "3");

    expect(cache.get("b")).toBeUndefined();
    expect(cache.get("a")).toBe("1");
    expect(cache.size).toBe(2);
  });
});
