import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  GeocodeJsonCache,
  buildGeocodeCacheKey
} from "../../pipeline/services/geocode-json-cache.js";

describe("buildGeocodeCacheKey", () => {
  it("hashes the bare query when no context is given", () => {
    // md5("abc")
    expect(buildGeocodeCacheKey("abc")).toBe("900150983cd24fb0d6963f7d28e17f72");
  });

  it("separates identical queries made under different contexts", () => {
    const bare = buildGeocodeCacheKey("Smith Pier");
    const bounded = buildGeocodeCacheKey("Smith Pier", "DE_VIEWBOX_US");

    expect(bounded).not.toBe(bare);
    expect(bounded).toBe(buildGeocodeCacheKey("Smith Pier|DE_VIEWBOX_US"));
    expect(bounded).toMatch(/^[0-9a-f]{32}$/);
  });
});

describe("GeocodeJsonCache", () => {
  let temporaryDirectory: string;

  beforeEach(() => {
    temporaryDirectory = mkdtempSync(join(tmpdir(), "shellfish-geocode-cache-"));
  });

  afterEach(() => {
    rmSync(temporaryDirectory, { recursive: true, force: true });
  });

  it("starts empty when no cache file exists", async () => {
    const cache = await GeocodeJsonCache.load(join(temporaryDirectory, "missing.json"));
    expect(cache.size).toBe(0);
    expect(cache.get("anything")).toBeUndefined();
  });

  it("distinguishes confirmed-absent entries from unknown keys", async () => {
    const cache = GeocodeJsonCache.empty(join(temporaryDirectory, "cache.json"));
    cache.put("absent", null);

    expect(cache.has("absent")).toBe(true);
    expect(cache.get("absent")).toBeNull();
    expect(cache.has("unknown")).toBe(false);
    expect(cache.get("unknown")).toBeUndefined();
  });

  it("never overwrites an existing key", () => {
    const cache = GeocodeJsonCache.empty(join(temporaryDirectory, "cache.json"));
    cache.put("key", null);
    cache.put("key", { lat: 1, lon: 2, display_name: "Later" });

    expect(cache.get("key")).toBeNull();
    expect(cache.addedCount).toBe(1);
  });

  it("persists pretty-printed JSON and reloads it", async () => {
    const cachePath = join(temporaryDirectory, "nested", "cache.json");
    const cache = GeocodeJsonCache.empty(cachePath);
    cache.put("hit", { lat: 39, lon: -75.3, display_name: "Smith Pier, Delaware" });
    cache.put("miss", null);
    await cache.save();

    expect(readFileSync(cachePath, "utf8")).toBe(
      [
        "{",
        '  "hit": {',
        '    "lat": 39,',
        '    "lon": -75.3,',
        '    "display_name": "Smith Pier, Delaware"',
        "  },",
        '  "miss": null',
        "}"
      ].join("\n")
    );

    const reloaded = await GeocodeJsonCache.load(cachePath);
    expect(reloaded.size).toBe(2);
    expect(reloaded.addedCount).toBe(0);
    expect(reloaded.get("hit")).toEqual({
      lat: 39,
      lon: -75.3,
      display_name: "Smith Pier, Delaware"
    });
    expect(reloaded.get("miss")).toBeNull();
  });

  it("keeps the query that produced a fallback hit", async () => {
    const cachePath = join(temporaryDirectory, "cache.json");
    writeFileSync(
      cachePath,
      JSON.stringify({
        k: { lat: 38.5, lon: -75.1, display_name: "Somewhere", query_used: "Somewhere, DE" }
      })
    );

    const cache = await GeocodeJsonCache.load(cachePath);
    expect(cache.get("k")?.query_used).toBe("Somewhere, DE");
  });

  it("rejects a cache file that is not a mapping of results", async () => {
    const cachePath = join(temporaryDirectory, "cache.json");
    writeFileSync(cachePath, JSON.stringify({ k: { lat: "north" } }));

    await expect(GeocodeJsonCache.load(cachePath)).rejects.toThrow("not a valid cache file");
  });

  it("rejects a cache file holding a bare null instead of treating it as absent", async () => {
    const cachePath = join(temporaryDirectory, "cache.json");
    writeFileSync(cachePath, "null");

    await expect(GeocodeJsonCache.load(cachePath)).rejects.toThrow(
      "is not a valid cache file ((root): Expected object, received null)"
    );
  });

  it("rejects a cache file that is not JSON", async () => {
    const cachePath = join(temporaryDirectory, "cache.json");
    writeFileSync(cachePath, "{not json");

    await expect(GeocodeJsonCache.load(cachePath)).rejects.toThrow("Invalid JSON in");
  });
});
