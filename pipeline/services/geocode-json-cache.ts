import { createHash } from "node:crypto";
import { z } from "zod";
import type {
  GeocodeCacheRecord,
  GeocodeCacheValue
} from "../../packages/shared/src/site-contracts.js";
import { readJsonFile, writeJsonFile } from "../utils/fs-cache.js";

const geocodeResultSchema = z.object({
  lat: z.number(),
  lon: z.number(),
  display_name: z.string(),
  query_used: z.string().optional()
});

const geocodeCacheFileSchema = z.record(z.string(), geocodeResultSchema.nullable());

/**
 * Cache keys are MD5 digests of the exact query text. The optional context
 * tag keeps lookups made under different search constraints apart even when
 * the query text is identical.
 */
export const buildGeocodeCacheKey = (query: string, context?: string | null): string => {
  const keySource = context ? `${query}|${context}` : query;
  return createHash("md5").update(keySource, "utf8").digest("hex");
};

/**
 * Append-only geocode cache persisted as one pretty-printed JSON object.
 * Held in memory for a run and written back once with `save()`.
 */
export class GeocodeJsonCache {
  private readonly filePath: string;

  private readonly entries: Map<string, GeocodeCacheValue>;

  private newEntryCount = 0;

  private constructor(filePath: string, entries: Map<string, GeocodeCacheValue>) {
    this.filePath = filePath;
    this.entries = entries;
  }

  static empty(filePath: string): GeocodeJsonCache {
    return new GeocodeJsonCache(filePath, new Map());
  }

  static async load(filePath: string): Promise<GeocodeJsonCache> {
    const contents = await readJsonFile(filePath);
    if (!contents.found) {
      return GeocodeJsonCache.empty(filePath);
    }

    const parseResult = geocodeCacheFileSchema.safeParse(contents.value);
    if (!parseResult.success) {
      const firstIssue = parseResult.error.issues[0];
      const location = firstIssue?.path.join(".") || "(root)";
      throw new Error(
        `Geocode cache ${filePath} is not a valid cache file (${location}: ${firstIssue?.message ?? "invalid"}). Fix or remove it before re-running.`
      );
    }

    return new GeocodeJsonCache(filePath, new Map(Object.entries(parseResult.data)));
  }

  get path(): string {
    return this.filePath;
  }

  get size(): number {
    return this.entries.size;
  }

  /**
   * Number of keys added since the cache was loaded.
   */
  get addedCount(): number {
    return this.newEntryCount;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  /**
   * `undefined` when the key was never looked up, `null` when it was looked
   * up and confirmed absent.
   */
  get(key: string): GeocodeCacheValue | undefined {
    return this.entries.get(key);
  }

  /**
   * Records a lookup. Keys that already exist are left as they are.
   */
  put(key: string, value: GeocodeCacheValue): void {
    if (this.entries.has(key)) {
      return;
    }

    this.entries.set(key, value === null ? null : { ...value });
    this.newEntryCount += 1;
  }

  toRecord(): GeocodeCacheRecord {
    return Object.fromEntries(this.entries);
  }

  async save(): Promise<void> {
    await writeJsonFile(this.filePath, this.toRecord(), { pretty: true });
  }
}
