import type { GeocodeResult } from "../../packages/shared/src/site-contracts.js";
import { buildGeocodeCacheKey, type GeocodeJsonCache } from "./geocode-json-cache.js";
import type { GeocodeSearchClient } from "./nominatim-client.js";

export type SiteLookupOutcome =
  | "CACHE_HIT"
  | "CACHE_MISS_RECORDED"
  | "LOOKUP_SUCCESS"
  | "EMPTY_RESULT"
  | "TRANSPORT_ERROR"
  | "SKIPPED_BLANK";

export interface SiteLookupAttempt {
  query: string;
  cacheKey: string | null;
  outcome: SiteLookupOutcome;
}

export type SiteResolution =
  | {
      status: "RESOLVED";
      result: GeocodeResult;
      query: string;
      attempts: SiteLookupAttempt[];
    }
  | {
      status: "NOT_FOUND";
      attempts: SiteLookupAttempt[];
    }
  | {
      status: "TRANSPORT_ERROR";
      query: string;
      httpStatus: number | null;
      errorMessage: string;
      attempts: SiteLookupAttempt[];
    };

/**
 * Walks query candidates against the cache and the search client until one
 * resolves. Every network answer, including an empty one, is cached so that
 * the same candidate text is never sent twice.
 */
export class SiteGeocoder {
  private readonly cache: GeocodeJsonCache;

  private readonly client: GeocodeSearchClient;

  private readonly cacheContext: string | null;

  private readonly recordQueryUsed: boolean;

  constructor(options: {
    cache: GeocodeJsonCache;
    client: GeocodeSearchClient;
    cacheContext?: string | null;
    recordQueryUsed?: boolean;
  }) {
    this.cache = options.cache;
    this.client = options.client;
    this.cacheContext = options.cacheContext ?? null;
    this.recordQueryUsed = options.recordQueryUsed ?? false;
  }

  async resolve(candidates: readonly string[]): Promise<SiteResolution> {
    const attempts: SiteLookupAttempt[] = [];

    for (const rawCandidate of candidates) {
      const query = rawCandidate.trim();
      if (!query) {
        attempts.push({ query, cacheKey: null, outcome: "SKIPPED_BLANK" });
        continue;
      }

      const cacheKey = buildGeocodeCacheKey(query, this.cacheContext);

      if (this.cache.has(cacheKey)) {
        const cached = this.cache.get(cacheKey);
        if (cached) {
          attempts.push({ query, cacheKey, outcome: "CACHE_HIT" });
          return { status: "RESOLVED", result: cached, query, attempts };
        }

        // A recorded miss ends the walk just as a recorded hit does.
        attempts.push({ query, cacheKey, outcome: "CACHE_MISS_RECORDED" });
        return { status: "NOT_FOUND", attempts };
      }

      const lookup = await this.client.search(query);

      if (lookup.kind === "TRANSPORT_ERROR") {
        attempts.push({ query, cacheKey, outcome: "TRANSPORT_ERROR" });
        return {
          status: "TRANSPORT_ERROR",
          query,
          httpStatus: lookup.httpStatus,
          errorMessage: lookup.errorMessage,
          attempts
        };
      }

      if (lookup.kind === "NOT_FOUND") {
        this.cache.put(cacheKey, null);
        attempts.push({ query, cacheKey, outcome: "EMPTY_RESULT" });
        continue;
      }

      const result: GeocodeResult = this.recordQueryUsed
        ? { ...lookup.result, query_used: query }
        : lookup.result;

      this.cache.put(cacheKey, result);
      attempts.push({ query, cacheKey, outcome: "LOOKUP_SUCCESS" });
      return { status: "RESOLVED", result, query, attempts };
    }

    return { status: "NOT_FOUND", attempts };
  }
}

export const countNetworkLookups = (attempts: readonly SiteLookupAttempt[]): number =>
  attempts.filter(
    (attempt) =>
      attempt.outcome === "LOOKUP_SUCCESS" ||
      attempt.outcome === "EMPTY_RESULT" ||
      attempt.outcome === "TRANSPORT_ERROR"
  ).length;

export const countCacheHits = (attempts: readonly SiteLookupAttempt[]): number =>
  attempts.filter(
    (attempt) => attempt.outcome === "CACHE_HIT" || attempt.outcome === "CACHE_MISS_RECORDED"
  ).length;
