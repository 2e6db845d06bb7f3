import { z } from "zod";
import type { GeocodeResult } from "../../packages/shared/src/site-contracts.js";

export const DEFAULT_NOMINATIM_BASE_URL = "https://nominatim.openstreetmap.org";
export const DEFAULT_NOMINATIM_USER_AGENT =
  "shellfish-site-map/1.0 (contact: maintainer@example.org; purpose: shellfish survey site map)";
export const DEFAULT_REQUEST_DELAY_MS = 1100;
export const DEFAULT_REQUEST_TIMEOUT_MS = 30_000;

/**
 * Nominatim viewbox order: left (west), top (north), right (east), bottom (south).
 */
export interface Viewbox {
  left: number;
  top: number;
  right: number;
  bottom: number;
}

export interface NominatimSearchArea {
  countryCodes: string[];
  viewbox: Viewbox | null;
}

export type NominatimSearchOutcome =
  | { kind: "FOUND"; result: GeocodeResult; resultCount: number }
  | { kind: "NOT_FOUND" }
  | { kind: "TRANSPORT_ERROR"; httpStatus: number | null; errorMessage: string };

/**
 * Anything that can answer a single free-text lookup. The resolver only
 * depends on this, so tests can hand it a scripted stand-in.
 */
export interface GeocodeSearchClient {
  search(query: string): Promise<NominatimSearchOutcome>;
}

const nominatimRowSchema = z.object({
  lat: z.coerce.number(),
  lon: z.coerce.number(),
  display_name: z.string().optional()
});

const nominatimResponseSchema = z.array(z.unknown());

const sleep = (ms: number): Promise<void> =>
  new Promise((resolve) => setTimeout(resolve, ms));

export const toErrorMessage = (value: unknown): string => {
  if (value instanceof Error && value.message.trim()) {
    return value.message.trim();
  }

  if (typeof value === "string" && value.trim()) {
    return value.trim();
  }

  return "Unknown error";
};

export const formatViewbox = (viewbox: Viewbox): string =>
  [viewbox.left, viewbox.top, viewbox.right, viewbox.bottom].join(",");

export class NominatimClient implements GeocodeSearchClient {
  private readonly baseUrl: string;

  private readonly userAgent: string;

  private readonly requestDelayMs: number;

  private readonly requestTimeoutMs: number;

  private readonly searchArea: NominatimSearchArea | null;

  private requestCount = 0;

  constructor(options?: {
    baseUrl?: string;
    userAgent?: string;
    requestDelayMs?: number;
    requestTimeoutMs?: number;
    searchArea?: NominatimSearchArea | null;
  }) {
    this.baseUrl = options?.baseUrl?.trim() || DEFAULT_NOMINATIM_BASE_URL;
    this.userAgent = options?.userAgent?.trim() || DEFAULT_NOMINATIM_USER_AGENT;
    this.requestDelayMs = options?.requestDelayMs ?? DEFAULT_REQUEST_DELAY_MS;
    this.requestTimeoutMs = options?.requestTimeoutMs ?? DEFAULT_REQUEST_TIMEOUT_MS;
    this.searchArea = options?.searchArea ?? null;
  }

  /**
   * Network requests issued by this client so far.
   */
  get networkRequestCount(): number {
    return this.requestCount;
  }

  buildSearchUrl(query: string): URL {
    const url = new URL("/search", this.baseUrl);
    url.searchParams.set("q", query);
    url.searchParams.set("format", "json");
    url.searchParams.set("limit", "1");

    if (this.searchArea) {
      if (this.searchArea.countryCodes.length > 0) {
        url.searchParams.set("countrycodes", this.searchArea.countryCodes.join(","));
      }

      if (this.searchArea.viewbox) {
        url.searchParams.set("viewbox", formatViewbox(this.searchArea.viewbox));
        url.searchParams.set("bounded", "1");
      }
    }

    return url;
  }

  private async fetchWithTimeout(url: string, init: RequestInit): Promise<Response> {
    const abortController = new AbortController();
    const timeoutHandle = setTimeout(() => {
      abortController.abort();
    }, this.requestTimeoutMs);

    try {
      return await fetch(url, {
        ...init,
        signal: abortController.signal
      });
    } finally {
      clearTimeout(timeoutHandle);
    }
  }

  /**
   * One request, top-ranked match only. The usage policy allows roughly one
   * request per second, so every network call is followed by the configured
   * delay regardless of its outcome.
   */
  async search(query: string): Promise<NominatimSearchOutcome> {
    const url = this.buildSearchUrl(query);
    this.requestCount += 1;

    try {
      return await this.runSearch(url);
    } finally {
      if (this.requestDelayMs > 0) {
        await sleep(this.requestDelayMs);
      }
    }
  }

  private async runSearch(url: URL): Promise<NominatimSearchOutcome> {
    let response: Response;
    try {
      response = await this.fetchWithTimeout(url.toString(), {
        headers: {
          "User-Agent": this.userAgent,
          Accept: "application/json"
        }
      });
    } catch (error) {
      return {
        kind: "TRANSPORT_ERROR",
        httpStatus: null,
        errorMessage: toErrorMessage(error)
      };
    }

    if (!response.ok) {
      return {
        kind: "TRANSPORT_ERROR",
        httpStatus: response.status,
        errorMessage: `HTTP ${response.status} ${response.statusText}`.trim()
      };
    }

    let body: unknown;
    try {
      body = await response.json();
    } catch (error) {
      return {
        kind: "TRANSPORT_ERROR",
        httpStatus: response.status,
        errorMessage: `Invalid JSON response: ${toErrorMessage(error)}`
      };
    }

    const rows = nominatimResponseSchema.safeParse(body);
    if (!rows.success) {
      return {
        kind: "TRANSPORT_ERROR",
        httpStatus: response.status,
        errorMessage: "Unexpected response shape: expected an array of places"
      };
    }

    if (rows.data.length === 0) {
      return { kind: "NOT_FOUND" };
    }

    const top = nominatimRowSchema.safeParse(rows.data[0]);
    if (!top.success || !Number.isFinite(top.data.lat) || !Number.isFinite(top.data.lon)) {
      return {
        kind: "TRANSPORT_ERROR",
        httpStatus: response.status,
        errorMessage: "Invalid coordinates in top result"
      };
    }

    return {
      kind: "FOUND",
      resultCount: rows.data.length,
      result: {
        lat: top.data.lat,
        lon: top.data.lon,
        display_name: top.data.display_name ?? ""
      }
    };
  }
}
