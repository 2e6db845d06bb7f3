import type {
  SiteFeature,
  SiteFeatureCollection,
  SiteRecord
} from "../../packages/shared/src/site-contracts.js";
import {
  DEFAULT_HALF_EXTENTS,
  buildSitePoint,
  buildSitePolygon,
  type HalfExtents
} from "../../packages/shared/src/site-geometry.js";
import {
  countCacheHits,
  countNetworkLookups,
  type SiteGeocoder
} from "./site-geocoder.js";
import { buildProfileCandidates, type SiteProfile } from "./site-profiles.js";

export interface SiteFeaturesSummary {
  totalSites: number;
  resolvedSites: number;
  manualSites: number;
  unresolvedSites: number;
  cacheHits: number;
  networkLookups: number;
  unresolvedLabels: string[];
}

export interface SiteFeaturesBuildResult {
  collection: SiteFeatureCollection;
  summary: SiteFeaturesSummary;
}

const buildFeaturePair = (
  site: SiteRecord,
  latitude: number,
  longitude: number,
  halfExtents: HalfExtents
): SiteFeature[] => [
  buildSitePolygon(site, latitude, longitude, halfExtents),
  buildSitePoint(site, latitude, longitude)
];

const readManualCoordinates = (
  site: SiteRecord
): { latitude: number; longitude: number } | null => {
  if (site.manualLatitude === null || site.manualLongitude === null) {
    return null;
  }

  if (!Number.isFinite(site.manualLatitude) || !Number.isFinite(site.manualLongitude)) {
    return null;
  }

  return { latitude: site.manualLatitude, longitude: site.manualLongitude };
};

/**
 * Turns site rows into placeholder polygons and point markers, one pair per
 * located site, in row order. Unresolved sites are reported and skipped; a
 * transport failure aborts the whole run.
 */
export async function buildSiteFeatures(
  sites: readonly SiteRecord[],
  profile: SiteProfile,
  geocoder: SiteGeocoder,
  options?: { halfExtents?: HalfExtents }
): Promise<SiteFeaturesBuildResult> {
  const halfExtents = options?.halfExtents ?? DEFAULT_HALF_EXTENTS;
  const features: SiteFeature[] = [];
  const summary: SiteFeaturesSummary = {
    totalSites: sites.length,
    resolvedSites: 0,
    manualSites: 0,
    unresolvedSites: 0,
    cacheHits: 0,
    networkLookups: 0,
    unresolvedLabels: []
  };

  for (const [index, site] of sites.entries()) {
    const progressLabel = `[${index + 1}/${sites.length}] ${site.siteName || site.geocodeName}`;

    const manualCoordinates = profile.acceptsManualCoordinates
      ? readManualCoordinates(site)
      : null;

    if (manualCoordinates) {
      features.push(
        ...buildFeaturePair(site, manualCoordinates.latitude, manualCoordinates.longitude, halfExtents)
      );
      summary.manualSites += 1;
      summary.resolvedSites += 1;
      console.log(
        `  ${progressLabel} | MANUAL | (${manualCoordinates.latitude}, ${manualCoordinates.longitude})`
      );
      continue;
    }

    const candidates = buildProfileCandidates(profile, site);
    const resolution = await geocoder.resolve(candidates);
    summary.cacheHits += countCacheHits(resolution.attempts);
    summary.networkLookups += countNetworkLookups(resolution.attempts);

    if (resolution.status === "TRANSPORT_ERROR") {
      const statusSuffix = resolution.httpStatus !== null ? ` (http=${resolution.httpStatus})` : "";
      throw new Error(
        `Geocoding request failed for "${resolution.query}"${statusSuffix}: ${resolution.errorMessage}`
      );
    }

    if (resolution.status === "NOT_FOUND") {
      const missMessage = profile.describeMiss(site, candidates);
      summary.unresolvedSites += 1;
      summary.unresolvedLabels.push(missMessage);
      console.log(missMessage);
      continue;
    }

    const { lat, lon } = resolution.result;
    features.push(...buildFeaturePair(site, lat, lon, halfExtents));
    summary.resolvedSites += 1;

    const source = resolution.attempts.at(-1)?.outcome === "CACHE_HIT" ? "CACHE_HIT" : "LOOKUP";
    console.log(`  ${progressLabel} | ${source} | ${resolution.query} | (${lat}, ${lon})`);
  }

  return {
    collection: {
      type: "FeatureCollection",
      features
    },
    summary
  };
}
