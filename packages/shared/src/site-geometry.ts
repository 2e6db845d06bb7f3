import type {
  Position,
  SiteIdentityProperties,
  SitePointFeature,
  SitePolygonFeature,
  SiteRecord
} from "./site-contracts.js";

export interface HalfExtents {
  latitude: number;
  longitude: number;
}

/**
 * Longitude degrees are shorter than latitude degrees at Delaware's latitude,
 * so the longitude half-width is wider to keep the square roughly square.
 */
export const DEFAULT_HALF_EXTENTS: HalfExtents = {
  latitude: 0.01,
  longitude: 0.015
};

export const PLACEHOLDER_POLYGON_ID = "A";

/**
 * Closed placeholder ring around a point: SW, SE, NE, NW, SW.
 */
export const buildSquareRing = (
  latitude: number,
  longitude: number,
  halfExtents: HalfExtents = DEFAULT_HALF_EXTENTS
): Position[] => {
  const south = latitude - halfExtents.latitude;
  const north = latitude + halfExtents.latitude;
  const west = longitude - halfExtents.longitude;
  const east = longitude + halfExtents.longitude;

  return [
    [west, south],
    [east, south],
    [east, north],
    [west, north],
    [west, south]
  ];
};

const toIdentityProperties = (site: SiteRecord): SiteIdentityProperties => ({
  zone_id: site.zoneId,
  zone_name: site.zoneName,
  site_name: site.siteName
});

export const buildSitePolygon = (
  site: SiteRecord,
  latitude: number,
  longitude: number,
  halfExtents: HalfExtents = DEFAULT_HALF_EXTENTS
): SitePolygonFeature => ({
  type: "Feature",
  properties: {
    ...toIdentityProperties(site),
    polygon_id: PLACEHOLDER_POLYGON_ID
  },
  geometry: {
    type: "Polygon",
    coordinates: [buildSquareRing(latitude, longitude, halfExtents)]
  }
});

export const buildSitePoint = (
  site: SiteRecord,
  latitude: number,
  longitude: number
): SitePointFeature => ({
  type: "Feature",
  properties: {
    ...toIdentityProperties(site),
    feature_type: "site_point"
  },
  geometry: {
    type: "Point",
    coordinates: [longitude, latitude]
  }
});
