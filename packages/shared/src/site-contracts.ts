export interface SiteRecord {
  zoneId: string;
  zoneName: string;
  siteName: string;
  geocodeName: string;
  manualLatitude: number | null;
  manualLongitude: number | null;
}

/**
 * A geocoding hit as persisted in the cache file; field names follow the
 * on-disk format.
 * `query_used` is only recorded by profiles that walk a candidate list.
 */
export interface GeocodeResult {
  lat: number;
  lon: number;
  display_name: string;
  query_used?: string;
}

/**
 * `null` means the query was looked up and the provider returned nothing.
 */
export type GeocodeCacheValue = GeocodeResult | null;

export type GeocodeCacheRecord = Record<string, GeocodeCacheValue>;

export type Position = [longitude: number, latitude: number];

export interface SiteIdentityProperties {
  zone_id: string;
  zone_name: string;
  site_name: string;
}

export interface SitePolygonProperties extends SiteIdentityProperties {
  polygon_id: string;
}

export interface SitePointProperties extends SiteIdentityProperties {
  feature_type: "site_point";
}

export interface SitePolygonFeature {
  type: "Feature";
  properties: SitePolygonProperties;
  geometry: {
    type: "Polygon";
    coordinates: Position[][];
  };
}

export interface SitePointFeature {
  type: "Feature";
  properties: SitePointProperties;
  geometry: {
    type: "Point";
    coordinates: Position;
  };
}

export type SiteFeature = SitePolygonFeature | SitePointFeature;

export interface SiteFeatureCollection {
  type: "FeatureCollection";
  features: SiteFeature[];
}
