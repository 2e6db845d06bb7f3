import { join } from "node:path";

const DATA_DIR = "data";

export const DEFAULT_GEOCODE_CACHE_PATH = join(DATA_DIR, "geocode_cache.json");

export const DEFAULT_CLAMMING_INPUT_PATH = join(DATA_DIR, "clamming_sites.csv");
export const DEFAULT_CLAMMING_OUTPUT_PATH = join(DATA_DIR, "clamming_polygons.geojson");

export const DEFAULT_CRABBING_INPUT_PATH = join(DATA_DIR, "crabbing_sites.csv");
export const DEFAULT_CRABBING_OUTPUT_PATH = join(DATA_DIR, "crabbing_polygons.geojson");
