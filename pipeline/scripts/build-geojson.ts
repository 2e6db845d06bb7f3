#!/usr/bin/env node
/**
 * Builds a GeoJSON map layer from a shellfish site list.
 *
 * Usage: build-geojson <clamming|crabbing> [--input path] [--output path] [--cache path]
 *
 * Reads:    data/<profile>_sites.csv, data/geocode_cache.json
 * Produces: data/<profile>_polygons.geojson, data/geocode_cache.json
 */
import { parseArgs } from "node:util";
import { NominatimClient } from "../services/nominatim-client.js";
import { runSiteGeojsonBuild } from "../services/site-geojson-run.js";
import { SITE_PROFILE_NAMES, getSiteProfile } from "../services/site-profiles.js";
import { loadPipelineConfig } from "./pipeline-config.js";

const USAGE = `Usage: build-geojson <${SITE_PROFILE_NAMES.join("|")}> [--input path] [--output path] [--cache path]`;

const main = async () => {
  const startTime = Date.now();
  const { values, positionals } = parseArgs({
    args: process.argv.slice(2),
    allowPositionals: true,
    options: {
      input: { type: "string" },
      output: { type: "string" },
      cache: { type: "string" }
    }
  });

  const profileName = positionals[0];
  if (!profileName) {
    throw new Error(USAGE);
  }

  const profile = getSiteProfile(profileName);
  const config = loadPipelineConfig();

  console.log(`=== Build GeoJSON: ${profile.name} ===\n`);

  const client = new NominatimClient({
    baseUrl: config.NOMINATIM_BASE_URL,
    userAgent: config.NOMINATIM_USER_AGENT,
    requestDelayMs: config.GEOCODE_REQUEST_DELAY_MS,
    requestTimeoutMs: config.GEOCODE_REQUEST_TIMEOUT_MS,
    searchArea: profile.searchArea
  });

  const { collection, summary } = await runSiteGeojsonBuild({
    profile,
    inputPath: values.input ?? profile.inputPath,
    outputPath: values.output ?? profile.outputPath,
    cachePath: values.cache ?? config.GEOCODE_CACHE_PATH,
    client
  });

  const elapsedSeconds = ((Date.now() - startTime) / 1000).toFixed(1);
  console.log(`\n✓ Build complete (${elapsedSeconds}s)`);
  console.log(`  Sites: ${summary.totalSites}`);
  console.log(`  Located: ${summary.resolvedSites} (manual: ${summary.manualSites})`);
  console.log(`  Not found: ${summary.unresolvedSites}`);
  console.log(`  Cache hits: ${summary.cacheHits} | Network lookups: ${summary.networkLookups}`);
  console.log(`  Features: ${collection.features.length}`);
};

main().catch((error) => {
  console.error("Fatal error in build-geojson:");
  console.error(error);
  process.exit(1);
});
