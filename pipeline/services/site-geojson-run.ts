import { writeJsonFile } from "../utils/fs-cache.js";
import { GeocodeJsonCache } from "./geocode-json-cache.js";
import type { GeocodeSearchClient } from "./nominatim-client.js";
import { loadSiteRecords } from "./site-csv-loader.js";
import { buildSiteFeatures, type SiteFeaturesBuildResult } from "./site-features-builder.js";
import { SiteGeocoder } from "./site-geocoder.js";
import type { SiteProfile } from "./site-profiles.js";

export interface SiteGeojsonRunInput {
  profile: SiteProfile;
  inputPath: string;
  outputPath: string;
  cachePath: string;
  client: GeocodeSearchClient;
}

/**
 * One full run: read the site list, resolve every site, then persist the
 * cache and the feature collection. Nothing is written if any step throws.
 */
export const runSiteGeojsonBuild = async (
  input: SiteGeojsonRunInput
): Promise<SiteFeaturesBuildResult> => {
  const { profile, inputPath, outputPath, cachePath, client } = input;

  console.log(`Loading ${profile.name} sites...`);
  const sites = await loadSiteRecords(inputPath);

  const cache = await GeocodeJsonCache.load(cachePath);
  console.log(`  Loaded geocode cache ${cachePath} (${cache.size} entries)\n`);

  const geocoder = new SiteGeocoder({
    cache,
    client,
    cacheContext: profile.cacheContext,
    recordQueryUsed: profile.recordQueryUsed
  });

  const buildResult = await buildSiteFeatures(sites, profile, geocoder);

  await cache.save();
  console.log(`\n  Saved geocode cache ${cachePath} (${cache.addedCount} new entries)`);

  await writeJsonFile(outputPath, buildResult.collection, { pretty: false });
  console.log(`WROTE: ${outputPath}`);

  return buildResult;
};
