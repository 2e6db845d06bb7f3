import {
  CLAMMING_CANDIDATE_RULES,
  CRABBING_CANDIDATE_RULES,
  buildQueryCandidates,
  type QueryCandidateRule
} from "../../packages/shared/src/query-candidates.js";
import type { SiteRecord } from "../../packages/shared/src/site-contracts.js";
import {
  DEFAULT_CLAMMING_INPUT_PATH,
  DEFAULT_CLAMMING_OUTPUT_PATH,
  DEFAULT_CRABBING_INPUT_PATH,
  DEFAULT_CRABBING_OUTPUT_PATH
} from "../utils/default-cache-paths.js";
import type { NominatimSearchArea } from "./nominatim-client.js";

export type SiteProfileName = "clamming" | "crabbing";

export const SITE_PROFILE_NAMES: readonly SiteProfileName[] = ["clamming", "crabbing"];

export interface SiteProfile {
  name: SiteProfileName;
  inputPath: string;
  outputPath: string;
  candidateRules: readonly QueryCandidateRule[];
  /**
   * Mixed into every cache key so lookups made under a bounded search do not
   * collide with unbounded lookups of the same text.
   */
  cacheContext: string | null;
  searchArea: NominatimSearchArea | null;
  acceptsManualCoordinates: boolean;
  recordQueryUsed: boolean;
  describeMiss: (site: SiteRecord, candidates: readonly string[]) => string;
}

export const DELAWARE_SEARCH_AREA: NominatimSearchArea = {
  countryCodes: ["us"],
  viewbox: {
    left: -75.8,
    top: 39.95,
    right: -74.85,
    bottom: 38.35
  }
};

export const CLAMMING_PROFILE: SiteProfile = {
  name: "clamming",
  inputPath: DEFAULT_CLAMMING_INPUT_PATH,
  outputPath: DEFAULT_CLAMMING_OUTPUT_PATH,
  candidateRules: CLAMMING_CANDIDATE_RULES,
  cacheContext: null,
  searchArea: null,
  acceptsManualCoordinates: false,
  recordQueryUsed: false,
  describeMiss: (site, candidates) => `NOT FOUND: ${candidates[0] ?? site.geocodeName}`
};

export const CRABBING_PROFILE: SiteProfile = {
  name: "crabbing",
  inputPath: DEFAULT_CRABBING_INPUT_PATH,
  outputPath: DEFAULT_CRABBING_OUTPUT_PATH,
  candidateRules: CRABBING_CANDIDATE_RULES,
  cacheContext: "DE_VIEWBOX_US",
  searchArea: DELAWARE_SEARCH_AREA,
  acceptsManualCoordinates: true,
  recordQueryUsed: true,
  describeMiss: (site) => `NOT FOUND: ${site.geocodeName}  |  ${site.siteName}`
};

const SITE_PROFILES: Record<SiteProfileName, SiteProfile> = {
  clamming: CLAMMING_PROFILE,
  crabbing: CRABBING_PROFILE
};

export const isSiteProfileName = (value: string): value is SiteProfileName =>
  SITE_PROFILE_NAMES.some((name) => name === value);

export const getSiteProfile = (name: string): SiteProfile => {
  if (!isSiteProfileName(name)) {
    throw new Error(
      `Unknown site profile "${name}". Expected one of: ${SITE_PROFILE_NAMES.join(", ")}.`
    );
  }

  return SITE_PROFILES[name];
};

export const buildProfileCandidates = (profile: SiteProfile, site: SiteRecord): string[] =>
  buildQueryCandidates(site.geocodeName, site.siteName, profile.candidateRules);
