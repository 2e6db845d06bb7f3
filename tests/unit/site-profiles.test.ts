import { describe, expect, it } from "vitest";
import type { SiteRecord } from "../../packages/shared/src/site-contracts.js";
import {
  CLAMMING_PROFILE,
  CRABBING_PROFILE,
  buildProfileCandidates,
  getSiteProfile
} from "../../pipeline/services/site-profiles.js";

const ghostCove: SiteRecord = {
  zoneId: "C9",
  zoneName: "Indian River Bay",
  siteName: "Ghost Cove Flats",
  geocodeName: "Ghost Cove",
  manualLatitude: null,
  manualLongitude: null
};

describe("getSiteProfile", () => {
  it("looks profiles up by name", () => {
    expect(getSiteProfile("clamming")).toBe(CLAMMING_PROFILE);
    expect(getSiteProfile("crabbing")).toBe(CRABBING_PROFILE);
  });

  it("rejects unknown names", () => {
    expect(() => getSiteProfile("oysters")).toThrow(
      'Unknown site profile "oysters". Expected one of: clamming, crabbing.'
    );
  });

  it("keeps bounded lookups apart from unbounded ones in the cache", () => {
    expect(CLAMMING_PROFILE.cacheContext).toBeNull();
    expect(CRABBING_PROFILE.cacheContext).toBe("DE_VIEWBOX_US");
  });
});

describe("describeMiss", () => {
  it("names the single query a clamming site was looked up by", () => {
    const candidates = buildProfileCandidates(CLAMMING_PROFILE, ghostCove);

    expect(CLAMMING_PROFILE.describeMiss(ghostCove, candidates)).toBe(
      "NOT FOUND: Ghost Cove, Delaware, USA"
    );
    expect(
      CLAMMING_PROFILE.describeMiss(ghostCove, ["Ghost Cove, Delaware, USA", "Ghost Cove"])
    ).toBe("NOT FOUND: Ghost Cove, Delaware, USA");
  });

  it("falls back to the geocode name when no query was built", () => {
    expect(CLAMMING_PROFILE.describeMiss(ghostCove, [])).toBe("NOT FOUND: Ghost Cove");
  });

  it("names both the geocode name and the site name for crabbing", () => {
    expect(CRABBING_PROFILE.describeMiss(ghostCove, [])).toBe(
      "NOT FOUND: Ghost Cove  |  Ghost Cove Flats"
    );
  });
});
