import { mkdtempSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { describe, expect, it } from "vitest";
import {
  findMissingColumns,
  loadSiteRecords,
  parseManualCoordinate,
  parseSiteRecords
} from "../../pipeline/services/site-csv-loader.js";

describe("parseSiteRecords", () => {
  it("trims every field and ignores manual columns that are absent", async () => {
    const sites = await parseSiteRecords(
      [
        "zone_id,zone_name,site_name,geocode_name",
        " Z1 , North Bay ,Smith Landing,  Smith Pier "
      ].join("\n")
    );

    expect(sites).toEqual([
      {
        zoneId: "Z1",
        zoneName: "North Bay",
        siteName: "Smith Landing",
        geocodeName: "Smith Pier",
        manualLatitude: null,
        manualLongitude: null
      }
    ]);
  });

  it("reads manual coordinates when both columns hold numbers", async () => {
    const sites = await parseSiteRecords(
      [
        "zone_id,zone_name,site_name,geocode_name,lat,lon",
        "Z2,South Bay,Dock A,Dock A,38.61,-75.07",
        "Z2,South Bay,Dock B,Dock B,,-75.07",
        "Z2,South Bay,Dock C,Dock C,north,-75.07"
      ].join("\n")
    );

    expect(sites.map((site) => [site.manualLatitude, site.manualLongitude])).toEqual([
      [38.61, -75.07],
      [null, null],
      [null, null]
    ]);
  });

  it("names every missing required column", async () => {
    await expect(parseSiteRecords("zone_id,site_name\nZ1,Dock")).rejects.toThrow(
      "Missing columns in CSV: geocode_name, zone_name"
    );
  });

  it("handles quoted fields containing commas", async () => {
    const sites = await parseSiteRecords(
      [
        "zone_id,zone_name,site_name,geocode_name",
        'Z3,"Inland Bays, East","Pier 4","Massey\'s Landing, Long Neck"'
      ].join("\n")
    );

    expect(sites[0]).toMatchObject({
      zoneName: "Inland Bays, East",
      geocodeName: "Massey's Landing, Long Neck"
    });
  });
});

describe("findMissingColumns", () => {
  it("returns the missing columns sorted", () => {
    expect(findMissingColumns(["site_name"])).toEqual(["geocode_name", "zone_id", "zone_name"]);
    expect(findMissingColumns(["zone_id", "zone_name", "site_name", "geocode_name"])).toEqual([]);
  });
});

describe("parseManualCoordinate", () => {
  it("treats blank and malformed values as absent", () => {
    expect(parseManualCoordinate(" 39.25 ")).toBe(39.25);
    expect(parseManualCoordinate("")).toBeNull();
    expect(parseManualCoordinate(undefined)).toBeNull();
    expect(parseManualCoordinate("NaN")).toBeNull();
    expect(parseManualCoordinate("39,25")).toBeNull();
  });
});

describe("loadSiteRecords", () => {
  it("reads a CSV file from disk", async () => {
    const temporaryDirectory = mkdtempSync(join(tmpdir(), "shellfish-site-csv-"));
    const csvPath = join(temporaryDirectory, "sites.csv");

    try {
      writeFileSync(
        csvPath,
        "zone_id,zone_name,site_name,geocode_name\nZ1,North Bay,Smith Landing,Smith Pier\n"
      );
      const sites = await loadSiteRecords(csvPath);
      expect(sites).toHaveLength(1);
      expect(sites[0]?.geocodeName).toBe("Smith Pier");
    } finally {
      rmSync(temporaryDirectory, { recursive: true, force: true });
    }
  });
});
