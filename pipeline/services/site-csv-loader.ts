import { readFile } from "node:fs/promises";
import { parseString } from "fast-csv";
import { z } from "zod";
import type { SiteRecord } from "../../packages/shared/src/site-contracts.js";

export const REQUIRED_SITE_COLUMNS = ["zone_id", "zone_name", "site_name", "geocode_name"] as const;

const MANUAL_COORDINATE_COLUMNS = ["lat", "lon"] as const;

const csvRowSchema = z.record(z.string(), z.string().nullish());

type CsvRow = z.infer<typeof csvRowSchema>;

interface ParsedCsv {
  headers: string[];
  rows: CsvRow[];
}

const readCsv = (csvText: string): Promise<ParsedCsv> =>
  new Promise((resolve, reject) => {
    let headers: string[] = [];
    const rows: CsvRow[] = [];

    parseString(csvText, { headers: true, ignoreEmpty: true })
      .on("headers", (parsedHeaders: unknown) => {
        headers = Array.isArray(parsedHeaders)
          ? parsedHeaders.filter((header): header is string => typeof header === "string")
          : [];
      })
      .on("data", (row: unknown) => {
        const parsedRow = csvRowSchema.safeParse(row);
        if (parsedRow.success) {
          rows.push(parsedRow.data);
        } else {
          reject(new Error(`Unreadable CSV row ${rows.length + 1}: ${parsedRow.error.message}`));
        }
      })
      .on("error", (error: Error) => {
        reject(error);
      })
      .on("end", () => {
        resolve({ headers, rows });
      });
  });

const cellText = (row: CsvRow, column: string): string => (row[column] ?? "").trim();

/**
 * Blank or non-numeric cells count as "no manual coordinate".
 */
export const parseManualCoordinate = (raw: string | null | undefined): number | null => {
  const trimmed = raw?.trim() ?? "";
  if (!trimmed) {
    return null;
  }

  const value = Number(trimmed);
  return Number.isFinite(value) ? value : null;
};

export const findMissingColumns = (headers: readonly string[]): string[] => {
  const present = new Set(headers);
  return REQUIRED_SITE_COLUMNS.filter((column) => !present.has(column)).sort();
};

export const parseSiteRecords = async (csvText: string): Promise<SiteRecord[]> => {
  const { headers, rows } = await readCsv(csvText);

  const missingColumns = findMissingColumns(headers);
  if (missingColumns.length > 0) {
    throw new Error(`Missing columns in CSV: ${missingColumns.join(", ")}`);
  }

  const hasManualCoordinates = MANUAL_COORDINATE_COLUMNS.every((column) =>
    headers.includes(column)
  );

  return rows.map((row) => {
    const manualLatitude = hasManualCoordinates ? parseManualCoordinate(row.lat) : null;
    const manualLongitude = hasManualCoordinates ? parseManualCoordinate(row.lon) : null;
    const hasBoth = manualLatitude !== null && manualLongitude !== null;

    return {
      zoneId: cellText(row, "zone_id"),
      zoneName: cellText(row, "zone_name"),
      siteName: cellText(row, "site_name"),
      geocodeName: cellText(row, "geocode_name"),
      manualLatitude: hasBoth ? manualLatitude : null,
      manualLongitude: hasBoth ? manualLongitude : null
    };
  });
};

export const loadSiteRecords = async (filePath: string): Promise<SiteRecord[]> => {
  const csvText = await readFile(filePath, "utf8");
  const sites = await parseSiteRecords(csvText);
  console.log(`  Loaded ${filePath} (${sites.length} site row(s))`);
  return sites;
};
