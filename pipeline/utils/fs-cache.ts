import { mkdir, readFile, writeFile } from "node:fs/promises";
import { dirname } from "node:path";

const isMissingFileError = (error: unknown): boolean =>
  error instanceof Error && "code" in error && error.code === "ENOENT";

export type JsonFileContents = { found: false } | { found: true; value: unknown };

/**
 * Reads and parses a JSON file. A missing file resolves to `{ found: false }`;
 * any other read or parse failure rejects.
 */
export const readJsonFile = async (filePath: string): Promise<JsonFileContents> => {
  let raw: string;
  try {
    raw = await readFile(filePath, "utf8");
  } catch (error) {
    if (isMissingFileError(error)) {
      return { found: false };
    }
    throw error;
  }

  try {
    const value: unknown = JSON.parse(raw);
    return { found: true, value };
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    throw new Error(`Invalid JSON in ${filePath}: ${reason}`);
  }
};

export const writeJsonFile = async <T>(
  filePath: string,
  value: T,
  options?: { pretty?: boolean }
): Promise<void> => {
  const pretty = options?.pretty ?? true;
  await mkdir(dirname(filePath), { recursive: true });
  await writeFile(filePath, pretty ? JSON.stringify(value, null, 2) : JSON.stringify(value), "utf8");
};
