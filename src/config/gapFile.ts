import fs from "node:fs";
import path from "node:path";
import { parse } from "csv-parse/sync";
import { ConfigError } from "../core/errors";

/**
 * Reads the `original_url` column of a gap register (or any CSV with that
 * header) so a recover run can be restricted to what is still missing.
 * A missing file yields an empty set, which means "no restriction".
 */
export function loadOnlyMissingUrls(gapFilePath?: string): Set<string> {
  if (!gapFilePath) {
    return new Set();
  }

  const absolutePath = path.resolve(gapFilePath);
  if (!fs.existsSync(absolutePath)) {
    return new Set();
  }

  const content = fs.readFileSync(absolutePath, "utf-8");
  const rows: unknown = parse(content, {
    columns: true,
    skip_empty_lines: true,
    trim: true,
  });
  if (!Array.isArray(rows)) {
    throw new ConfigError(`Gap file could not be parsed: ${absolutePath}`);
  }

  const urls = new Set<string>();
  for (const row of rows) {
    if (typeof row !== "object" || row === null || !("original_url" in row)) {
      throw new ConfigError(`Gap file has no original_url column: ${absolutePath}`);
    }
    const value = row.original_url;
    if (typeof value === "string" && value.length > 0) {
      urls.add(value);
    }
  }
  return urls;
}
