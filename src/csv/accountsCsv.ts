/**
 * Reader for the users CSV shared by create-users and generate-welcome-emails
 * (and written by plex-to-csv).
 */

import fs from "node:fs";
import { parse } from "csv-parse/sync";
import type { CSVRow } from "../types.js";
import { NotFoundError, ParseError, SchemaError, errorMessage } from "../errors.js";

export const REQUIRED_COLUMNS = ["Username", "Email", "Passphrase"] as const;
export const OPTIONAL_COLUMNS = ["Thumb"] as const;

export type AccountsCsv = {
  headers: string[];
  rows: CSVRow[];
};

export function missingColumns(headers: readonly string[], required: readonly string[] = REQUIRED_COLUMNS): string[] {
  return required.filter((col) => !headers.includes(col));
}

/**
 * Parse CSV text. The header row is checked before any data row is looked
 * at, so a file with only a header still fails on missing columns.
 */
export function parseAccountsCsv(content: string): AccountsCsv {
  let records: string[][];
  try {
    records = parse(content, {
      bom: true,
      skip_empty_lines: true,
      relax_column_count: true
    });
  } catch (err) {
    throw new ParseError(`Could not parse CSV: ${errorMessage(err)}`);
  }

  const [headerRow, ...dataRows] = records;
  const headers = (headerRow ?? []).map((h) => h.trim());
  const missing = missingColumns(headers);
  if (missing.length > 0) {
    throw new SchemaError(missing);
  }

  const rows = dataRows.map((record) => {
    const row: CSVRow = {};
    headers.forEach((header, i) => {
      row[header] = record[i] ?? "";
    });
    return row;
  });

  return { headers, rows };
}

export async function readAccountsCsv(csvPath: string): Promise<AccountsCsv> {
  if (!fs.existsSync(csvPath)) {
    throw new NotFoundError(csvPath, "CSV file");
  }
  const content = await fs.promises.readFile(csvPath, "utf8");
  return parseAccountsCsv(content);
}
