import fs from "node:fs";
import path from "node:path";
import { stringify } from "csv-stringify/sync";
import type { FailureRecord } from "./types.js";

export const ERROR_COLUMNS = [
  "recordNumber",
  "username",
  "email",
  "errorType",
  "errorMessage",
  "httpStatus",
  "timestamp",
  "rawRow"
] as const;

export function failuresToCsv(failures: readonly FailureRecord[]): string {
  const rows = failures.map((f) => [
    String(f.recordNumber),
    f.username ?? "",
    f.email ?? "",
    f.errorType,
    f.errorMessage,
    f.httpStatus != null ? String(f.httpStatus) : "",
    f.timestamp,
    // Passphrases stay out of the errors file
    f.rawRow ? JSON.stringify({ ...f.rawRow, Passphrase: undefined }) : ""
  ]);
  return stringify([[...ERROR_COLUMNS], ...rows]);
}

/** Writes nothing when there are no failures. `.csv` → CSV, anything else → JSON */
export async function writeErrorsOut(outPath: string, failures: readonly FailureRecord[]): Promise<void> {
  if (failures.length === 0) return;
  const ext = path.extname(outPath).toLowerCase();
  if (ext === ".csv") {
    await fs.promises.writeFile(outPath, failuresToCsv(failures), "utf8");
  } else {
    const redacted = failures.map((f) => (f.rawRow ? { ...f, rawRow: { ...f.rawRow, Passphrase: undefined } } : f));
    await fs.promises.writeFile(outPath, JSON.stringify(redacted, null, 2), "utf8");
  }
}
