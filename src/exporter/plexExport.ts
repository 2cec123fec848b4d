/**
 * Plex user export (XML) → users CSV
 *
 * Exports differ in shape depending on where they were taken from (plex.tv
 * friends list, home users, shared servers), so user records are looked up
 * through an ordered list of element paths and the first path that matches
 * anything is used. Attribute names vary the same way and are resolved
 * through per-field fallbacks.
 */

import fs from "node:fs";
import { XMLParser, XMLValidator } from "fast-xml-parser";
import type { Logger } from "../logger.js";
import { NoRecordsError, NotFoundError, ParseError } from "../errors.js";
import { writeCsv } from "../csv/writeCsv.js";
import { generatePassphrase, type PassphraseOptions } from "../passphrase/generator.js";

export const RECORD_PATHS: readonly string[] = [
  "MediaContainer/User",
  "MediaContainer/Users/User",
  "MediaContainer/Account",
  "MediaContainer/SharedServer",
  "Users/User",
  "User"
];

export const FIELD_ATTRIBUTES = {
  ID: ["id", "userID", "accountID"],
  Username: ["username", "title", "name"],
  Thumb: ["thumb", "avatar"]
} as const;

export const EXPORT_COLUMNS = ["ID", "Username", "Email", "Thumb", "Passphrase"] as const;

export type ExportRow = {
  ID: string;
  Username: string;
  Email: string;
  Thumb: string;
  Passphrase: string;
};

export type ImportOptions = {
  wordList: readonly string[];
  passphrase?: PassphraseOptions;
  logger?: Logger;
};

type XmlElement = Record<string, unknown>;

const ATTR_PREFIX = "@_";

function isElement(value: unknown): value is XmlElement {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseExportDocument(xml: string): XmlElement {
  const validation = XMLValidator.validate(xml);
  if (validation !== true) {
    const { msg, line } = validation.err;
    throw new ParseError(`Could not parse export document (line ${line}): ${msg}`);
  }
  const parser = new XMLParser({
    ignoreAttributes: false,
    attributeNamePrefix: ATTR_PREFIX,
    ignoreDeclaration: true,
    ignorePiTags: true,
    isArray: (_name: string, _jpath: string, _isLeaf: boolean, isAttribute: boolean) => !isAttribute
  });
  const doc: unknown = parser.parse(xml);
  if (!isElement(doc)) {
    throw new ParseError("Could not parse export document: no root element");
  }
  return doc;
}

/** Elements reached by following `path` (slash-separated tag names) from the document */
export function selectElements(doc: XmlElement, path: string): XmlElement[] {
  let nodes: unknown[] = [doc];
  for (const tag of path.split("/")) {
    const next: unknown[] = [];
    for (const node of nodes) {
      if (!isElement(node)) continue;
      const child = node[tag];
      if (Array.isArray(child)) next.push(...child);
      else if (child !== undefined) next.push(child);
    }
    nodes = next;
  }
  return nodes.filter(isElement);
}

/** Records from the first path in RECORD_PATHS that yields any */
export function findUserRecords(doc: XmlElement): { path: string; records: XmlElement[] } {
  for (const path of RECORD_PATHS) {
    const records = selectElements(doc, path);
    if (records.length > 0) return { path, records };
  }
  throw new NoRecordsError([...RECORD_PATHS]);
}

export function attribute(element: XmlElement, names: readonly string[]): string {
  for (const name of names) {
    const value = element[`${ATTR_PREFIX}${name}`];
    if (typeof value === "string" && value.trim() !== "") return value.trim();
  }
  return "";
}

export function compareUsernames(a: { Username: string }, b: { Username: string }): number {
  const x = a.Username.toLowerCase();
  const y = b.Username.toLowerCase();
  return x < y ? -1 : x > y ? 1 : 0;
}

export function extractRows(doc: XmlElement, options: ImportOptions): ExportRow[] {
  const { path, records } = findUserRecords(doc);
  options.logger?.info(`Found ${records.length} user record(s) at ${path}`);

  const rows: ExportRow[] = [];
  for (const record of records) {
    const username = attribute(record, FIELD_ATTRIBUTES.Username);
    if (!username) {
      options.logger?.warn(`Skipping record without a username (id: ${attribute(record, FIELD_ATTRIBUTES.ID) || "unknown"})`);
      continue;
    }
    rows.push({
      ID: attribute(record, FIELD_ATTRIBUTES.ID),
      Username: username,
      Email: attribute(record, ["email"]),
      Thumb: attribute(record, FIELD_ATTRIBUTES.Thumb),
      Passphrase: generatePassphrase(options.wordList, options.passphrase)
    });
  }

  return rows.sort(compareUsernames);
}

export async function importPlexExport(xmlPath: string, options: ImportOptions): Promise<ExportRow[]> {
  if (!fs.existsSync(xmlPath)) {
    throw new NotFoundError(xmlPath, "Export file");
  }
  const xml = await fs.promises.readFile(xmlPath, "utf8");
  return extractRows(parseExportDocument(xml), options);
}

export function writeExportCsv(rows: readonly ExportRow[], outputPath: string): Promise<void> {
  return writeCsv(rows, EXPORT_COLUMNS, outputPath);
}
