/**
 * Library directory lookup
 *
 * Two listing endpoints with different response shapes are tried in a fixed
 * order. Each is decoded into a LibraryListing; the first `ok` wins.
 */

import prompts from "prompts";
import type { Logger } from "../logger.js";
import type { Library, LibrarySelection } from "../types.js";
import { ConfigError, errorMessage } from "../errors.js";
import { EmbyClient, isRecord, parseJson, stringField, type ApiResponse } from "./client.js";

export const FALLBACK_LIBRARY: Readonly<Library> = Object.freeze({
  id: "all",
  name: "All Libraries (Fallback)"
});

export type LibraryListing =
  | { kind: "ok"; source: LibrarySource; libraries: Library[] }
  | { kind: "failed"; source: LibrarySource; reason: string };

export type LibrarySource = "media-folders" | "virtual-folders";

function collect(entries: unknown[], idKeys: string[]): Library[] {
  const libraries: Library[] = [];
  for (const entry of entries) {
    if (!isRecord(entry)) continue;
    let id: string | undefined;
    for (const key of idKeys) {
      id = stringField(entry, key);
      if (id) break;
    }
    const name = stringField(entry, "Name");
    if (id && name) libraries.push({ id, name });
  }
  return libraries;
}

/** `GET /Library/MediaFolders` → `{ Items: [{ Id, Name }] }` */
export function decodeMediaFolders(response: ApiResponse): LibraryListing {
  const source = "media-folders";
  if (response.status !== 200) {
    return { kind: "failed", source, reason: `Status: ${response.status}` };
  }
  const data = parseJson(response.text);
  if (!isRecord(data) || !Array.isArray(data.Items)) {
    return { kind: "failed", source, reason: "Unexpected library data format" };
  }
  return { kind: "ok", source, libraries: collect(data.Items, ["Id"]) };
}

/** `GET /Library/VirtualFolders` → `[{ ItemId | Id, Name }]` */
export function decodeVirtualFolders(response: ApiResponse): LibraryListing {
  const source = "virtual-folders";
  if (response.status !== 200) {
    return { kind: "failed", source, reason: `Status: ${response.status}` };
  }
  const data = parseJson(response.text);
  if (!Array.isArray(data)) {
    return { kind: "failed", source, reason: "Unexpected library data format" };
  }
  return { kind: "ok", source, libraries: collect(data, ["ItemId", "Id"]) };
}

const LISTING_ORDER: Array<{
  source: LibrarySource;
  fetch: (client: EmbyClient) => Promise<ApiResponse>;
  decode: (response: ApiResponse) => LibraryListing;
}> = [
  { source: "media-folders", fetch: (c) => c.getMediaFolders(), decode: decodeMediaFolders },
  { source: "virtual-folders", fetch: (c) => c.getVirtualFolders(), decode: decodeVirtualFolders }
];

/**
 * Libraries on the server as `{id, name}` pairs. Never empty: when neither
 * endpoint answers usefully a single placeholder with id "all" is returned.
 */
export async function listLibraries(client: EmbyClient, logger: Logger): Promise<Library[]> {
  for (const step of LISTING_ORDER) {
    let listing: LibraryListing;
    try {
      listing = step.decode(await step.fetch(client));
    } catch (err) {
      listing = { kind: "failed", source: step.source, reason: errorMessage(err) };
    }
    if (listing.kind === "ok") {
      logger.info(`Found ${listing.libraries.length} libraries (${listing.source})`);
      return listing.libraries;
    }
    logger.warn(`Failed to get libraries from ${listing.source}: ${listing.reason}`);
  }

  logger.warn("Using fallback library option");
  return [{ ...FALLBACK_LIBRARY }];
}

/**
 * Resolve a user-supplied selection against the known libraries.
 *
 * - `"all"` (any case) → the "all" sentinel
 * - comma-separated numbers → 1-based positions in `libraries` (picking the
 *   fallback placeholder also means "all")
 * - otherwise comma-separated ids, filtered to the ones that exist
 */
export function selectLibraries(libraries: readonly Library[], selection: string): LibrarySelection {
  const trimmed = selection.trim();
  if (trimmed.toLowerCase() === "all") return "all";

  const parts = trimmed
    .split(",")
    .map((p) => p.trim())
    .filter((p) => p !== "");
  const known = new Set(libraries.map((l) => l.id));

  if (parts.length > 0 && parts.every((p) => /^\d+$/.test(p) && !known.has(p))) {
    const ids: string[] = [];
    for (const p of parts) {
      const lib = libraries[Number(p) - 1];
      if (lib) ids.push(lib.id);
    }
    return ids.includes(FALLBACK_LIBRARY.id) ? "all" : ids;
  }

  return parts.filter((p) => known.has(p));
}

export function formatLibraryList(libraries: readonly Library[]): string[] {
  return libraries.map((lib, i) => `${i + 1}. ${lib.name} (ID: ${lib.id})`);
}

/** Ask which libraries new users may access */
export async function promptLibrarySelection(libraries: readonly Library[], logger: Logger): Promise<LibrarySelection> {
  logger.info("Available libraries:");
  for (const line of formatLibraryList(libraries)) {
    logger.info(line);
  }

  const answer = await prompts(
    {
      type: "text",
      name: "selection",
      message: "Enter library numbers to grant access to (comma-separated, 'all' for all)"
    },
    {
      onCancel: () => {
        throw new ConfigError("Library selection cancelled.");
      }
    }
  );

  const raw: unknown = answer.selection;
  if (typeof raw !== "string" || raw.trim() === "") {
    return [];
  }
  return selectLibraries(libraries, raw);
}
