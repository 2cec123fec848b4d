/**
 * Profile image assignment
 *
 * 1. Download the avatar from its source URL (browser User-Agent, 10s timeout)
 * 2. On failure, fetch a stand-in image according to the fallback strategy
 * 3. Upload through each UploadVariant in order until one is accepted
 */

import crypto from "node:crypto";
import type { Logger } from "../logger.js";
import type { StepOutcome } from "../types.js";
import { errorMessage } from "../errors.js";
import { EmbyClient, isSuccessStatus, type ApiResponse } from "./client.js";

export const BROWSER_USER_AGENT =
  "Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/91.0.4472.124 Safari/537.36";

export const DOWNLOAD_TIMEOUT_MS = 10_000;

export const RANDOM_AVATAR_STYLES = ["adventurer", "bottts", "fun-emoji", "pixel-art"] as const;

/**
 * What to use when the avatar source cannot be downloaded:
 * - identicon: Gravatar identicon derived from the remote user id (stable across runs)
 * - random: a random DiceBear avatar, then a Gravatar identicon for a random hash
 * - none: no image
 */
export type AvatarFallback = "identicon" | "random" | "none";

export const AVATAR_FALLBACKS: readonly AvatarFallback[] = ["identicon", "random", "none"];

export type AvatarImage = {
  data: Buffer;
  contentType: string;
};

export type UploadVariant =
  | { kind: "user-json" }
  | { kind: "item-json" }
  | { kind: "raw" };

export const JSON_UPLOAD_VARIANTS: readonly UploadVariant[] = [{ kind: "user-json" }, { kind: "item-json" }];
export const RAW_UPLOAD_VARIANTS: readonly UploadVariant[] = [{ kind: "raw" }];

export type AvatarOptions = {
  fallback?: AvatarFallback;
  variants?: readonly UploadVariant[];
  /** Source of randomness for the "random" fallback */
  random?: () => number;
};

export function md5Hex(value: string): string {
  return crypto.createHash("md5").update(value, "utf8").digest("hex");
}

export function gravatarIdenticonUrl(hash: string): string {
  return `https://www.gravatar.com/avatar/${hash}?d=identicon&s=200`;
}

/** Identicon keyed by the MD5 digest of `{remoteId}@example.com` */
export function identiconUrlFor(remoteId: string): string {
  return gravatarIdenticonUrl(md5Hex(`${remoteId}@example.com`));
}

export function randomAvatarUrl(random: () => number): string {
  const style = RANDOM_AVATAR_STYLES[Math.floor(random() * RANDOM_AVATAR_STYLES.length)] ?? RANDOM_AVATAR_STYLES[0];
  const seed = 1 + Math.floor(random() * 10_000);
  return `https://api.dicebear.com/7.x/${style}/svg?seed=${seed}`;
}

function randomHexHash(random: () => number): string {
  let hash = "";
  for (let i = 0; i < 32; i++) {
    hash += Math.floor(random() * 16).toString(16);
  }
  return hash;
}

/** "image/png" → "png"; no content type → "jpeg" */
export function imageFormat(contentType: string | undefined): string {
  if (!contentType) return "jpeg";
  const mime = contentType.split(";")[0]?.trim() ?? "";
  const subtype = mime.split("/").pop() ?? "";
  return subtype === "" ? "jpeg" : subtype;
}

async function tryDownload(
  client: EmbyClient,
  url: string,
  logger: Logger,
  headers: Record<string, string> = {},
  defaultType = "image/jpeg"
): Promise<AvatarImage | undefined> {
  try {
    const download = await client.download(url, headers, DOWNLOAD_TIMEOUT_MS);
    if (download.status !== 200 || download.data.length === 0) {
      logger.warn(`Failed to download image from ${url}. Status: ${download.status}`);
      return undefined;
    }
    const contentType = download.contentType ?? defaultType;
    logger.info(`Downloaded image (${download.data.length} bytes, type: ${contentType})`);
    return { data: download.data, contentType };
  } catch (err) {
    logger.warn(`Error downloading image from ${url}: ${errorMessage(err)}`);
    return undefined;
  }
}

export async function resolveAvatarImage(
  client: EmbyClient,
  remoteId: string,
  source: string,
  logger: Logger,
  options: AvatarOptions = {}
): Promise<AvatarImage | undefined> {
  const fallback = options.fallback ?? "identicon";
  const random = options.random ?? Math.random;

  logger.info(`Downloading image from URL: ${source}`);
  const original = await tryDownload(client, source, logger, { "User-Agent": BROWSER_USER_AGENT });
  if (original) return original;

  if (fallback === "identicon") {
    const url = identiconUrlFor(remoteId);
    logger.info(`Falling back to Gravatar image: ${url}`);
    return tryDownload(client, url, logger);
  }

  if (fallback === "random") {
    logger.info(`Using random avatar for user ID: ${remoteId}`);
    const svg = await tryDownload(client, randomAvatarUrl(random), logger, {}, "image/svg+xml");
    if (svg) return svg;
    return tryDownload(client, gravatarIdenticonUrl(randomHexHash(random)), logger);
  }

  return undefined;
}

function uploadWith(client: EmbyClient, variant: UploadVariant, userId: string, image: AvatarImage): Promise<ApiResponse> {
  const id = encodeURIComponent(userId);
  const b64 = image.data.toString("base64");
  switch (variant.kind) {
    case "user-json":
      return client.request("POST", `/Users/${id}/Images/Primary`, {
        kind: "json",
        value: { Format: imageFormat(image.contentType), Data: b64 }
      });
    case "item-json":
      return client.request("POST", `/Items/${id}/Images/Primary`, {
        kind: "json",
        value: { data: b64 }
      });
    case "raw":
      return client.request("POST", `/Users/${id}/Images/Primary`, {
        kind: "raw",
        data: image.data,
        contentType: image.contentType
      });
  }
}

/** Returns the variant that was accepted, or undefined when all were refused */
export async function uploadAvatar(
  client: EmbyClient,
  userId: string,
  image: AvatarImage,
  logger: Logger,
  variants: readonly UploadVariant[] = JSON_UPLOAD_VARIANTS
): Promise<UploadVariant | undefined> {
  for (const variant of variants) {
    try {
      logger.info(`Uploading profile image for user ID: ${userId} (${variant.kind})`);
      const response = await uploadWith(client, variant, userId, image);
      if (isSuccessStatus(response.status)) {
        logger.info(`Successfully uploaded profile image for user ID: ${userId}`);
        return variant;
      }
      logger.warn(`Failed to upload profile image (${variant.kind}). Status: ${response.status}, Response: ${response.text}`);
    } catch (err) {
      logger.error(`Exception uploading profile image (${variant.kind}): ${errorMessage(err)}`);
    }
  }
  return undefined;
}

export async function assignAvatar(
  client: EmbyClient,
  userId: string,
  source: string,
  logger: Logger,
  options: AvatarOptions = {}
): Promise<StepOutcome> {
  const image = await resolveAvatarImage(client, userId, source, logger, options);
  if (!image) {
    logger.warn(`Could not get any profile image for user ID: ${userId}`);
    return "skipped";
  }
  const accepted = await uploadAvatar(client, userId, image, logger, options.variants);
  return accepted ? "set" : "failed";
}
