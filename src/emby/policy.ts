/**
 * User policy documents: the role-derived baseline written after creation, and
 * the read-modify-write that grants library access.
 */

import type { Logger } from "../logger.js";
import type { LibrarySelection, PolicyDocument } from "../types.js";
import { errorMessage } from "../errors.js";
import { EmbyClient, isRecord, isSuccessStatus, parseJson } from "./client.js";

export const DEFAULT_ROLES: readonly string[] = [
  "EnablePlayback",
  "EnableMediaPlayback",
  "EnableSharedDeviceControl",
  "EnableVideoPlayback",
  "EnableAudioPlayback"
];

export const BASELINE_POLICY: Readonly<PolicyDocument> = Object.freeze({
  IsAdministrator: false,
  IsHidden: false,
  IsDisabled: false,
  BlockedTags: [],
  EnableUserPreferenceAccess: true,
  AccessSchedules: [],
  BlockUnratedItems: [],
  EnableRemoteControlOfOtherUsers: false,
  EnableSharedDeviceControl: true,
  EnableRemoteAccess: true,
  EnableLiveTvManagement: false,
  EnableLiveTvAccess: true,
  EnableMediaPlayback: true,
  EnableAudioPlaybackTranscoding: true,
  EnableVideoPlaybackTranscoding: true,
  EnablePlaybackRemuxing: true,
  EnablePublicSharing: false,
  EnableDownloading: true,
  EnableSubtitleDownloading: true,
  EnableSubtitleManagement: false,
  EnableSyncTranscoding: true,
  EnableMediaConversion: true,
  EnableAllDevices: true,
  EnableAllChannels: false,
  EnableRemoteControllers: true
});

/** Flags forced on every time a policy is written back */
export const PLAYBACK_FLAGS = [
  "EnableMediaPlayback",
  "EnableAudioPlaybackTranscoding",
  "EnableVideoPlaybackTranscoding",
  "EnablePlaybackRemuxing",
  "EnableSharedDeviceControl"
] as const;

/** Role names that switch on a differently named policy flag */
export const ROLE_FLAG_ALIASES: Readonly<Record<string, string>> = {
  EnablePlayback: "EnableMediaPlayback",
  EnableVideoPlayback: "EnableVideoPlaybackTranscoding",
  EnableAudioPlayback: "EnableAudioPlaybackTranscoding"
};

export type RolePolicy = {
  policy: PolicyDocument;
  ignoredRoles: string[];
};

/**
 * Baseline policy with role overrides applied. A role is either an alias from
 * ROLE_FLAG_ALIASES or the name of a boolean baseline flag; anything else is
 * reported in `ignoredRoles`.
 */
export function buildRolePolicy(roles: readonly string[]): RolePolicy {
  const policy: PolicyDocument = structuredClone({ ...BASELINE_POLICY });
  const ignoredRoles: string[] = [];

  for (const raw of roles) {
    const role = raw.trim();
    if (role === "") continue;
    const flag = ROLE_FLAG_ALIASES[role] ?? role;
    if (typeof BASELINE_POLICY[flag] === "boolean") {
      policy[flag] = true;
    } else {
      ignoredRoles.push(role);
    }
  }

  return { policy, ignoredRoles };
}

function withPlaybackFlags(policy: PolicyDocument): PolicyDocument {
  for (const flag of PLAYBACK_FLAGS) {
    policy[flag] = true;
  }
  return policy;
}

/**
 * Copy of `fetched` granting access to `selection`. Every other field is
 * carried over untouched, except the playback flags which are forced on.
 */
export function applyLibraryAccess(fetched: PolicyDocument, selection: LibrarySelection): PolicyDocument {
  const updated: PolicyDocument = { ...fetched };
  if (selection === "all") {
    updated.EnableAllFolders = true;
  } else {
    updated.EnableAllFolders = false;
    updated.EnabledFolders = [...selection];
  }
  return withPlaybackFlags(updated);
}

/** Written when the current policy cannot be read and every library is wanted */
export function directAllFoldersPolicy(): PolicyDocument {
  return withPlaybackFlags({
    EnableAllFolders: true,
    EnableAllChannels: false,
    EnableAllDevices: true,
    EnableContentDeletion: false,
    EnableSync: true,
    EnableLiveTvAccess: false,
    EnableLiveTvManagement: false
  });
}

export function describeSelection(selection: LibrarySelection | undefined): string {
  if (selection === undefined) return "none";
  if (selection === "all") return "all";
  return selection.length > 0 ? selection.join(", ") : "none";
}

export async function assignRolePolicy(
  client: EmbyClient,
  userId: string,
  roles: readonly string[],
  logger: Logger
): Promise<boolean> {
  const { policy, ignoredRoles } = buildRolePolicy(roles);
  if (ignoredRoles.length > 0) {
    logger.warn(`Ignoring unknown role(s): ${ignoredRoles.join(", ")}`);
  }
  try {
    const response = await client.setPolicy(userId, policy);
    if (isSuccessStatus(response.status)) return true;
    logger.error(`Failed to set user policy. Status: ${response.status}, Response: ${response.text}`);
    return false;
  } catch (err) {
    logger.error(`Exception setting user policy: ${errorMessage(err)}`);
    return false;
  }
}

async function writeDirectPolicy(client: EmbyClient, userId: string, logger: Logger): Promise<boolean> {
  try {
    const response = await client.setPolicy(userId, directAllFoldersPolicy());
    if (isSuccessStatus(response.status)) {
      logger.info(`Successfully set EnableAllFolders=true policy for user ID: ${userId}`);
      return true;
    }
    logger.error(`Failed to set direct policy. Status: ${response.status}`);
  } catch (err) {
    logger.error(`Exception setting direct policy: ${errorMessage(err)}`);
  }
  return false;
}

export async function assignLibraryAccess(
  client: EmbyClient,
  userId: string,
  selection: LibrarySelection,
  logger: Logger
): Promise<boolean> {
  let fetched: PolicyDocument | undefined;
  try {
    logger.info(`Fetching current policy for user ID: ${userId}`);
    const response = await client.getPolicy(userId);
    const data = response.status === 200 ? parseJson(response.text) : undefined;
    if (isRecord(data)) {
      fetched = data;
    } else {
      logger.error(`Failed to get user policy. Status: ${response.status}`);
    }
  } catch (err) {
    logger.error(`Exception fetching user policy: ${errorMessage(err)}`);
  }

  if (!fetched) {
    return selection === "all" ? writeDirectPolicy(client, userId, logger) : false;
  }

  const updated = applyLibraryAccess(fetched, selection);
  logger.info(`Setting EnableAllFolders=${String(updated.EnableAllFolders)} for user ID: ${userId}`);
  try {
    const response = await client.setPolicy(userId, updated);
    if (isSuccessStatus(response.status)) {
      logger.info(`Successfully updated policy for user ID: ${userId}`);
      return true;
    }
    logger.error(`Failed to update policy. Status: ${response.status}, Response: ${response.text}`);
    return false;
  } catch (err) {
    logger.error(`Exception setting library access: ${errorMessage(err)}`);
    return false;
  }
}
