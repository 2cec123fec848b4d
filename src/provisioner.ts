/**
 * Account provisioning
 *
 * Per account: create → policy → library access → avatar. Only the create
 * step can fail the account; the other steps are best-effort and their
 * outcome is recorded on the ProvisionedAccount.
 */

import type { Logger } from "./logger.js";
import type { AccountDescriptor, ProvisionedAccount, StepOutcome } from "./types.js";
import { CreateError, IdentityResolutionError, errorMessage } from "./errors.js";
import { EmbyClient, isRecord, isSuccessStatus, parseJson, stringField } from "./emby/client.js";
import { assignLibraryAccess, assignRolePolicy } from "./emby/policy.js";
import { assignAvatar, type AvatarOptions } from "./emby/avatar.js";

export type ProvisionError = CreateError | IdentityResolutionError;

export type ProvisionResult =
  | { ok: true; account: ProvisionedAccount }
  | { ok: false; error: ProvisionError };

export type ProvisionOptions = {
  logger: Logger;
  avatar?: AvatarOptions;
  /** Pause between the steps of one account */
  stepDelayMs?: number;
  sleep?: (ms: number) => Promise<void>;
};

export const sleep = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

/** Id from the create response, or from the user listing when the body has none */
async function resolveRemoteId(client: EmbyClient, username: string, body: string, logger: Logger): Promise<string | undefined> {
  const data = parseJson(body);
  const fromBody = isRecord(data) ? stringField(data, "Id") : undefined;
  if (fromBody) return fromBody;

  logger.info(`No user ID in create response for ${username}; looking it up by name`);
  try {
    return await client.findUserIdByName(username);
  } catch (err) {
    logger.error(`Exception getting user ID: ${errorMessage(err)}`);
    return undefined;
  }
}

export async function provisionAccount(
  client: EmbyClient,
  descriptor: AccountDescriptor,
  options: ProvisionOptions
): Promise<ProvisionResult> {
  const { logger, stepDelayMs = 0 } = options;
  const pause = options.sleep ?? sleep;
  const { username } = descriptor;

  let status: number;
  let body: string;
  try {
    const response = await client.createUser(username, descriptor.email, descriptor.password);
    status = response.status;
    body = response.text;
  } catch (err) {
    const error = new CreateError(username, undefined, errorMessage(err));
    logger.error(error.message);
    return { ok: false, error };
  }

  if (!isSuccessStatus(status)) {
    const error = new CreateError(username, status, body);
    logger.error(error.message);
    return { ok: false, error };
  }

  const remoteId = await resolveRemoteId(client, username, body, logger);
  if (!remoteId) {
    const error = new IdentityResolutionError(username);
    logger.error(`Failed to get user ID for ${username}`);
    return { ok: false, error };
  }
  logger.info(`Successfully created user: ${username} with ID: ${remoteId}`);

  const steps: ProvisionedAccount["steps"] = {
    policy: "skipped",
    library: "skipped",
    avatar: "skipped"
  };
  const between = async () => {
    if (stepDelayMs > 0) await pause(stepDelayMs);
  };

  if (descriptor.roles && descriptor.roles.length > 0) {
    await between();
    steps.policy = outcome(await assignRolePolicy(client, remoteId, descriptor.roles, logger));
    if (steps.policy === "failed") {
      logger.warn(`Failed to set policy for user ${username}`);
    }
  }

  const libraries = descriptor.libraryIds;
  if (libraries === "all" || (libraries !== undefined && libraries.length > 0)) {
    await between();
    steps.library = outcome(await assignLibraryAccess(client, remoteId, libraries, logger));
    if (steps.library === "failed") {
      logger.warn(`Failed to set library access for user ${username}`);
    }
  }

  if (descriptor.avatarSource && descriptor.avatarSource.trim() !== "") {
    await between();
    steps.avatar = await assignAvatar(client, remoteId, descriptor.avatarSource.trim(), logger, options.avatar);
  }

  return {
    ok: true,
    account: { descriptor, remoteId, created: true, steps }
  };
}

function outcome(success: boolean): StepOutcome {
  return success ? "set" : "failed";
}
