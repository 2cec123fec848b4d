import type { Logger } from "./logger.js";
import type { AccountDescriptor, BatchSummary, CSVRow, FailureRecord, LibrarySelection } from "./types.js";
import { ConfigError, CreateError } from "./errors.js";
import { readAccountsCsv, type AccountsCsv } from "./csv/accountsCsv.js";
import { EmbyClient } from "./emby/client.js";
import { DEFAULT_ROLES, describeSelection } from "./emby/policy.js";
import type { AvatarOptions } from "./emby/avatar.js";
import { provisionAccount, sleep as defaultSleep } from "./provisioner.js";

export const DEFAULT_DELAY_MS = 1000;

export type BatchOptions = {
  csvPath: string;
  /** Already-read contents of csvPath; read from disk when absent */
  accounts?: AccountsCsv;
  logger: Logger;
  /** Required unless dryRun */
  client?: EmbyClient;
  dryRun?: boolean;
  /** Pause after each provisioned row before the next one */
  delayMs?: number;
  stepDelayMs?: number;
  libraries?: LibrarySelection;
  roles?: readonly string[];
  skipLibraries?: boolean;
  skipImages?: boolean;
  avatar?: AvatarOptions;
  sleep?: (ms: number) => Promise<void>;
};

type RunDefaults = Pick<BatchOptions, "libraries" | "roles" | "skipLibraries" | "skipImages">;

function isBlank(value: string | undefined): boolean {
  return value === undefined || value.trim() === "";
}

export function buildDescriptor(row: CSVRow, defaults: RunDefaults): { descriptor?: AccountDescriptor; error?: string } {
  const username = (row.Username ?? "").trim();
  if (!username) {
    return { error: "Missing required Username" };
  }

  const thumb = (row.Thumb ?? "").trim();
  const descriptor: AccountDescriptor = {
    username,
    email: (row.Email ?? "").trim(),
    password: row.Passphrase ?? "",
    avatarSource: !defaults.skipImages && !isBlank(thumb) ? thumb : undefined,
    libraryIds: defaults.skipLibraries ? undefined : defaults.libraries,
    roles: defaults.roles ?? DEFAULT_ROLES
  };
  return { descriptor };
}

/**
 * Provision every row of the users CSV, strictly one after another.
 *
 * Throws (before any row is processed) when the file is missing or lacks a
 * required column. Row failures are counted and recorded, never thrown.
 */
export async function runBatch(options: BatchOptions): Promise<BatchSummary> {
  const { csvPath, logger, client, dryRun = false, delayMs = DEFAULT_DELAY_MS, stepDelayMs = 0 } = options;
  const sleep = options.sleep ?? defaultSleep;

  if (!dryRun && !client) {
    throw new ConfigError("An Emby client is required unless running in dry-run mode.");
  }

  const { rows } = options.accounts ?? (await readAccountsCsv(csvPath));

  const startedAt = Date.now();
  const summary: BatchSummary = {
    total: 0,
    succeeded: 0,
    failed: 0,
    dryRun,
    startedAt,
    endedAt: startedAt,
    failures: [],
    accounts: []
  };

  const recordFailure = (failure: Omit<FailureRecord, "timestamp">) => {
    summary.failed += 1;
    summary.failures.push({ ...failure, timestamp: new Date().toISOString() });
  };

  const seen = new Set<string>();
  let recordNumber = 0;

  for (const row of rows) {
    recordNumber += 1;
    summary.total += 1;

    const built = buildDescriptor(row, options);
    const descriptor = built.descriptor;
    if (!descriptor) {
      logger.error(`Record #${recordNumber} skipped: ${built.error}`);
      recordFailure({ recordNumber, email: row.Email, errorType: "row_invalid", errorMessage: built.error ?? "Invalid row", rawRow: row });
      continue;
    }

    const key = descriptor.username.toLowerCase();
    if (seen.has(key)) {
      const message = `Duplicate username in input: ${descriptor.username}`;
      logger.error(`Record #${recordNumber} skipped: ${message}`);
      recordFailure({ recordNumber, username: descriptor.username, email: descriptor.email, errorType: "row_invalid", errorMessage: message, rawRow: row });
      continue;
    }
    seen.add(key);

    if (dryRun || !client) {
      logger.info(
        `[DRY RUN] Would create user: ${descriptor.username}, Email: ${descriptor.email}, Libraries: ${describeSelection(descriptor.libraryIds)}`
      );
      summary.succeeded += 1;
      continue;
    }

    const result = await provisionAccount(client, descriptor, {
      logger,
      avatar: options.avatar,
      stepDelayMs,
      sleep
    });

    if (result.ok) {
      summary.succeeded += 1;
      summary.accounts.push(result.account);
    } else {
      const { error } = result;
      const createError = error instanceof CreateError ? error : undefined;
      recordFailure({
        recordNumber,
        username: descriptor.username,
        email: descriptor.email,
        errorType: createError ? "user_create" : "identity_resolution",
        errorMessage: error.message,
        httpStatus: createError?.status,
        responseBody: createError?.body,
        rawRow: row
      });
    }

    if (delayMs > 0 && recordNumber < rows.length) {
      await sleep(delayMs);
    }
  }

  summary.endedAt = Date.now();
  logger.info(`User creation complete. Successful: ${summary.succeeded}, Failed: ${summary.failed}`);
  return summary;
}
