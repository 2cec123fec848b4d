#!/usr/bin/env node
/**
 * Create Emby users from a users CSV
 *
 * Exit codes:
 * - 0: Run completed (individual rows may have failed; see summary)
 * - 1: Fatal error (missing file, missing columns, bad options, cancelled prompt)
 */

import "dotenv/config";
import { Command } from "commander";
import path from "node:path";
import { runBatch, DEFAULT_DELAY_MS } from "../src/batchRunner.js";
import { renderSummaryBox } from "../src/summary.js";
import { writeErrorsOut } from "../src/errorsOut.js";
import { createLogger } from "../src/logger.js";
import { parseList, parseSeconds, resolveConnectionSettings } from "../src/config.js";
import { prepareRun } from "../src/preflight.js";
import { ConfigError, errorMessage } from "../src/errors.js";
import { EmbyClient } from "../src/emby/client.js";
import { testConnection } from "../src/emby/connection.js";
import { DEFAULT_ROLES, describeSelection } from "../src/emby/policy.js";
import { formatLibraryList, listLibraries } from "../src/emby/libraries.js";
import {
  AVATAR_FALLBACKS,
  JSON_UPLOAD_VARIANTS,
  RAW_UPLOAD_VARIANTS,
  type AvatarFallback
} from "../src/emby/avatar.js";

const program = new Command();

program
  .name("emby-create-users")
  .description("Create Emby users from a CSV file")
  .argument("[csv]", "Path to CSV file with user data (Username, Email, Passphrase, optional Thumb)")
  .option("--server <url>", "Emby server URL, e.g. http://localhost:8096 (env: EMBY_SERVER_URL)")
  .option("--api-key <key>", "Emby admin API key (env: EMBY_API_KEY)")
  .option("--libraries <ids>", "Library IDs to grant access to (comma-separated, or 'all')")
  .option("--roles <roles>", "Default roles to assign (comma-separated)")
  .option("--dry-run", "Simulate without creating users", false)
  .option("--delay <seconds>", "Delay in seconds between users", String(DEFAULT_DELAY_MS / 1000))
  .option("--step-delay <seconds>", "Delay in seconds between the steps for one user", "1")
  .option("--skip-libraries", "Skip setting library access", false)
  .option("--skip-images", "Skip profile image uploads", false)
  .option("--avatar-fallback <strategy>", `Image to use when a Thumb cannot be downloaded (${AVATAR_FALLBACKS.join(", ")})`, "identicon")
  .option("--raw-image-upload", "Upload profile images as raw bytes instead of base64 JSON", false)
  .option("--list-libraries", "List available libraries and exit", false)
  .option("--test-connection", "Test connection to Emby server and exit", false)
  .option("--errors-out <path>", "Write failed rows to a CSV or JSON file")
  .option("--log-file <path>", "Log file (appended to)", "emby_user_creation.log")
  .option("--quiet", "Only print warnings, errors and the summary", false)
  .parse(process.argv);

type Options = {
  server?: string;
  apiKey?: string;
  libraries?: string;
  roles?: string;
  dryRun: boolean;
  delay: string;
  stepDelay: string;
  skipLibraries: boolean;
  skipImages: boolean;
  avatarFallback: string;
  rawImageUpload: boolean;
  listLibraries: boolean;
  testConnection: boolean;
  errorsOut?: string;
  logFile: string;
  quiet: boolean;
};

function parseAvatarFallback(value: string): AvatarFallback {
  const match = AVATAR_FALLBACKS.find((f) => f === value);
  if (!match) {
    throw new ConfigError(`--avatar-fallback must be one of: ${AVATAR_FALLBACKS.join(", ")}`);
  }
  return match;
}

async function main(): Promise<number> {
  const opts = program.opts<Options>();
  const [csvArg] = program.args;
  const logger = createLogger({ quiet: opts.quiet, logFile: opts.logFile });

  try {
    const needsServer = !opts.dryRun || opts.listLibraries || opts.testConnection;
    const client = needsServer ? new EmbyClient(resolveConnectionSettings(opts)) : undefined;

    if (opts.testConnection && client) {
      const info = await testConnection(client, logger);
      return info ? 0 : 1;
    }

    if (opts.listLibraries && client) {
      const libraries = await listLibraries(client, logger);
      logger.info("Available libraries:");
      for (const line of formatLibraryList(libraries)) {
        logger.info(line);
      }
      return 0;
    }

    if (!csvArg) {
      throw new ConfigError("A CSV file argument is required.");
    }
    const csvPath = path.resolve(csvArg);

    const roles = opts.roles ? parseList(opts.roles) : DEFAULT_ROLES;
    const delayMs = parseSeconds(opts.delay);
    const stepDelayMs = parseSeconds(opts.stepDelay);
    const avatar = {
      fallback: parseAvatarFallback(opts.avatarFallback),
      variants: opts.rawImageUpload ? RAW_UPLOAD_VARIANTS : JSON_UPLOAD_VARIANTS
    };

    const { accounts, libraries } = await prepareRun({
      csvPath,
      logger,
      client,
      dryRun: opts.dryRun,
      libraries: opts.libraries,
      skipLibraries: opts.skipLibraries
    });

    logger.info(`Starting Emby user creation from CSV: ${csvPath}`);
    logger.info(`Server URL: ${client?.serverUrl ?? "(dry run)"}`);
    logger.info(`Dry run: ${opts.dryRun ? "Yes" : "No"}`);
    if (opts.skipLibraries) {
      logger.info("Library access setting will be skipped");
    } else {
      logger.info(`Selected libraries: ${describeSelection(libraries)}`);
    }
    if (opts.skipImages) {
      logger.info("Profile image uploads will be skipped");
    }
    logger.info(`Default roles: ${roles.join(", ")}`);

    const summary = await runBatch({
      csvPath,
      accounts,
      logger,
      client,
      dryRun: opts.dryRun,
      delayMs,
      stepDelayMs,
      libraries,
      roles,
      skipLibraries: opts.skipLibraries,
      skipImages: opts.skipImages,
      avatar
    });

    if (opts.errorsOut && summary.failures.length > 0) {
      const errorsOutPath = path.resolve(opts.errorsOut);
      await writeErrorsOut(errorsOutPath, summary.failures);
      logger.warn(`Wrote ${summary.failures.length} error record(s) to: ${errorsOutPath}`);
    }

    // Summary goes to stderr so it shows even with --quiet
    // eslint-disable-next-line no-console
    console.error(renderSummaryBox(summary));
    return 0;
  } catch (err) {
    logger.error(`Fatal error: ${errorMessage(err)}`);
    return 1;
  } finally {
    await logger.close();
  }
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((err) => {
    // eslint-disable-next-line no-console
    console.error(`Fatal error: ${errorMessage(err)}`);
    process.exit(1);
  });
