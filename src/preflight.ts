import type { Logger } from "./logger.js";
import type { LibrarySelection } from "./types.js";
import { ConfigError } from "./errors.js";
import { parseList } from "./config.js";
import { readAccountsCsv, type AccountsCsv } from "./csv/accountsCsv.js";
import type { EmbyClient } from "./emby/client.js";
import { listLibraries, promptLibrarySelection } from "./emby/libraries.js";

export type PreflightOptions = {
  csvPath: string;
  logger: Logger;
  client?: EmbyClient;
  dryRun?: boolean;
  /** Raw `--libraries` value: "all" or comma-separated ids */
  libraries?: string;
  skipLibraries?: boolean;
  /** Whether a prompt can be answered; defaults to stdin being a TTY */
  interactive?: boolean;
  prompt?: typeof promptLibrarySelection;
};

export type Preflight = {
  accounts: AccountsCsv;
  libraries?: LibrarySelection;
};

/**
 * Everything create-users settles before the first account is created.
 *
 * The CSV is read and its header checked first, so a missing file or column
 * fails before the server is contacted or the operator is asked anything.
 */
export async function prepareRun(options: PreflightOptions): Promise<Preflight> {
  const { logger, client } = options;
  const accounts = await readAccountsCsv(options.csvPath);

  if (options.skipLibraries) {
    return { accounts };
  }
  if (options.libraries !== undefined) {
    const selection = options.libraries.trim().toLowerCase() === "all" ? "all" : parseList(options.libraries);
    return { accounts, libraries: selection };
  }
  if (options.dryRun || !client) {
    return { accounts };
  }

  const interactive = options.interactive ?? Boolean(process.stdin.isTTY);
  if (!interactive) {
    throw new ConfigError("--libraries is required when stdin is not a terminal (use --libraries all, ids, or --skip-libraries).");
  }
  const prompt = options.prompt ?? promptLibrarySelection;
  return { accounts, libraries: await prompt(await listLibraries(client, logger), logger) };
}
