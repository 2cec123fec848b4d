#!/usr/bin/env node
/**
 * Convert a Plex user export (XML) into the users CSV read by create-users.
 * Every row gets a freshly generated passphrase.
 */

import { Command } from "commander";
import path from "node:path";
import chalk from "chalk";
import { importPlexExport, writeExportCsv } from "../src/exporter/plexExport.js";
import { defaultWordListPath, loadWordList } from "../src/passphrase/wordList.js";
import { DEFAULT_MIN_WORDS, DEFAULT_SEPARATORS } from "../src/passphrase/generator.js";
import { createLogger } from "../src/logger.js";
import { parsePositiveInteger } from "../src/config.js";
import { errorMessage } from "../src/errors.js";

const program = new Command();

program
  .name("plex-to-csv")
  .description("Convert a Plex user export (XML) to a users CSV with generated passphrases")
  .requiredOption("-i, --input <path>", "Plex export XML file")
  .option("-o, --output <path>", "Output CSV path", "plex_users.csv")
  .option("--word-list <path>", "Word list for passphrases (one word per line)")
  .option("--min-words <n>", "Words per passphrase", String(DEFAULT_MIN_WORDS))
  .option("--separators <chars>", "Separator characters to pick from", DEFAULT_SEPARATORS.join(""))
  .option("--no-number", "Do not add a number to passphrases")
  .option("--quiet", "Only print warnings and errors", false)
  .parse(process.argv);

type Options = {
  input: string;
  output: string;
  wordList?: string;
  minWords: string;
  separators: string;
  number: boolean;
  quiet: boolean;
};

async function main(): Promise<number> {
  const opts = program.opts<Options>();
  const logger = createLogger({ quiet: opts.quiet });

  try {
    const inputPath = path.resolve(opts.input);
    const outputPath = path.resolve(opts.output);
    const wordList = await loadWordList(opts.wordList ? path.resolve(opts.wordList) : defaultWordListPath());

    const rows = await importPlexExport(inputPath, {
      wordList,
      logger,
      passphrase: {
        minWords: parsePositiveInteger(opts.minWords, "--min-words"),
        separators: [...opts.separators],
        includeNumber: opts.number
      }
    });

    await writeExportCsv(rows, outputPath);
    logger.info(chalk.green(`Wrote ${rows.length} user(s) to ${outputPath}`));
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
