#!/usr/bin/env node
/**
 * Print one or more passphrases, one per line
 */

import { Command } from "commander";
import path from "node:path";
import chalk from "chalk";
import { DEFAULT_MIN_WORDS, DEFAULT_SEPARATORS, generatePassphrase } from "../src/passphrase/generator.js";
import { defaultWordListPath, loadWordList } from "../src/passphrase/wordList.js";
import { parsePositiveInteger } from "../src/config.js";
import { errorMessage } from "../src/errors.js";

const program = new Command();

program
  .name("generate-passphrase")
  .description("Generate memorable passphrases from a word list")
  .option("-n, --count <n>", "Number of passphrases", "1")
  .option("--word-list <path>", "Word list (one word per line)")
  .option("--min-words <n>", "Words per passphrase", String(DEFAULT_MIN_WORDS))
  .option("--separators <chars>", "Separator characters to pick from", DEFAULT_SEPARATORS.join(""))
  .option("--no-number", "Do not add a number")
  .parse(process.argv);

type Options = {
  count: string;
  wordList?: string;
  minWords: string;
  separators: string;
  number: boolean;
};

async function main() {
  const opts = program.opts<Options>();
  const count = parsePositiveInteger(opts.count, "--count");
  const minWords = parsePositiveInteger(opts.minWords, "--min-words");
  const words = await loadWordList(opts.wordList ? path.resolve(opts.wordList) : defaultWordListPath());

  for (let i = 0; i < count; i++) {
    console.log(
      generatePassphrase(words, {
        minWords,
        separators: [...opts.separators],
        includeNumber: opts.number
      })
    );
  }
}

main().catch((err) => {
  console.error(chalk.red(`Error: ${errorMessage(err)}`));
  process.exit(1);
});
