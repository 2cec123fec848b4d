import crypto from "node:crypto";
import { InsufficientWordsError, MigrationError } from "../errors.js";

export const DEFAULT_SEPARATORS: readonly string[] = ["-", ".", "_", "+"];
export const DEFAULT_MIN_WORDS = 3;

export type PassphraseOptions = {
  minWords?: number;
  separators?: readonly string[];
  includeNumber?: boolean;
  /** Word, separator and position picks; Math.random by default */
  random?: () => number;
  /** Integer in [0, max); crypto.randomInt by default */
  randomInt?: (max: number) => number;
};

function pickIndex(random: () => number, length: number): number {
  return Math.min(length - 1, Math.floor(random() * length));
}

/**
 * `minWords` distinct words joined by one separator, with an optional number
 * in [0, 100) placed anywhere among them (including first or last).
 *
 * @example generatePassphrase(words) // "maple-42-harbor-quartz"
 */
export function generatePassphrase(wordList: readonly string[], options: PassphraseOptions = {}): string {
  const {
    minWords = DEFAULT_MIN_WORDS,
    separators = DEFAULT_SEPARATORS,
    includeNumber = true,
    random = Math.random,
    randomInt = (max: number) => crypto.randomInt(0, max)
  } = options;

  if (!Number.isInteger(minWords) || minWords < 1) {
    throw new MigrationError(`minWords must be a positive integer (got ${minWords})`);
  }
  const usableSeparators = separators.filter((s) => s !== "");
  if (usableSeparators.length === 0) {
    throw new MigrationError("At least one separator is required");
  }

  const pool = [...new Set(wordList.map((w) => w.trim()).filter((w) => w !== ""))];
  if (pool.length < minWords) {
    throw new InsufficientWordsError(pool.length, minWords);
  }

  // Partial Fisher-Yates: the first minWords slots end up a uniform sample
  for (let i = 0; i < minWords; i++) {
    const j = i + pickIndex(random, pool.length - i);
    const tmp = pool[i];
    pool[i] = pool[j];
    pool[j] = tmp;
  }
  const tokens = pool.slice(0, minWords);

  const separator = usableSeparators[pickIndex(random, usableSeparators.length)];

  if (includeNumber) {
    const position = pickIndex(random, tokens.length + 1);
    tokens.splice(position, 0, String(randomInt(100)));
  }

  return tokens.join(separator);
}
