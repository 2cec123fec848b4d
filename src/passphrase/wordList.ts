import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";
import { NotFoundError } from "../errors.js";

const moduleDir = path.dirname(fileURLToPath(import.meta.url));

// Sources run from src/passphrase, the build from dist/src/passphrase
const DEFAULT_CANDIDATES = [
  path.resolve(moduleDir, "../../data/words.txt"),
  path.resolve(moduleDir, "../../../data/words.txt")
];

export function defaultWordListPath(): string {
  return DEFAULT_CANDIDATES.find((p) => fs.existsSync(p)) ?? DEFAULT_CANDIDATES[0];
}

/** One word per line; blank lines and `#` comments are ignored */
export function parseWordList(content: string): string[] {
  return content
    .split(/\r?\n/)
    .map((line) => line.trim())
    .filter((line) => line !== "" && !line.startsWith("#"));
}

export async function loadWordList(filePath: string = defaultWordListPath()): Promise<string[]> {
  if (!fs.existsSync(filePath)) {
    throw new NotFoundError(filePath, "Word list");
  }
  return parseWordList(await fs.promises.readFile(filePath, "utf8"));
}
