/**
 * Test runner
 *
 * Finds every `__tests__/*.test.ts` file under src/ and runs them in one
 * `node --test` process with tsx as the loader.
 *
 * Usage: npm test
 * Or:    npx tsx scripts/run-all-tests.ts
 */

import { spawn } from "node:child_process";
import fs from "node:fs";
import path from "node:path";
import { fileURLToPath } from "node:url";

const rootDir = path.join(path.dirname(fileURLToPath(import.meta.url)), "..");

function findTestFiles(dir: string): string[] {
  const files: string[] = [];
  for (const entry of fs.readdirSync(dir, { withFileTypes: true })) {
    const full = path.join(dir, entry.name);
    if (entry.isDirectory()) {
      files.push(...findTestFiles(full));
    } else if (path.basename(dir) === "__tests__" && entry.name.endsWith(".test.ts")) {
      files.push(full);
    }
  }
  return files.sort();
}

async function main(): Promise<number> {
  const files = findTestFiles(path.join(rootDir, "src")).map((f) => path.relative(rootDir, f));
  if (files.length === 0) {
    console.error("No test files found under src/");
    return 1;
  }

  return new Promise((resolve, reject) => {
    const proc = spawn(process.execPath, ["--import", "tsx", "--test", ...files], { cwd: rootDir, stdio: "inherit" });
    proc.on("error", reject);
    proc.on("close", (code) => resolve(code ?? 1));
  });
}

main()
  .then((code) => {
    process.exit(code);
  })
  .catch((err) => {
    console.error("Test runner failed:", err);
    process.exit(1);
  });
