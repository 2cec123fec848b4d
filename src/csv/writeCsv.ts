import fs from "node:fs";
import { stringify } from "csv-stringify";

/** Stream rows to a new CSV file with a header row of `columns` */
export function writeCsv(
  rows: Iterable<Record<string, unknown>>,
  columns: readonly string[],
  outputPath: string
): Promise<void> {
  return new Promise((resolve, reject) => {
    const output = fs.createWriteStream(outputPath);
    const stringifier = stringify({ header: true, columns: [...columns] });

    output.on("finish", () => resolve());
    output.on("error", (err) => reject(err));
    stringifier.on("error", (err) => reject(err));

    stringifier.pipe(output);
    for (const row of rows) {
      stringifier.write(row);
    }
    stringifier.end();
  });
}
