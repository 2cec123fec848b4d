import { describe, it, after } from "node:test";
import { strict as assert } from "node:assert";
import fs from "node:fs";
import path from "node:path";
import {
  RECORD_PATHS,
  extractRows,
  findUserRecords,
  importPlexExport,
  parseExportDocument,
  writeExportCsv,
  type ImportOptions
} from "../plexExport.js";
import { parseAccountsCsv } from "../../csv/accountsCsv.js";
import { NoRecordsError, NotFoundError, ParseError } from "../../errors.js";
import { makeTempDir, memoryLogger, removeDir } from "../../__tests__/helpers.js";

const FRIENDS_EXPORT = `<?xml version="1.0" encoding="UTF-8"?>
<MediaContainer size="4">
  <User id="11" title="Zed" username="" email="zed@example.com" thumb="https://plex.tv/users/z/avatar"/>
  <User id="12" username="alice" title="Alice A" email="alice@example.com" thumb=""/>
  <User id="13" email="ghost@example.com"/>
  <User userID="14" name="bob" avatar="https://img.test/bob"/>
</MediaContainer>
`;

const fixedPassphrase = (logger = memoryLogger()): ImportOptions => ({
  wordList: ["oak", "pine", "elm"],
  passphrase: { includeNumber: false, random: () => 0 },
  logger
});

describe("parseExportDocument", () => {
  it("rejects malformed XML with the line number", () => {
    assert.throws(
      () => parseExportDocument("<MediaContainer>\n<User id=\"1\">\n</MediaContainer>"),
      (err: unknown) => err instanceof ParseError && /^Could not parse export document \(line \d+\): /.test(err.message)
    );
  });
});

describe("findUserRecords", () => {
  it("uses the first path that yields records", () => {
    const nested = parseExportDocument(
      '<MediaContainer><Users><User id="1" username="a"/><User id="2" username="b"/></Users></MediaContainer>'
    );
    const found = findUserRecords(nested);
    assert.equal(found.path, "MediaContainer/Users/User");
    assert.equal(found.records.length, 2);
  });

  it("finds shared-server records", () => {
    const doc = parseExportDocument('<MediaContainer><SharedServer id="5" username="carol"/></MediaContainer>');
    assert.equal(findUserRecords(doc).path, "MediaContainer/SharedServer");
  });

  it("accepts a bare User root", () => {
    const doc = parseExportDocument('<User id="1" username="solo"/>');
    assert.equal(findUserRecords(doc).path, "User");
  });

  it("throws NoRecordsError listing every path tried", () => {
    const doc = parseExportDocument('<MediaContainer size="0"></MediaContainer>');
    assert.throws(
      () => findUserRecords(doc),
      (err: unknown) =>
        err instanceof NoRecordsError && err.message === `No user records found (tried: ${RECORD_PATHS.join(", ")})`
    );
  });
});

describe("extractRows", () => {
  it("resolves attribute fallbacks, skips nameless records and sorts by username", () => {
    const logger = memoryLogger();
    const rows = extractRows(parseExportDocument(FRIENDS_EXPORT), fixedPassphrase(logger));

    assert.deepEqual(rows, [
      { ID: "12", Username: "alice", Email: "alice@example.com", Thumb: "", Passphrase: "oak-pine-elm" },
      { ID: "14", Username: "bob", Email: "", Thumb: "https://img.test/bob", Passphrase: "oak-pine-elm" },
      {
        ID: "11",
        Username: "Zed",
        Email: "zed@example.com",
        Thumb: "https://plex.tv/users/z/avatar",
        Passphrase: "oak-pine-elm"
      }
    ]);
    assert.deepEqual(logger.messages("INFO"), ["Found 4 user record(s) at MediaContainer/User"]);
    assert.deepEqual(logger.messages("WARNING"), ["Skipping record without a username (id: 13)"]);
  });
});

describe("importPlexExport / writeExportCsv", () => {
  const dir = makeTempDir("plex-export");
  after(() => removeDir(dir));

  it("writes a users CSV that create-users can read", async () => {
    const xmlPath = path.join(dir, "friends.xml");
    const csvPath = path.join(dir, "users.csv");
    fs.writeFileSync(xmlPath, FRIENDS_EXPORT);

    const rows = await importPlexExport(xmlPath, fixedPassphrase());
    await writeExportCsv(rows, csvPath);

    const content = fs.readFileSync(csvPath, "utf8");
    assert.equal(
      content,
      [
        "ID,Username,Email,Thumb,Passphrase",
        "12,alice,alice@example.com,,oak-pine-elm",
        "14,bob,,https://img.test/bob,oak-pine-elm",
        "11,Zed,zed@example.com,https://plex.tv/users/z/avatar,oak-pine-elm",
        ""
      ].join("\n")
    );
    assert.deepEqual(
      parseAccountsCsv(content).rows.map((r) => r.Username),
      ["alice", "bob", "Zed"]
    );
  });

  it("throws NotFoundError for a missing export", async () => {
    const xmlPath = path.join(dir, "absent.xml");
    await assert.rejects(
      importPlexExport(xmlPath, fixedPassphrase()),
      (err: unknown) => err instanceof NotFoundError && err.message === `Export file not found: ${xmlPath}`
    );
  });
});
