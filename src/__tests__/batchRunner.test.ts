import { describe, it, after } from "node:test";
import { strict as assert } from "node:assert";
import fs from "node:fs";
import path from "node:path";
import { buildDescriptor, runBatch } from "../batchRunner.js";
import { ConfigError, NotFoundError, SchemaError } from "../errors.js";
import { DEFAULT_ROLES } from "../emby/policy.js";
import {
  apiPath,
  jsonBody,
  jsonResponse,
  makeTempDir,
  memoryLogger,
  noContent,
  removeDir,
  testClient,
  textResponse,
  type RecordedRequest
} from "./helpers.js";

const dir = makeTempDir("batch");
after(() => removeDir(dir));

function writeCsv(name: string, lines: string[]): string {
  const file = path.join(dir, name);
  fs.writeFileSync(file, lines.join("\n") + "\n");
  return file;
}

const noSleep = async () => {};

describe("buildDescriptor", () => {
  it("trims the username, email and thumb but not the passphrase", () => {
    const { descriptor } = buildDescriptor(
      { Username: " alice ", Email: " alice@example.com ", Passphrase: " p1 ", Thumb: " https://img.test/a " },
      { libraries: "all" }
    );
    assert.deepEqual(descriptor, {
      username: "alice",
      email: "alice@example.com",
      password: " p1 ",
      avatarSource: "https://img.test/a",
      libraryIds: "all",
      roles: DEFAULT_ROLES
    });
  });

  it("drops the thumb and libraries when those steps are skipped", () => {
    const { descriptor } = buildDescriptor(
      { Username: "bob", Email: "", Passphrase: "p2", Thumb: "https://img.test/b" },
      { libraries: ["5"], roles: ["EnableLiveTvAccess"], skipImages: true, skipLibraries: true }
    );
    assert.equal(descriptor?.avatarSource, undefined);
    assert.equal(descriptor?.libraryIds, undefined);
    assert.deepEqual(descriptor?.roles, ["EnableLiveTvAccess"]);
  });

  it("rejects a row without a username", () => {
    assert.deepEqual(buildDescriptor({ Username: "  ", Email: "x@example.com" }, {}), {
      error: "Missing required Username"
    });
  });
});

describe("runBatch", () => {
  it("dry run validates rows without a client", async () => {
    const csvPath = writeCsv("dry.csv", [
      "Username,Email,Passphrase,Thumb",
      "alice,alice@example.com,p1,",
      "bob, bob@example.com ,p2,https://img.test/b",
      ",nobody@example.com,p3,",
      "ALICE,dup@example.com,p4,"
    ]);
    const logger = memoryLogger();
    const summary = await runBatch({ csvPath, logger, dryRun: true, libraries: ["5", "6"], sleep: noSleep });

    assert.equal(summary.dryRun, true);
    assert.equal(summary.total, 4);
    assert.equal(summary.succeeded, 2);
    assert.equal(summary.failed, 2);
    assert.deepEqual(
      summary.failures.map((f) => [f.recordNumber, f.errorType, f.errorMessage]),
      [
        [3, "row_invalid", "Missing required Username"],
        [4, "row_invalid", "Duplicate username in input: ALICE"]
      ]
    );
    assert.equal(summary.failures[0]?.email, "nobody@example.com");
    assert.ok(
      logger.messages("INFO").includes("[DRY RUN] Would create user: bob, Email: bob@example.com, Libraries: 5, 6")
    );
    assert.equal(logger.messages("INFO").at(-1), "User creation complete. Successful: 2, Failed: 2");
  });

  it("requires a client outside dry run", async () => {
    const csvPath = writeCsv("noclient.csv", ["Username,Email,Passphrase", "alice,a@example.com,p1"]);
    await assert.rejects(runBatch({ csvPath, logger: memoryLogger() }), ConfigError);
  });

  it("stops before any row when the file is missing or incomplete", async () => {
    const { client, requests } = testClient(() => noContent());
    await assert.rejects(runBatch({ csvPath: path.join(dir, "absent.csv"), logger: memoryLogger(), client }), NotFoundError);

    const csvPath = writeCsv("columns.csv", ["Username,Email", "alice,a@example.com"]);
    await assert.rejects(runBatch({ csvPath, logger: memoryLogger(), client }), SchemaError);
    assert.equal(requests.length, 0);
  });

  it("provisions rows in order and records failures", async () => {
    const csvPath = writeCsv("live.csv", [
      "Username,Email,Passphrase,Thumb",
      "alice,alice@example.com,p1,https://img.test/a",
      "bob,bob@example.com,p2,",
      "carol,carol@example.com,p3,"
    ]);
    const created: string[] = [];
    const { client } = testClient((req: RecordedRequest) => {
      if (apiPath(req) !== "/Users/New") return noContent();
      const body = jsonBody(req);
      const name = typeof body === "object" && body !== null && "Name" in body ? String(body.Name) : "";
      created.push(name);
      return name === "bob" ? textResponse("User exists", 400) : jsonResponse({ Id: `id-${name}` });
    });
    const pauses: number[] = [];
    const logger = memoryLogger();

    const summary = await runBatch({
      csvPath,
      logger,
      client,
      delayMs: 500,
      skipImages: true,
      sleep: async (ms) => void pauses.push(ms)
    });

    assert.deepEqual(created, ["alice", "bob", "carol"]);
    assert.deepEqual(pauses, [500, 500]);
    assert.equal(summary.succeeded, 2);
    assert.equal(summary.failed, 1);
    assert.deepEqual(
      summary.accounts.map((a) => [a.remoteId, a.steps.policy, a.steps.library, a.steps.avatar]),
      [
        ["id-alice", "set", "skipped", "skipped"],
        ["id-carol", "set", "skipped", "skipped"]
      ]
    );

    const [failure] = summary.failures;
    assert.equal(failure?.recordNumber, 2);
    assert.equal(failure?.username, "bob");
    assert.equal(failure?.errorType, "user_create");
    assert.equal(failure?.httpStatus, 400);
    assert.equal(failure?.responseBody, "User exists");
    assert.deepEqual(failure?.rawRow, { Username: "bob", Email: "bob@example.com", Passphrase: "p2", Thumb: "" });
    assert.equal(logger.messages("INFO").at(-1), "User creation complete. Successful: 2, Failed: 1");
  });

  it("classifies a missing remote id as an identity failure", async () => {
    const csvPath = writeCsv("identity.csv", ["Username,Email,Passphrase", "dave,dave@example.com,p1"]);
    const { client } = testClient((req) => (apiPath(req) === "/Users" ? jsonResponse([]) : noContent()));
    const summary = await runBatch({ csvPath, logger: memoryLogger(), client, roles: [], sleep: noSleep });

    assert.equal(summary.failures[0]?.errorType, "identity_resolution");
    assert.equal(summary.failures[0]?.errorMessage, "Could not retrieve user ID for dave");
    assert.equal(summary.failures[0]?.httpStatus, undefined);
  });
});
