import { describe, it } from "node:test";
import { strict as assert } from "node:assert";
import { EmbyClient, isSuccessStatus, parseJson, stringField } from "../client.js";
import { testConnection } from "../connection.js";
import {
  TEST_API_KEY,
  apiPath,
  fakeFetch,
  jsonBody,
  jsonResponse,
  memoryLogger,
  noContent,
  testClient,
  textResponse
} from "../../__tests__/helpers.js";

describe("helpers", () => {
  it("isSuccessStatus accepts 200 and 204 only", () => {
    assert.equal(isSuccessStatus(200), true);
    assert.equal(isSuccessStatus(204), true);
    assert.equal(isSuccessStatus(201), false);
    assert.equal(isSuccessStatus(400), false);
  });

  it("parseJson returns undefined for blank or invalid text", () => {
    assert.equal(parseJson(""), undefined);
    assert.equal(parseJson("not json"), undefined);
    assert.deepEqual(parseJson('{"Id":"1"}'), { Id: "1" });
  });

  it("stringField accepts non-blank strings and numbers", () => {
    const record = { a: "x", b: 7, c: " ", d: null };
    assert.equal(stringField(record, "a"), "x");
    assert.equal(stringField(record, "b"), "7");
    assert.equal(stringField(record, "c"), undefined);
    assert.equal(stringField(record, "d"), undefined);
  });
});

describe("EmbyClient", () => {
  it("prefixes API paths with /emby and strips trailing slashes from the server URL", () => {
    const { fetch } = fakeFetch(() => noContent());
    const client = new EmbyClient({ serverUrl: "http://emby.test:8096//", apiKey: TEST_API_KEY, fetch });
    assert.equal(client.serverUrl, "http://emby.test:8096");
    assert.equal(client.url("/Users"), "http://emby.test:8096/emby/Users");
  });

  it("createUser posts Name, Email and Password with the token header", async () => {
    const { client, requests } = testClient(() => jsonResponse({ Id: "u1" }));
    const response = await client.createUser("alice", "alice@example.com", "maple-7-harbor");

    assert.deepEqual(response, { status: 200, text: '{"Id":"u1"}' });
    const [request] = requests;
    assert.equal(request?.method, "POST");
    assert.equal(request && apiPath(request), "/Users/New");
    assert.equal(request?.headers["x-emby-token"], TEST_API_KEY);
    assert.equal(request?.headers["content-type"], "application/json");
    assert.deepEqual(request && jsonBody(request), {
      Name: "alice",
      Email: "alice@example.com",
      Password: "maple-7-harbor"
    });
  });

  it("GET requests carry no body or content type", async () => {
    const { client, requests } = testClient(() => jsonResponse([]));
    await client.getMediaFolders();
    assert.equal(requests[0]?.body, undefined);
    assert.equal(requests[0]?.headers["content-type"], undefined);
  });

  it("raw bodies are sent as bytes with their own content type", async () => {
    const { client, requests } = testClient(() => noContent());
    const data = Buffer.from([1, 2, 3]);
    const response = await client.request("POST", "/Users/u1/Images/Primary", {
      kind: "raw",
      data,
      contentType: "image/png"
    });
    assert.deepEqual(response, { status: 204, text: "" });
    assert.equal(requests[0]?.headers["content-type"], "image/png");
    assert.deepEqual(requests[0]?.body, data);
  });

  it("listUsers keeps entries with an id and a name", async () => {
    const { client } = testClient(() =>
      jsonResponse([{ Id: "1", Name: "alice" }, { Id: 2, Name: "bob" }, { Name: "no-id" }, "junk"])
    );
    assert.deepEqual(await client.listUsers(), [
      { id: "1", name: "alice" },
      { id: "2", name: "bob" }
    ]);
  });

  it("listUsers is empty on an error status or a non-array body", async () => {
    assert.deepEqual(await testClient(() => textResponse("denied", 401)).client.listUsers(), []);
    assert.deepEqual(await testClient(() => jsonResponse({ Items: [] })).client.listUsers(), []);
  });

  it("findUserIdByName matches the exact name", async () => {
    const { client } = testClient(() => jsonResponse([{ Id: "1", Name: "Alice" }, { Id: "2", Name: "alice" }]));
    assert.equal(await client.findUserIdByName("alice"), "2");
    assert.equal(await client.findUserIdByName("ALICE"), undefined);
  });

  it("policy calls encode the user id", async () => {
    const { client, requests } = testClient(() => noContent());
    await client.getPolicy("a b");
    await client.setPolicy("a b", { EnableAllFolders: true });
    assert.deepEqual(
      requests.map((r) => `${r.method} ${apiPath(r)}`),
      ["GET /Users/a%20b/Policy", "POST /Users/a%20b/Policy"]
    );
    assert.deepEqual(requests[1] && jsonBody(requests[1]), { EnableAllFolders: true });
  });

  it("getSystemInfo reads version, server name and operating system", async () => {
    const { client, requests } = testClient(() => jsonResponse({ Version: "4.8.0.0", ServerName: "den" }));
    assert.deepEqual(await client.getSystemInfo(), {
      version: "4.8.0.0",
      serverName: "den",
      operatingSystem: "Unknown"
    });
    assert.equal(requests[0] && apiPath(requests[0]), "/System/Info");
  });

  it("getSystemInfo rejects on a non-200 status", async () => {
    const { client } = testClient(() => textResponse("denied", 401));
    await assert.rejects(client.getSystemInfo(), {
      message: "Connection failed with status code: 401. Response: denied"
    });
  });

  it("download fetches an absolute URL with the given headers", async () => {
    const image = Buffer.from("PNGDATA");
    const { client, requests } = testClient(
      () => new Response(image, { status: 200, headers: { "Content-Type": "image/png" } })
    );
    const download = await client.download("https://img.test/a.png", { "User-Agent": "tester" });

    assert.equal(requests[0]?.url, "https://img.test/a.png");
    assert.equal(requests[0]?.headers["user-agent"], "tester");
    assert.equal(requests[0]?.headers["x-emby-token"], undefined);
    assert.deepEqual(download, { status: 200, contentType: "image/png", data: image });
  });

  it("network failures reject", async () => {
    const { client } = testClient(() => {
      throw new Error("connect ECONNREFUSED");
    });
    await assert.rejects(client.createUser("x", "x@example.com", "p"), { message: "connect ECONNREFUSED" });
  });
});

describe("testConnection", () => {
  it("logs what the server reports", async () => {
    const { client } = testClient(() =>
      jsonResponse({ Version: "4.8.0.0", ServerName: "den", OperatingSystem: "Linux" })
    );
    const logger = memoryLogger();
    const info = await testConnection(client, logger);

    assert.deepEqual(info, { version: "4.8.0.0", serverName: "den", operatingSystem: "Linux" });
    assert.deepEqual(logger.messages("INFO"), [
      "Testing connection to http://emby.test:8096",
      "Successfully connected to Emby server:",
      "  Version: 4.8.0.0",
      "  Server Name: den",
      "  Operating System: Linux"
    ]);
  });

  it("resolves to undefined and logs the failure when refused", async () => {
    const { client } = testClient(() => textResponse("Access token is invalid or expired.", 401));
    const logger = memoryLogger();
    assert.equal(await testConnection(client, logger), undefined);
    assert.deepEqual(logger.messages("ERROR"), [
      "Connection test failed: Connection failed with status code: 401. Response: Access token is invalid or expired."
    ]);
  });
});
