/**
 * Shared fakes for the test files: an in-memory logger and a fetch stand-in
 * that records every request and answers from a handler.
 */

import fs from "node:fs";
import path from "node:path";
import type { Logger, LogLevel } from "../logger.js";
import { EmbyClient, type FetchLike } from "../emby/client.js";

export type LogEntry = { level: LogLevel; message: string };

export type MemoryLogger = Logger & {
  entries: LogEntry[];
  messages(level?: LogLevel): string[];
};

export function memoryLogger(): MemoryLogger {
  const entries: LogEntry[] = [];
  return {
    entries,
    info: (message) => entries.push({ level: "INFO", message }),
    warn: (message) => entries.push({ level: "WARNING", message }),
    error: (message) => entries.push({ level: "ERROR", message }),
    close: async () => {},
    messages: (level) => entries.filter((e) => level === undefined || e.level === level).map((e) => e.message)
  };
}

export type RecordedRequest = {
  url: string;
  method: string;
  headers: Record<string, string>;
  body?: string | Buffer;
};

export type FetchHandler = (request: RecordedRequest) => Response | Promise<Response>;

export function fakeFetch(handler: FetchHandler): { fetch: FetchLike; requests: RecordedRequest[] } {
  const requests: RecordedRequest[] = [];
  const fetchImpl: FetchLike = async (url, init) => {
    const headers: Record<string, string> = {};
    new Headers(init?.headers).forEach((value, key) => {
      headers[key] = value;
    });
    const raw = init?.body;
    const body = typeof raw === "string" ? raw : raw instanceof Buffer ? raw : undefined;
    const request: RecordedRequest = { url, method: init?.method ?? "GET", headers, body };
    requests.push(request);
    return handler(request);
  };
  return { fetch: fetchImpl, requests };
}

export const TEST_SERVER = "http://emby.test:8096";
export const TEST_API_KEY = "test-secret";

export function testClient(handler: FetchHandler): { client: EmbyClient; requests: RecordedRequest[] } {
  const { fetch, requests } = fakeFetch(handler);
  const client = new EmbyClient({ serverUrl: TEST_SERVER, apiKey: TEST_API_KEY, fetch, timeoutMs: 0 });
  return { client, requests };
}

/** Path of an Emby API request relative to `/emby`, e.g. "/Users/New" */
export function apiPath(request: RecordedRequest): string {
  return request.url.startsWith(`${TEST_SERVER}/emby`) ? request.url.slice(`${TEST_SERVER}/emby`.length) : request.url;
}

export function jsonResponse(value: unknown, status = 200): Response {
  return new Response(JSON.stringify(value), { status, headers: { "Content-Type": "application/json" } });
}

export function textResponse(text: string, status: number): Response {
  return new Response(text, { status });
}

export function noContent(): Response {
  return new Response(null, { status: 204 });
}

export function jsonBody(request: RecordedRequest): unknown {
  return typeof request.body === "string" ? JSON.parse(request.body) : undefined;
}

export function makeTempDir(prefix: string): string {
  return fs.mkdtempSync(path.join(process.cwd(), `.temp-${prefix}-`));
}

export function removeDir(dir: string): void {
  fs.rmSync(dir, { recursive: true, force: true });
}
