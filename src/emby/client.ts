/**
 * Emby administrative API client
 *
 * Thin wrapper over fetch: every call resolves to an ApiResponse (status +
 * body text) and callers decide what a success is. Network failures reject.
 */

import type { ConnectionSettings } from "../config.js";
import type { PolicyDocument } from "../types.js";

export type FetchLike = (url: string, init?: RequestInit) => Promise<Response>;

export type EmbyClientOptions = ConnectionSettings & {
  fetch?: FetchLike;
  /** Per-request timeout; 0 disables it */
  timeoutMs?: number;
};

export type ApiResponse = {
  status: number;
  text: string;
};

export type RequestBody =
  | { kind: "json"; value: unknown }
  | { kind: "raw"; data: Buffer; contentType: string };

export type Download = {
  status: number;
  contentType: string | null;
  data: Buffer;
};

export type SystemInfo = {
  version: string;
  serverName: string;
  operatingSystem: string;
};

export type RemoteUser = {
  id: string;
  name: string;
};

/** Status codes the server uses for a successful write */
export function isSuccessStatus(status: number): boolean {
  return status === 200 || status === 204;
}

export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function parseJson(text: string): unknown {
  if (text.trim() === "") return undefined;
  try {
    const value: unknown = JSON.parse(text);
    return value;
  } catch {
    return undefined;
  }
}

export function stringField(record: Record<string, unknown>, key: string): string | undefined {
  const value = record[key];
  if (typeof value === "string" && value.trim() !== "") return value;
  if (typeof value === "number") return String(value);
  return undefined;
}

export class EmbyClient {
  readonly serverUrl: string;
  private readonly apiKey: string;
  private readonly fetchImpl: FetchLike;
  private readonly timeoutMs: number;

  constructor(options: EmbyClientOptions) {
    this.serverUrl = options.serverUrl.replace(/\/+$/, "");
    this.apiKey = options.apiKey;
    this.fetchImpl = options.fetch ?? ((url, init) => fetch(url, init));
    this.timeoutMs = options.timeoutMs ?? 30_000;
  }

  url(path: string): string {
    return `${this.serverUrl}/emby${path}`;
  }

  async request(method: "GET" | "POST", path: string, body?: RequestBody): Promise<ApiResponse> {
    const headers: Record<string, string> = {
      "X-Emby-Token": this.apiKey
    };
    let payload: string | Buffer | undefined;
    if (body?.kind === "json") {
      headers["Content-Type"] = "application/json";
      payload = JSON.stringify(body.value);
    } else if (body?.kind === "raw") {
      headers["Content-Type"] = body.contentType;
      payload = body.data;
    }

    const response = await this.fetchImpl(this.url(path), {
      method,
      headers,
      body: payload,
      signal: this.timeoutMs > 0 ? AbortSignal.timeout(this.timeoutMs) : undefined
    });
    return { status: response.status, text: await response.text() };
  }

  createUser(name: string, email: string, password: string): Promise<ApiResponse> {
    return this.request("POST", "/Users/New", {
      kind: "json",
      value: { Name: name, Email: email, Password: password }
    });
  }

  /** All users on the server; an unusable listing yields an empty array */
  async listUsers(): Promise<RemoteUser[]> {
    const response = await this.request("GET", "/Users");
    if (response.status !== 200) return [];
    const data = parseJson(response.text);
    if (!Array.isArray(data)) return [];

    const users: RemoteUser[] = [];
    for (const entry of data) {
      if (!isRecord(entry)) continue;
      const id = stringField(entry, "Id");
      const name = stringField(entry, "Name");
      if (id && name) users.push({ id, name });
    }
    return users;
  }

  async findUserIdByName(name: string): Promise<string | undefined> {
    const users = await this.listUsers();
    return users.find((u) => u.name === name)?.id;
  }

  getPolicy(userId: string): Promise<ApiResponse> {
    return this.request("GET", `/Users/${encodeURIComponent(userId)}/Policy`);
  }

  setPolicy(userId: string, policy: PolicyDocument): Promise<ApiResponse> {
    return this.request("POST", `/Users/${encodeURIComponent(userId)}/Policy`, {
      kind: "json",
      value: policy
    });
  }

  getMediaFolders(): Promise<ApiResponse> {
    return this.request("GET", "/Library/MediaFolders");
  }

  getVirtualFolders(): Promise<ApiResponse> {
    return this.request("GET", "/Library/VirtualFolders");
  }

  async getSystemInfo(): Promise<SystemInfo> {
    const response = await this.request("GET", "/System/Info");
    if (response.status !== 200) {
      throw new Error(`Connection failed with status code: ${response.status}. Response: ${response.text}`);
    }
    const data = parseJson(response.text);
    const info = isRecord(data) ? data : {};
    return {
      version: stringField(info, "Version") ?? "Unknown",
      serverName: stringField(info, "ServerName") ?? "Unknown",
      operatingSystem: stringField(info, "OperatingSystem") ?? "Unknown"
    };
  }

  /** Fetch an arbitrary URL (not the Emby API), e.g. an avatar image */
  async download(url: string, headers: Record<string, string> = {}, timeoutMs = 10_000): Promise<Download> {
    const response = await this.fetchImpl(url, {
      method: "GET",
      headers,
      signal: timeoutMs > 0 ? AbortSignal.timeout(timeoutMs) : undefined
    });
    const data = Buffer.from(await response.arrayBuffer());
    return {
      status: response.status,
      contentType: response.headers.get("Content-Type"),
      data
    };
  }
}
