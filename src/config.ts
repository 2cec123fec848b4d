import { ConfigError } from "./errors.js";

export type ConnectionSettings = {
  serverUrl: string;
  apiKey: string;
};

type ConnectionFlags = {
  server?: string;
  apiKey?: string;
};

/**
 * Resolve server URL and API key from CLI flags, falling back to
 * EMBY_SERVER_URL / EMBY_API_KEY (loaded from .env by the bins).
 */
export function resolveConnectionSettings(
  flags: ConnectionFlags,
  env: NodeJS.ProcessEnv = process.env
): ConnectionSettings {
  const serverUrl = (flags.server ?? env.EMBY_SERVER_URL ?? "").trim();
  if (serverUrl === "") {
    throw new ConfigError("Emby server URL is required (--server or EMBY_SERVER_URL).");
  }
  if (!/^https?:\/\//i.test(serverUrl)) {
    throw new ConfigError(`Emby server URL must start with http:// or https:// (got "${serverUrl}").`);
  }

  const apiKey = (flags.apiKey ?? env.EMBY_API_KEY ?? "").trim();
  if (apiKey === "") {
    throw new ConfigError("Emby API key is required (--api-key or EMBY_API_KEY).");
  }

  return { serverUrl: serverUrl.replace(/\/+$/, ""), apiKey };
}

/** Parse a seconds value from the CLI into milliseconds */
export function parseSeconds(value: string): number {
  const seconds = Number(value);
  if (!Number.isFinite(seconds) || seconds < 0) {
    throw new ConfigError(`Expected a non-negative number of seconds, got "${value}"`);
  }
  return Math.round(seconds * 1000);
}

export function parsePositiveInteger(value: string, flag: string): number {
  const n = Number(value);
  if (!Number.isInteger(n) || n < 1) {
    throw new ConfigError(`${flag} must be a positive integer (got "${value}")`);
  }
  return n;
}

/** Comma-separated CLI list, blanks dropped */
export function parseList(value: string): string[] {
  return value
    .split(",")
    .map((v) => v.trim())
    .filter((v) => v !== "");
}
