import type { SanitizerOptions } from "./types.js";

export const DEFAULT_REDACTED_KEYS = [
  "authorization",
  "cookie",
  "token",
  "apikey",
  "api_key",
  "signature",
  "secret",
  "password",
];

const REDACTED = "[REDACTED]";

function normalize(key: string): string {
  return key.toLowerCase().replace(/[-_]/g, "");
}

export function isRedactedKey(key: string, opts?: SanitizerOptions): boolean {
  const lower = normalize(key);
  const keys = opts?.redactedKeys
    ? [...DEFAULT_REDACTED_KEYS, ...opts.redactedKeys]
    : DEFAULT_REDACTED_KEYS;
  return keys.some((r) => lower.includes(normalize(r)));
}

/**
 * Redacts query values whose names look like credentials. Log read URLs
 * carry their access token in the query string.
 */
export function sanitizeUrl(url: string, opts?: SanitizerOptions): string {
  let parsed: URL;
  try {
    parsed = new URL(url);
  } catch {
    return url;
  }

  if (parsed.username || parsed.password) {
    parsed.username = "";
    parsed.password = "";
  }

  const keys = new Set(parsed.searchParams.keys());
  for (const key of keys) {
    if (isRedactedKey(key, opts)) {
      parsed.searchParams.set(key, REDACTED);
    }
  }

  return parsed.toString();
}

export function sanitizeHeaders(headers: Headers, opts?: SanitizerOptions): Record<string, string> {
  const out: Record<string, string> = {};
  headers.forEach((value, key) => {
    out[key] = isRedactedKey(key, opts) ? REDACTED : value;
  });
  return out;
}
