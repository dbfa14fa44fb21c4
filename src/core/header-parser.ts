/**
 * Rate-limit header parsing.
 *
 * Both headers carry decimal numbers. A value that does not parse is
 * reported as invalid so that callers can log it and carry on as if the
 * header were absent.
 */

export type ParsedHeader =
  | { kind: "absent" }
  | { kind: "invalid"; raw: string }
  | { kind: "value"; value: number };

function parseDecimalHeader(value: string | null): ParsedHeader {
  if (value === null || value.trim() === "") {
    return { kind: "absent" };
  }

  const trimmed = value.trim();
  if (!/^[+-]?(\d+\.?\d*|\.\d+)([eE][+-]?\d+)?$/.test(trimmed)) {
    return { kind: "invalid", raw: value };
  }

  const parsed = Number(trimmed);
  if (!Number.isFinite(parsed)) {
    return { kind: "invalid", raw: value };
  }

  return { kind: "value", value: parsed };
}

/**
 * Parses X-RateLimit-Reset: seconds (possibly fractional) until the
 * current window resets.
 */
export function parseRateLimitReset(value: string | null): ParsedHeader {
  return parseDecimalHeader(value);
}

/**
 * Parses X-RateLimit-Limit: requests allowed per second.
 */
export function parseRateLimitLimit(value: string | null): ParsedHeader {
  return parseDecimalHeader(value);
}
