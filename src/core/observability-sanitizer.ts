import type { Metric, SanitizerOptions } from "./types.js";
import { isRedactedKey } from "./request-sanitizer.js";

export function sanitizeObject(obj: unknown, opts?: SanitizerOptions): unknown {
  if (obj === null || typeof obj !== "object") return obj;

  if (Array.isArray(obj)) {
    return obj.map((v) => sanitizeObject(v, opts));
  }

  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(obj)) {
    if (isRedactedKey(k, opts)) {
      out[k] = "[REDACTED]";
    } else {
      out[k] = sanitizeObject(v, opts);
    }
  }
  return out;
}

export function sanitizeMetric(metric: Metric, opts?: SanitizerOptions): Metric {
  const tags: Record<string, string> = {};
  for (const [k, v] of Object.entries(metric.tags)) {
    tags[k] = isRedactedKey(k, opts) ? "[REDACTED]" : v;
  }
  return { ...metric, tags };
}

export function sanitizeRecord(
  record: Record<string, unknown>,
  opts?: SanitizerOptions
): Record<string, unknown> {
  const out: Record<string, unknown> = {};
  for (const [k, v] of Object.entries(record)) {
    out[k] = isRedactedKey(k, opts) ? "[REDACTED]" : sanitizeObject(v, opts);
  }
  return out;
}
