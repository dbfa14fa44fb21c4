/**
 * Pieces shared by the resource services
 */

import { z } from "zod";
import type { ListOptions, QueryParams } from "../core/types.js";

export function pageQuery(options: ListOptions | undefined): QueryParams {
  return {
    "page[number]": options?.pageNumber,
    "page[size]": options?.pageSize,
  };
}

/** Escapes one path segment. */
export function segment(value: string): string {
  return encodeURIComponent(value);
}

function camelCase(key: string): string {
  return key.replace(/[-_]([a-z0-9])/g, (_, c: string) => c.toUpperCase());
}

/**
 * Status timestamps keyed by camel-cased event name, e.g.
 * `{ "queued-at": "..." }` becomes `{ queuedAt: Date }`.
 */
export const statusTimestampsSchema = z
  .record(z.string().nullable())
  .transform((raw) => {
    const out: Record<string, Date> = {};
    for (const [key, value] of Object.entries(raw)) {
      if (value) {
        out[camelCase(key)] = new Date(value);
      }
    }
    return out;
  });

export type StatusTimestamps = z.output<typeof statusTimestampsSchema>;

/**
 * A bag of boolean flags (permissions, actions) with camel-cased keys.
 * Unknown flags pass through so newer servers do not break decoding.
 */
export const flagsSchema = z.record(z.boolean().nullable()).transform((raw) => {
  const out: Record<string, boolean> = {};
  for (const [key, value] of Object.entries(raw)) {
    out[camelCase(key)] = value ?? false;
  }
  return out;
});

export type Flags = z.output<typeof flagsSchema>;
