/**
 * Query string encoding.
 *
 * Keys are emitted in sorted order so that the same options always produce
 * the same URL. Inclusion lists and filters are sent as a single
 * comma-separated value instead of a repeated key.
 */

import type { QueryParams, QueryValues } from "./types.js";

const INCLUDE_QUERY_PARAM = "include";

function isListKey(key: string): boolean {
  return key === INCLUDE_QUERY_PARAM || key.includes("filter[");
}

/**
 * Form-encodes a single key or value: everything except unreserved
 * characters is percent-encoded and spaces become "+".
 */
export function queryEscape(value: string): string {
  return encodeURIComponent(value)
    .replace(/[!'()*]/g, (c) => `%${c.charCodeAt(0).toString(16).toUpperCase()}`)
    .replace(/%20/g, "+");
}

export function encodeQueryParams(values: QueryValues | undefined): string {
  if (!values) {
    return "";
  }

  const parts: string[] = [];
  for (const key of Object.keys(values).sort()) {
    const raw = values[key];
    if (raw === undefined) {
      continue;
    }

    let list: readonly string[] = typeof raw === "string" ? [raw] : raw;
    if (list.length > 1 && isListKey(key)) {
      list = [list.join(",")];
    }

    const escapedKey = queryEscape(key);
    for (const value of list) {
      parts.push(`${escapedKey}=${queryEscape(value)}`);
    }
  }

  return parts.join("&");
}

/**
 * Converts typed options into query values, dropping empty members
 * (undefined, null, "", 0, false and empty lists).
 */
export function toQueryValues(params: QueryParams | undefined): QueryValues {
  const out: QueryValues = {};
  if (!params) {
    return out;
  }

  for (const [key, value] of Object.entries(params)) {
    if (value === undefined || value === null || value === "" || value === 0 || value === false) {
      continue;
    }
    if (typeof value === "string") {
      out[key] = value;
    } else if (typeof value === "number" || typeof value === "boolean") {
      out[key] = String(value);
    } else if (value.length > 0) {
      out[key] = [...value];
    }
  }

  return out;
}
