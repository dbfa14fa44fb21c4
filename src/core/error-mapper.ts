/**
 * Translates HTTP responses into errors.
 */

import { STATUS_CODES } from "node:http";
import { z } from "zod";
import {
  APIError,
  ErrInvalidIncludeValue,
  ErrResourceNotFound,
  ErrUnauthorized,
  type TFEError,
} from "./errors.js";
import type { RawResponse } from "./types.js";

const decoder = new TextDecoder();

const errorPayloadSchema = z.object({
  errors: z.array(
    z.object({
      title: z.string().nullish(),
      detail: z.string().nullish(),
    })
  ),
});

export function statusLine(response: Pick<RawResponse, "status" | "statusText">): string {
  const text = response.statusText || STATUS_CODES[response.status] || "";
  return text ? `${response.status} ${text}` : String(response.status);
}

/**
 * Decodes a JSON:API errors payload into one message per entry. Returns null
 * when the body is not an errors payload or lists no errors.
 */
export function decodeErrorPayload(body: Uint8Array | string): string[] | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(typeof body === "string" ? body : decoder.decode(body));
  } catch {
    return null;
  }

  const result = errorPayloadSchema.safeParse(parsed);
  if (!result.success || result.data.errors.length === 0) {
    return null;
  }

  return result.data.errors.map(({ title, detail }) =>
    detail ? `${title ?? ""}\n\n${detail}` : title ?? ""
  );
}

function composedError(response: RawResponse): APIError {
  const messages = decodeErrorPayload(response.body) ?? [statusLine(response)];
  return new APIError(response.status, messages);
}

/**
 * Returns the error a response translates to, or null for 2xx and 3xx.
 */
export function mapResponseError(response: RawResponse): TFEError | null {
  if (response.status >= 200 && response.status < 400) {
    return null;
  }

  switch (response.status) {
    case 400: {
      const error = composedError(response);
      if (error.messages.some((message) => message.includes("include parameter"))) {
        return ErrInvalidIncludeValue;
      }
      return error;
    }
    case 401:
      return ErrUnauthorized;
    case 404:
      return ErrResourceNotFound;
    default:
      return composedError(response);
  }
}

export function checkResponseCode(response: RawResponse): void {
  const error = mapResponseError(response);
  if (error) {
    throw error;
  }
}
