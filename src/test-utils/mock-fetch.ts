/**
 * In-process transport for tests: a vi.fn fetch that records every request
 * and answers from a handler.
 */

import { vi } from "vitest";
import { Client } from "../index.js";
import type { ClientConfig } from "../core/types.js";

export interface RecordedRequest {
  method: string;
  url: URL;
  headers: Headers;
  body: string | undefined;
}

export type MockHandler = (request: RecordedRequest) => Response | Promise<Response>;

const decoder = new TextDecoder();

/** Statuses whose responses must not carry a body. */
const NULL_BODY_STATUSES = new Set([204, 304]);

export function jsonResponse(
  body: unknown,
  init: { status?: number; headers?: Record<string, string> } = {}
): Response {
  const status = init.status ?? 200;
  return new Response(NULL_BODY_STATUSES.has(status) ? null : JSON.stringify(body), {
    status,
    headers: { "Content-Type": "application/vnd.api+json", ...init.headers },
  });
}

export function emptyResponse(status: number, headers: Record<string, string> = {}): Response {
  return new Response(NULL_BODY_STATUSES.has(status) ? null : "", { status, headers });
}

export function errorResponse(status: number, errors: Array<{ title: string; detail?: string }>): Response {
  return jsonResponse({ errors }, { status });
}

export function createMockFetch(handler: MockHandler) {
  const requests: RecordedRequest[] = [];

  const fetch = vi.fn(async (input: string | URL, init?: RequestInit): Promise<Response> => {
    init?.signal?.throwIfAborted();

    const body = init?.body;
    const request: RecordedRequest = {
      method: init?.method ?? "GET",
      url: new URL(input),
      headers: new Headers(init?.headers),
      body:
        typeof body === "string"
          ? body
          : body instanceof Uint8Array
            ? decoder.decode(body)
            : undefined,
    };
    requests.push(request);
    return handler(request);
  });

  return { fetch, requests };
}

/**
 * A client wired to a mock transport, with an empty environment so that the
 * host's TFE_* variables never leak into a test.
 */
export function createTestClient(handler: MockHandler, config: ClientConfig = {}) {
  const { fetch, requests } = createMockFetch(handler);
  const client = new Client(
    {
      address: "https://tfe.example.com",
      token: "test-token",
      ...config,
      fetch,
    },
    {}
  );
  return { client, fetch, requests };
}

/** Parses the JSON body of a recorded request. */
export function bodyOf(request: RecordedRequest | undefined): unknown {
  if (!request?.body) {
    throw new Error("request has no body");
  }
  return JSON.parse(request.body);
}
