import { describe, it, expect } from "vitest";
import { checkResponseCode, decodeErrorPayload, mapResponseError } from "./error-mapper.js";
import {
  APIError,
  ErrInvalidIncludeValue,
  ErrResourceNotFound,
  ErrUnauthorized,
} from "./errors.js";
import type { RawResponse } from "./types.js";

function response(status: number, body: unknown = "", statusText = ""): RawResponse {
  return {
    status,
    statusText,
    headers: new Headers(),
    body: new TextEncoder().encode(typeof body === "string" ? body : JSON.stringify(body)),
  };
}

describe("mapResponseError", () => {
  it("should accept 2xx and 3xx", () => {
    expect(mapResponseError(response(200))).toBeNull();
    expect(mapResponseError(response(204))).toBeNull();
    expect(mapResponseError(response(304))).toBeNull();
  });

  it("should map 401 to ErrUnauthorized", () => {
    expect(mapResponseError(response(401))).toBe(ErrUnauthorized);
  });

  it("should map 404 to ErrResourceNotFound", () => {
    expect(mapResponseError(response(404, { errors: [{ title: "not found" }] }))).toBe(
      ErrResourceNotFound
    );
  });

  it("should map a 400 about the include parameter to ErrInvalidIncludeValue", () => {
    const error = mapResponseError(
      response(400, {
        errors: [{ title: "Invalid include parameter", detail: "organization is not allowed" }],
      })
    );
    expect(error).toBe(ErrInvalidIncludeValue);
  });

  it("should join titles and details of other errors", () => {
    const error = mapResponseError(
      response(422, {
        errors: [{ title: "invalid attribute", detail: "Name has already been taken" }, { title: "second" }],
      })
    );

    expect(error).toBeInstanceOf(APIError);
    expect(error?.message).toBe("invalid attribute\n\nName has already been taken\nsecond");
    expect(error instanceof APIError ? error.status : 0).toBe(422);
  });

  it("should fall back to the status line when the payload cannot be decoded", () => {
    expect(mapResponseError(response(500, "<html>oops</html>"))?.message).toBe(
      "500 Internal Server Error"
    );
    expect(mapResponseError(response(503, { errors: [] }))?.message).toBe(
      "503 Service Unavailable"
    );
    expect(mapResponseError(response(502, "", "Upstream Gone"))?.message).toBe("502 Upstream Gone");
  });
});

describe("decodeErrorPayload", () => {
  it("should return null for a payload without errors", () => {
    expect(decodeErrorPayload('{"data":{}}')).toBeNull();
  });
});

describe("checkResponseCode", () => {
  it("should throw the mapped error", () => {
    expect(() => checkResponseCode(response(401))).toThrow(ErrUnauthorized);
    expect(() => checkResponseCode(response(201))).not.toThrow();
  });
});
