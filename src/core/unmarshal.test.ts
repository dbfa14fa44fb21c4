import { describe, it, expect } from "vitest";
import { z } from "zod";
import type { ResourceCodec } from "./jsonapi.js";
import { DecodeError, ErrInvalidDocument, ErrItemsMustBeSlice } from "./errors.js";
import {
  unmarshalJSON,
  unmarshalList,
  unmarshalListNextPrev,
  unmarshalResource,
} from "./unmarshal.js";

const nameCodec: ResourceCodec<{ id: string; name: string }> = {
  type: "things",
  decode: (node) => ({ id: node.id, name: node.string("name") }),
};

const encoder = new TextEncoder();

function listBody(names: string[], pagination: Record<string, number | null>): Uint8Array {
  return encoder.encode(
    JSON.stringify({
      data: names.map((name, i) => ({ type: "things", id: `t-${i}`, attributes: { name } })),
      meta: { pagination },
    })
  );
}

describe("unmarshalList", () => {
  it("should decode full pagination metadata and keep item order", () => {
    const result = unmarshalList(
      listBody(["c", "a", "b"], {
        "current-page": 2,
        "prev-page": 1,
        "next-page": 3,
        "total-count": 47,
        "total-pages": 5,
      }),
      nameCodec
    );

    expect(result.items.map((item) => item.name)).toEqual(["c", "a", "b"]);
    expect(result.pagination).toEqual({
      currentPage: 2,
      previousPage: 1,
      nextPage: 3,
      totalCount: 47,
      totalPages: 5,
    });
  });

  it("should read null page fields as zero", () => {
    const result = unmarshalList(
      listBody([], { "current-page": 1, "prev-page": null, "next-page": null }),
      nameCodec
    );
    expect(result.pagination).toEqual({
      currentPage: 1,
      previousPage: 0,
      nextPage: 0,
      totalCount: 0,
      totalPages: 0,
    });
  });

  it("should reject a single resource where a list is expected", () => {
    expect(() => unmarshalList('{"data":{"type":"things","id":"t"}}', nameCodec)).toThrow(
      ErrItemsMustBeSlice
    );
  });
});

describe("unmarshalListNextPrev", () => {
  it("should only carry current, previous and next page", () => {
    const result = unmarshalListNextPrev(
      listBody(["a"], { "current-page": 4, "prev-page": 3, "next-page": 5, "total-count": 99 }),
      nameCodec
    );
    expect(result.pagination).toEqual({ currentPage: 4, previousPage: 3, nextPage: 5 });
  });
});

describe("unmarshalResource", () => {
  it("should reject a list where a single resource is expected", () => {
    expect(() => unmarshalResource('{"data":[]}', nameCodec)).toThrow(ErrInvalidDocument);
  });

  it("should reject a body that is not JSON", () => {
    expect(() => unmarshalResource("<html>", nameCodec)).toThrow(DecodeError);
  });
});

describe("unmarshalJSON", () => {
  it("should validate plain JSON against a schema", () => {
    const schema = z.object({ api: z.array(z.string()) });
    expect(unmarshalJSON('{"api":["10.0.0.0/8"]}', schema)).toEqual({ api: ["10.0.0.0/8"] });
    expect(() => unmarshalJSON('{"api":"nope"}', schema)).toThrow(DecodeError);
  });
});
