/**
 * Response decoding.
 *
 * The caller decides what a response holds: a single resource, a list with
 * full pagination, a list with next/prev pagination only, or a plain JSON
 * document.
 */

import { z } from "zod";
import {
  documentSchema,
  indexIncluded,
  ResourceNode,
  type Document,
  type ResourceCodec,
  type Schema,
} from "./jsonapi.js";
import { DecodeError, ErrInvalidDocument, ErrItemsMustBeSlice } from "./errors.js";
import type {
  ListResult,
  ListResultNextPrev,
  Pagination,
  PaginationNextPrev,
} from "./types.js";

const decoder = new TextDecoder();

const pageNumber = z
  .number()
  .nullish()
  .transform((value) => value ?? 0);

const paginationSchema = z
  .object({
    "current-page": pageNumber,
    "prev-page": pageNumber,
    "next-page": pageNumber,
    "total-count": pageNumber,
    "total-pages": pageNumber,
  })
  .partial();

function parseJSON(body: Uint8Array | string): unknown {
  const text = typeof body === "string" ? body : decoder.decode(body);
  try {
    return JSON.parse(text);
  } catch (error) {
    throw new DecodeError(
      `response is not valid JSON: ${error instanceof Error ? error.message : String(error)}`
    );
  }
}

export function parseDocument(body: Uint8Array | string): Document {
  const result = documentSchema.safeParse(parseJSON(body));
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new DecodeError(
      `response is not a JSON:API document: ${issue ? `${issue.path.join(".")} ${issue.message}` : "invalid"}`
    );
  }
  return result.data;
}

export function unmarshalResource<T>(body: Uint8Array | string, codec: ResourceCodec<T>): T {
  const document = parseDocument(body);
  const data = document.data;
  if (!data || Array.isArray(data)) {
    throw ErrInvalidDocument;
  }
  return codec.decode(new ResourceNode(data, indexIncluded(document.included)));
}

function decodeItems<T>(document: Document, codec: ResourceCodec<T>): T[] {
  const data = document.data;
  if (!Array.isArray(data)) {
    throw ErrItemsMustBeSlice;
  }
  const included = indexIncluded(document.included);
  return data.map((resource) => codec.decode(new ResourceNode(resource, included)));
}

function decodePagination(document: Document): Pagination {
  const result = paginationSchema.safeParse(document.meta?.pagination ?? {});
  if (!result.success) {
    throw new DecodeError("meta.pagination must contain numeric page fields");
  }
  const raw = result.data;
  return {
    currentPage: raw["current-page"] ?? 0,
    previousPage: raw["prev-page"] ?? 0,
    nextPage: raw["next-page"] ?? 0,
    totalCount: raw["total-count"] ?? 0,
    totalPages: raw["total-pages"] ?? 0,
  };
}

export function unmarshalList<T>(body: Uint8Array | string, codec: ResourceCodec<T>): ListResult<T> {
  const document = parseDocument(body);
  return {
    items: decodeItems(document, codec),
    pagination: decodePagination(document),
  };
}

export function unmarshalListNextPrev<T>(
  body: Uint8Array | string,
  codec: ResourceCodec<T>
): ListResultNextPrev<T> {
  const document = parseDocument(body);
  const { currentPage, previousPage, nextPage } = decodePagination(document);
  const pagination: PaginationNextPrev = { currentPage, previousPage, nextPage };
  return {
    items: decodeItems(document, codec),
    pagination,
  };
}

export function unmarshalJSON<T>(body: Uint8Array | string, schema: Schema<T>): T {
  const result = schema.safeParse(parseJSON(body));
  if (!result.success) {
    const issue = result.error.issues[0];
    throw new DecodeError(
      `unexpected response shape: ${issue ? `${issue.path.join(".")} ${issue.message}` : "invalid"}`
    );
  }
  return result.data;
}
