/**
 * JSON:API document model.
 *
 * Reading: responses are validated with zod and handed to per-resource
 * codecs through a ResourceNode, which gives typed access to attributes and
 * resolves relationships against the document's `included` section.
 *
 * Writing: request bodies are an explicit tagged union. A resource service
 * states whether it sends a JSON:API document, a plain JSON document or raw
 * bytes; nothing is inferred from the payload's shape.
 */

import { z } from "zod";
import {
  DecodeError,
  ErrInvalidRequestBody,
  ErrInvalidStructFormat,
} from "./errors.js";
import {
  CONTENT_TYPE_JSON,
  CONTENT_TYPE_JSONAPI,
  CONTENT_TYPE_OCTET_STREAM,
} from "./types.js";

/**
 * A zod schema whose input side is left open, so schemas with transforms
 * can be passed where only the decoded type matters.
 */
export type Schema<T> = z.ZodType<T, z.ZodTypeDef, unknown>;

// ============================================================================
// Response documents
// ============================================================================

const identifierSchema = z.object({
  type: z.string(),
  id: z.string(),
});

const relationshipSchema = z.object({
  data: z.union([identifierSchema, z.array(identifierSchema), z.null()]).optional(),
  links: z.record(z.unknown()).optional(),
});

export const resourceDataSchema = z.object({
  type: z.string(),
  id: z.string().optional(),
  attributes: z.record(z.unknown()).optional(),
  relationships: z.record(relationshipSchema).optional(),
  links: z.record(z.unknown()).optional(),
  meta: z.record(z.unknown()).optional(),
});

export const documentSchema = z.object({
  data: z.union([resourceDataSchema, z.array(resourceDataSchema), z.null()]).optional(),
  included: z.array(resourceDataSchema).optional(),
  meta: z.record(z.unknown()).optional(),
});

export type ResourceData = z.infer<typeof resourceDataSchema>;
export type Document = z.infer<typeof documentSchema>;

type IncludedIndex = ReadonlyMap<string, ResourceData>;

function resourceKey(type: string, id: string): string {
  return `${type}:${id}`;
}

export function indexIncluded(included: ResourceData[] | undefined): IncludedIndex {
  const index = new Map<string, ResourceData>();
  for (const resource of included ?? []) {
    if (resource.id !== undefined) {
      index.set(resourceKey(resource.type, resource.id), resource);
    }
  }
  return index;
}

/**
 * Decodes one resource object of a given JSON:API type.
 */
export interface ResourceCodec<T> {
  type: string;
  decode(node: ResourceNode): T;
}

/**
 * Typed view over one resource object of a response document.
 *
 * Missing attributes read as zero values ("" / 0 / false / undefined), and a
 * relationship whose target was not side-loaded resolves to a resource that
 * only carries its id.
 */
export class ResourceNode {
  private readonly resource: ResourceData;
  private readonly included: IncludedIndex;
  private readonly ancestors: ReadonlySet<string>;

  constructor(
    resource: ResourceData,
    included: IncludedIndex = new Map(),
    ancestors: ReadonlySet<string> = new Set()
  ) {
    this.resource = resource;
    this.included = included;
    this.ancestors = ancestors;
  }

  get id(): string {
    return this.resource.id ?? "";
  }

  get type(): string {
    return this.resource.type;
  }

  get links(): Record<string, unknown> {
    return this.resource.links ?? {};
  }

  has(name: string): boolean {
    return this.value(name) !== undefined;
  }

  value(name: string): unknown {
    const value = this.resource.attributes?.[name];
    return value === null ? undefined : value;
  }

  string(name: string): string {
    return this.optionalString(name) ?? "";
  }

  optionalString(name: string): string | undefined {
    const value = this.value(name);
    if (value === undefined) return undefined;
    if (typeof value !== "string") {
      throw this.typeError(name, "a string");
    }
    return value;
  }

  number(name: string): number {
    return this.optionalNumber(name) ?? 0;
  }

  optionalNumber(name: string): number | undefined {
    const value = this.value(name);
    if (value === undefined) return undefined;
    if (typeof value !== "number") {
      throw this.typeError(name, "a number");
    }
    return value;
  }

  boolean(name: string): boolean {
    return this.optionalBoolean(name) ?? false;
  }

  optionalBoolean(name: string): boolean | undefined {
    const value = this.value(name);
    if (value === undefined) return undefined;
    if (typeof value !== "boolean") {
      throw this.typeError(name, "a boolean");
    }
    return value;
  }

  date(name: string): Date | undefined {
    const value = this.optionalString(name);
    if (value === undefined || value === "") return undefined;
    const parsed = new Date(value);
    if (Number.isNaN(parsed.getTime())) {
      throw this.typeError(name, "an ISO 8601 timestamp");
    }
    return parsed;
  }

  strings(name: string): string[] {
    const value = this.value(name);
    if (value === undefined) return [];
    if (!Array.isArray(value) || !value.every((v): v is string => typeof v === "string")) {
      throw this.typeError(name, "a list of strings");
    }
    return value;
  }

  /**
   * Decodes a nested plain-JSON attribute (permissions, timestamps, ...).
   */
  object<T>(name: string, schema: Schema<T>): T | undefined {
    const value = this.value(name);
    if (value === undefined) return undefined;
    const result = schema.safeParse(value);
    if (!result.success) {
      throw this.typeError(name, `a valid object (${result.error.issues[0]?.message ?? "invalid"})`);
    }
    return result.data;
  }

  relationshipId(name: string): string | undefined {
    const data = this.resource.relationships?.[name]?.data;
    if (!data || Array.isArray(data)) return undefined;
    return data.id;
  }

  one<T>(name: string, codec: ResourceCodec<T>): T | undefined {
    const data = this.resource.relationships?.[name]?.data;
    if (!data || Array.isArray(data)) return undefined;
    return codec.decode(this.related(data.type, data.id));
  }

  many<T>(name: string, codec: ResourceCodec<T>): T[] {
    const data = this.resource.relationships?.[name]?.data;
    if (!data) return [];
    const identifiers = Array.isArray(data) ? data : [data];
    return identifiers.map((identifier) =>
      codec.decode(this.related(identifier.type, identifier.id))
    );
  }

  private related(type: string, id: string): ResourceNode {
    const key = resourceKey(type, id);
    const self = this.resource.id === undefined ? undefined : resourceKey(this.type, this.resource.id);
    const path = new Set(this.ancestors);
    if (self) path.add(self);

    const found = path.has(key) ? undefined : this.included.get(key);
    return new ResourceNode(found ?? { type, id }, this.included, path);
  }

  private typeError(name: string, expected: string): DecodeError {
    return new DecodeError(`attribute "${name}" of ${this.type} must be ${expected}`);
  }
}

// ============================================================================
// Request bodies
// ============================================================================

export interface ResourceIdentifier {
  type: string;
  id: string;
}

export interface RelationshipObject {
  data: ResourceIdentifier | ResourceIdentifier[] | null;
}

export interface ResourceObject {
  type: string;
  id?: string;
  /** undefined members are omitted; null is sent as an explicit null. */
  attributes?: Record<string, unknown>;
  relationships?: Record<string, RelationshipObject | undefined>;
}

export type RequestBody =
  | { kind: "jsonapi"; data: ResourceObject | ResourceObject[] }
  | { kind: "json"; value: unknown }
  | { kind: "raw"; data: Uint8Array | string };

export interface SerializedBody {
  contentType: string;
  payload: string | Uint8Array;
}

export function jsonApiBody(
  type: string,
  resource: Omit<ResourceObject, "type"> = {}
): RequestBody {
  return { kind: "jsonapi", data: { type, ...resource } };
}

export function jsonApiManyBody(resources: ResourceObject[]): RequestBody {
  return { kind: "jsonapi", data: resources };
}

export function jsonBody(value: unknown): RequestBody {
  return { kind: "json", value };
}

export function rawBody(data: Uint8Array | string): RequestBody {
  return { kind: "raw", data };
}

/**
 * To-one relationship. undefined leaves the relationship out of the body,
 * null clears it.
 */
export function toOne(type: string, id: string | null | undefined): RelationshipObject | undefined {
  if (id === undefined) return undefined;
  return { data: id === null ? null : { type, id } };
}

export function toMany(type: string, ids: readonly string[] | undefined): RelationshipObject | undefined {
  if (ids === undefined) return undefined;
  return { data: ids.map((id) => ({ type, id })) };
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function assertResourceObject(value: unknown): ResourceObject {
  if (!isRecord(value)) {
    throw ErrInvalidRequestBody;
  }

  const { type, id, attributes, relationships } = value;
  if (typeof type !== "string" || type === "") {
    throw ErrInvalidRequestBody;
  }
  if (attributes !== undefined && !isRecord(attributes)) {
    throw ErrInvalidRequestBody;
  }
  if (relationships !== undefined && !isRecord(relationships)) {
    throw ErrInvalidRequestBody;
  }

  if (attributes && relationships) {
    for (const name of Object.keys(relationships)) {
      if (relationships[name] !== undefined && Object.hasOwn(attributes, name)) {
        throw ErrInvalidStructFormat;
      }
    }
  }

  const resource: ResourceObject = { type };
  if (typeof id === "string") resource.id = id;
  if (attributes) resource.attributes = attributes;
  if (relationships) {
    const rels: Record<string, RelationshipObject> = {};
    for (const [name, rel] of Object.entries(relationships)) {
      if (rel === undefined) continue;
      if (!isRecord(rel) || !("data" in rel)) {
        throw ErrInvalidRequestBody;
      }
      rels[name] = assertRelationship(rel.data);
    }
    resource.relationships = rels;
  }
  return resource;
}

function assertRelationship(data: unknown): RelationshipObject {
  const identifier = (value: unknown): ResourceIdentifier => {
    if (!isRecord(value)) {
      throw ErrInvalidRequestBody;
    }
    const { type, id } = value;
    if (typeof type !== "string" || typeof id !== "string") {
      throw ErrInvalidRequestBody;
    }
    return { type, id };
  };

  if (data === null) return { data: null };
  if (Array.isArray(data)) return { data: data.map(identifier) };
  return { data: identifier(data) };
}

/**
 * Serializes a request body. Only the primary resource(s) and their
 * relationship linkage are written; an `included` section never is.
 */
export function serializeRequestBody(body: RequestBody): SerializedBody {
  if (!isRecord(body)) {
    throw ErrInvalidRequestBody;
  }

  switch (body.kind) {
    case "jsonapi": {
      const data = Array.isArray(body.data)
        ? body.data.map(assertResourceObject)
        : assertResourceObject(body.data);
      return {
        contentType: CONTENT_TYPE_JSONAPI,
        payload: JSON.stringify({ data }),
      };
    }
    case "json": {
      if (body.value === undefined) {
        throw ErrInvalidRequestBody;
      }
      return {
        contentType: CONTENT_TYPE_JSON,
        payload: JSON.stringify(body.value),
      };
    }
    case "raw": {
      if (typeof body.data !== "string" && !(body.data instanceof Uint8Array)) {
        throw ErrInvalidRequestBody;
      }
      return {
        contentType: CONTENT_TYPE_OCTET_STREAM,
        payload: body.data,
      };
    }
    default:
      throw ErrInvalidRequestBody;
  }
}
