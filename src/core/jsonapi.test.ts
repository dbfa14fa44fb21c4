import { describe, it, expect } from "vitest";
import {
  jsonApiBody,
  jsonBody,
  rawBody,
  serializeRequestBody,
  toMany,
  toOne,
  type RequestBody,
  type ResourceCodec,
} from "./jsonapi.js";
import { DecodeError, ErrInvalidRequestBody, ErrInvalidStructFormat } from "./errors.js";
import { unmarshalResource } from "./unmarshal.js";

interface Team {
  id: string;
  name: string;
  visible: boolean;
  members: number;
  createdAt: Date | undefined;
  organizationId: string | undefined;
}

const teamCodec: ResourceCodec<Team> = {
  type: "teams",
  decode: (node) => ({
    id: node.id,
    name: node.string("name"),
    visible: node.boolean("visible"),
    members: node.number("users-count"),
    createdAt: node.date("created-at"),
    organizationId: node.relationshipId("organization"),
  }),
};

describe("serializeRequestBody", () => {
  it("should write a JSON:API document for the primary resource", () => {
    const { contentType, payload } = serializeRequestBody(
      jsonApiBody("teams", {
        attributes: { name: "ops", visible: true, description: undefined },
        relationships: {
          organization: toOne("organizations", "acme"),
          users: toMany("users", ["user-1", "user-2"]),
          project: undefined,
        },
      })
    );

    expect(contentType).toBe("application/vnd.api+json");
    expect(JSON.parse(String(payload))).toEqual({
      data: {
        type: "teams",
        attributes: { name: "ops", visible: true },
        relationships: {
          organization: { data: { type: "organizations", id: "acme" } },
          users: {
            data: [
              { type: "users", id: "user-1" },
              { type: "users", id: "user-2" },
            ],
          },
        },
      },
    });
  });

  it("should send null to clear a to-one relationship", () => {
    const { payload } = serializeRequestBody(
      jsonApiBody("workspaces", { relationships: { project: toOne("projects", null) } })
    );
    expect(JSON.parse(String(payload))).toEqual({
      data: { type: "workspaces", relationships: { project: { data: null } } },
    });
  });

  it("should round-trip attributes through unmarshalResource", () => {
    const { payload } = serializeRequestBody(
      jsonApiBody("teams", {
        id: "team-1",
        attributes: { name: "ops", visible: true, "users-count": 4, "created-at": "2024-01-02T03:04:05.000Z" },
        relationships: { organization: toOne("organizations", "acme") },
      })
    );

    expect(unmarshalResource(String(payload), teamCodec)).toEqual({
      id: "team-1",
      name: "ops",
      visible: true,
      members: 4,
      createdAt: new Date("2024-01-02T03:04:05.000Z"),
      organizationId: "acme",
    });
  });

  it("should reject a name used as both attribute and relationship", () => {
    expect(() =>
      serializeRequestBody(
        jsonApiBody("teams", {
          attributes: { organization: "acme" },
          relationships: { organization: toOne("organizations", "acme") },
        })
      )
    ).toThrow(ErrInvalidStructFormat);
  });

  it("should reject a value that is not a body variant", () => {
    const untyped = JSON.parse('{"kind":"xml","data":"<a/>"}') as RequestBody;
    expect(() => serializeRequestBody(untyped)).toThrow(ErrInvalidRequestBody);
  });

  it("should reject a resource without a type", () => {
    expect(() => serializeRequestBody({ kind: "jsonapi", data: { type: "" } })).toThrow(
      ErrInvalidRequestBody
    );
  });

  it("should write plain JSON bodies", () => {
    expect(serializeRequestBody(jsonBody({ reason: "maintenance" }))).toEqual({
      contentType: "application/json",
      payload: '{"reason":"maintenance"}',
    });
  });

  it("should pass raw bodies through as octet-stream", () => {
    const bytes = new Uint8Array([1, 2, 3]);
    expect(serializeRequestBody(rawBody(bytes))).toEqual({
      contentType: "application/octet-stream",
      payload: bytes,
    });
  });
});

describe("ResourceNode", () => {
  it("should read missing attributes as zero values", () => {
    const team = unmarshalResource('{"data":{"type":"teams","id":"team-2"}}', teamCodec);
    expect(team).toEqual({
      id: "team-2",
      name: "",
      visible: false,
      members: 0,
      createdAt: undefined,
      organizationId: undefined,
    });
  });

  it("should name the attribute when its type is wrong", () => {
    expect(() =>
      unmarshalResource('{"data":{"type":"teams","id":"t","attributes":{"name":5}}}', teamCodec)
    ).toThrow(new DecodeError('attribute "name" of teams must be a string'));
  });

  it("should resolve relationships against the included section", () => {
    interface Member {
      id: string;
      team: Team | undefined;
    }
    const memberCodec: ResourceCodec<Member> = {
      type: "memberships",
      decode: (node) => ({ id: node.id, team: node.one("team", teamCodec) }),
    };

    const member = unmarshalResource(
      JSON.stringify({
        data: {
          type: "memberships",
          id: "m-1",
          relationships: { team: { data: { type: "teams", id: "team-1" } } },
        },
        included: [{ type: "teams", id: "team-1", attributes: { name: "ops" } }],
      }),
      memberCodec
    );

    expect(member.team?.name).toBe("ops");
  });
});
