import { describe, it, expect } from "vitest";
import {
  ErrInvalidVariableID,
  ErrInvalidWorkspaceID,
  ErrRequiredCategory,
  ErrRequiredKey,
} from "../core/errors.js";
import { bodyOf, createTestClient, jsonResponse } from "../test-utils/mock-fetch.js";

const variableDocument = {
  data: {
    id: "var-1",
    type: "vars",
    attributes: { key: "db_password", value: null, category: "terraform", sensitive: true },
    relationships: { configurable: { data: { id: "ws-1", type: "workspaces" } } },
  },
};

describe("Variables", () => {
  it("should require a key and a category", async () => {
    const { client, fetch } = createTestClient(() => jsonResponse(variableDocument));

    await expect(client.variables.create("ws-1", { key: "", category: "env" })).rejects.toBe(
      ErrRequiredKey
    );
    await expect(client.variables.create("ws-1", { key: "region" } as any)).rejects.toBe(
      ErrRequiredCategory
    );
    expect(fetch).not.toHaveBeenCalled();
  });

  it("should decode a sensitive variable with an empty value", async () => {
    const { client, requests } = createTestClient(() => jsonResponse(variableDocument, { status: 201 }));

    const variable = await client.variables.create("ws-1", {
      key: "db_password",
      value: "test-secret",
      category: "terraform",
      sensitive: true,
    });

    expect(bodyOf(requests[0])).toEqual({
      data: {
        type: "vars",
        attributes: {
          key: "db_password",
          value: "test-secret",
          category: "terraform",
          sensitive: true,
        },
      },
    });
    expect(variable.value).toBe("");
    expect(variable.sensitive).toBe(true);
    expect(variable.workspace?.id).toBe("ws-1");
  });

  it("should send the variable id on update", async () => {
    const { client, requests } = createTestClient(() => jsonResponse(variableDocument));

    await client.variables.update("ws-1", "var-1", { description: "rotated" });

    expect(requests[0]?.url.pathname).toBe("/api/v2/workspaces/ws-1/vars/var-1");
    expect(bodyOf(requests[0])).toEqual({
      data: { type: "vars", id: "var-1", attributes: { description: "rotated" } },
    });
  });

  it("should validate both ids", async () => {
    const { client } = createTestClient(() => jsonResponse(variableDocument));
    await expect(client.variables.read("", "var-1")).rejects.toBe(ErrInvalidWorkspaceID);
    await expect(client.variables.delete("ws-1", "var 1")).rejects.toBe(ErrInvalidVariableID);
  });
});
