import { describe, it, expect } from "vitest";
import { ErrInvalidName, ErrInvalidProjectID, ErrRequiredName } from "../core/errors.js";
import { bodyOf, createTestClient, jsonResponse } from "../test-utils/mock-fetch.js";

const projectDocument = {
  data: {
    id: "prj-1",
    type: "projects",
    attributes: { name: "platform", description: "Shared infrastructure" },
    relationships: { organization: { data: { id: "acme", type: "organizations" } } },
  },
};

describe("Projects", () => {
  it("should create a project under the organization", async () => {
    const { client, requests } = createTestClient(() => jsonResponse(projectDocument, { status: 201 }));

    const project = await client.projects.create("acme", { name: "platform" });

    expect(requests[0]?.url.pathname).toBe("/api/v2/organizations/acme/projects");
    expect(bodyOf(requests[0])).toEqual({
      data: { type: "projects", attributes: { name: "platform" } },
    });
    expect(project).toMatchObject({ id: "prj-1", name: "platform", description: "Shared infrastructure" });
    expect(project.organization?.name).toBe("acme");
  });

  it("should filter the list by exact name", async () => {
    const { client, requests } = createTestClient(() =>
      jsonResponse({ data: [], meta: { pagination: { "current-page": 1 } } })
    );

    await client.projects.list("acme", { name: "platform" });

    expect(requests[0]?.url.search).toBe("?filter%5Bnames%5D=platform");
  });

  it("should validate before sending", async () => {
    const { client, fetch } = createTestClient(() => jsonResponse(projectDocument));

    await expect(client.projects.create("acme", { name: "" })).rejects.toBe(ErrRequiredName);
    await expect(client.projects.update("prj-1", { name: "" })).rejects.toBe(ErrInvalidName);
    await expect(client.projects.read("prj 1")).rejects.toBe(ErrInvalidProjectID);
    expect(fetch).not.toHaveBeenCalled();
  });
});
