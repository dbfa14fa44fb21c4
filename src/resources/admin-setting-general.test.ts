import { describe, it, expect } from "vitest";
import { bodyOf, createTestClient, jsonResponse } from "../test-utils/mock-fetch.js";

const settingsDocument = {
  data: {
    id: "general",
    type: "general-settings",
    attributes: {
      "limit-user-organization-creation": true,
      "api-rate-limiting-enabled": true,
      "api-rate-limit": 30,
    },
  },
};

describe("AdminGeneralSettings", () => {
  it("should read the general settings", async () => {
    const { client, requests } = createTestClient(() => jsonResponse(settingsDocument));

    const settings = await client.admin.generalSettings.read();

    expect(requests[0]?.url.pathname).toBe("/api/v2/admin/general-settings");
    expect(settings).toEqual({
      id: "general",
      limitUserOrganizationCreation: true,
      apiRateLimitingEnabled: true,
      apiRateLimit: 30,
      sendPassingStatusesForUntriggeredSpeculativePlans: false,
      allowSpeculativePlansOnPullRequestsFromForks: false,
    });
  });

  it("should send only the changed settings", async () => {
    const { client, requests } = createTestClient(() => jsonResponse(settingsDocument));

    await client.admin.generalSettings.update({ apiRateLimit: 60 });

    expect(requests[0]?.method).toBe("PATCH");
    expect(bodyOf(requests[0])).toEqual({
      data: { type: "general-settings", attributes: { "api-rate-limit": 60 } },
    });
  });
});
