import { describe, it, expect } from "vitest";
import { createTestClient, emptyResponse } from "../test-utils/mock-fetch.js";

describe("IPRanges", () => {
  it("should read the ranges from the host root", async () => {
    const { client, requests } = createTestClient(
      () =>
        new Response(
          JSON.stringify({
            api: ["75.2.98.97/32"],
            notifications: ["10.0.0.0/24", "10.0.1.0/24"],
            sentinel: null,
          }),
          { headers: { "Content-Type": "application/json" } }
        )
    );

    const ranges = await client.meta.ipRanges.read();

    expect(requests[0]?.url.toString()).toBe("https://tfe.example.com/api/meta/ip-ranges");
    expect(requests[0]?.headers.get("Accept")).toBe("application/json");
    expect(requests[0]?.headers.has("If-Modified-Since")).toBe(false);
    expect(ranges).toEqual({
      api: ["75.2.98.97/32"],
      notifications: ["10.0.0.0/24", "10.0.1.0/24"],
      sentinel: [],
      vcs: [],
    });
  });

  it("should return undefined when the ranges are not modified", async () => {
    const { client, requests } = createTestClient(() => emptyResponse(304));

    const ranges = await client.meta.ipRanges.read("Mon, 01 Jan 2024 00:00:00 GMT");

    expect(ranges).toBeUndefined();
    expect(requests[0]?.headers.get("If-Modified-Since")).toBe("Mon, 01 Jan 2024 00:00:00 GMT");
  });
});
