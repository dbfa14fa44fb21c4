import { z } from "zod";
import type { RequestBuilder } from "../core/request.js";
import type { CallOptions } from "../core/types.js";
import { unmarshalJSON } from "../core/unmarshal.js";

const cidrs = z
  .array(z.string())
  .nullish()
  .transform((value) => value ?? []);

export const ipRangeSchema = z.object({
  /** Ranges used for connections from user sites to the API. */
  api: cidrs,
  notifications: cidrs,
  /** Outbound requests from Sentinel policies. */
  sentinel: cidrs,
  vcs: cidrs,
});

export type IPRange = z.output<typeof ipRangeSchema>;

export class IPRanges {
  private client: RequestBuilder;

  constructor(client: RequestBuilder) {
    this.client = client;
  }

  /**
   * Reads the service's published IP ranges. With `modifiedSince` (an HTTP
   * date) the server may answer 304, in which case undefined is returned.
   */
  async read(modifiedSince?: string, call?: CallOptions): Promise<IPRange | undefined> {
    // Served from the host root, outside the versioned API path.
    const req = this.client.newJSONRequest("GET", "/api/meta/ip-ranges");
    if (modifiedSince) {
      req.headers.set("If-Modified-Since", modifiedSince);
    }

    const response = await req.send(call);
    if (response.status === 304) {
      return undefined;
    }
    return unmarshalJSON(response.body, ipRangeSchema);
  }
}
