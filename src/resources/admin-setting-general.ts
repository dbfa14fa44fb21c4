import { jsonApiBody, type ResourceCodec } from "../core/jsonapi.js";
import type { RequestBuilder } from "../core/request.js";
import type { CallOptions } from "../core/types.js";

/** Site-wide settings of a Terraform Enterprise installation. */
export interface AdminGeneralSetting {
  id: string;
  limitUserOrganizationCreation: boolean;
  apiRateLimitingEnabled: boolean;
  apiRateLimit: number;
  sendPassingStatusesForUntriggeredSpeculativePlans: boolean;
  allowSpeculativePlansOnPullRequestsFromForks: boolean;
}

export const adminGeneralSettingCodec: ResourceCodec<AdminGeneralSetting> = {
  type: "general-settings",
  decode: (node) => ({
    id: node.id,
    limitUserOrganizationCreation: node.boolean("limit-user-organization-creation"),
    apiRateLimitingEnabled: node.boolean("api-rate-limiting-enabled"),
    apiRateLimit: node.number("api-rate-limit"),
    sendPassingStatusesForUntriggeredSpeculativePlans: node.boolean(
      "send-passing-statuses-for-untriggered-speculative-plans"
    ),
    allowSpeculativePlansOnPullRequestsFromForks: node.boolean(
      "allow-speculative-plans-on-pull-requests-from-forks"
    ),
  }),
};

export type AdminGeneralSettingsUpdateOptions = Partial<Omit<AdminGeneralSetting, "id">>;

const SETTINGS_PATH = "admin/general-settings";

export class AdminGeneralSettings {
  private client: RequestBuilder;

  constructor(client: RequestBuilder) {
    this.client = client;
  }

  async read(call?: CallOptions): Promise<AdminGeneralSetting> {
    return this.client.newRequest("GET", SETTINGS_PATH).single(adminGeneralSettingCodec, call);
  }

  async update(
    options: AdminGeneralSettingsUpdateOptions,
    call?: CallOptions
  ): Promise<AdminGeneralSetting> {
    const req = this.client.newRequest("PATCH", SETTINGS_PATH, {
      body: jsonApiBody(adminGeneralSettingCodec.type, {
        attributes: {
          "limit-user-organization-creation": options.limitUserOrganizationCreation,
          "api-rate-limiting-enabled": options.apiRateLimitingEnabled,
          "api-rate-limit": options.apiRateLimit,
          "send-passing-statuses-for-untriggered-speculative-plans":
            options.sendPassingStatusesForUntriggeredSpeculativePlans,
          "allow-speculative-plans-on-pull-requests-from-forks":
            options.allowSpeculativePlansOnPullRequestsFromForks,
        },
      }),
    });
    return req.single(adminGeneralSettingCodec, call);
  }
}
