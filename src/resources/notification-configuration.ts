import { z } from "zod";
import {
  ErrInvalidNotificationConfigID,
  ErrInvalidNotificationTrigger,
  ErrInvalidWorkspaceID,
  ErrRequiredDestinationType,
  ErrRequiredEnabled,
  ErrRequiredName,
  ErrRequiredURL,
} from "../core/errors.js";
import { jsonApiBody, toMany, type ResourceCodec } from "../core/jsonapi.js";
import type { RequestBuilder } from "../core/request.js";
import type { CallOptions, ListOptions, ListResult } from "../core/types.js";
import { validString, validStringID } from "../core/validations.js";
import { pageQuery, segment } from "./common.js";

export const NotificationTrigger = {
  Created: "run:created",
  Planning: "run:planning",
  NeedsAttention: "run:needs_attention",
  Applying: "run:applying",
  Completed: "run:completed",
  Errored: "run:errored",
  AssessmentDrifted: "assessment:drifted",
  AssessmentFailed: "assessment:failed",
  AssessmentCheckFailed: "assessment:check_failure",
  WorkspaceAutoDestroyReminder: "workspace:auto_destroy_reminder",
  WorkspaceAutoDestroyRunResults: "workspace:auto_destroy_run_results",
} as const;

export type NotificationTriggerType = (typeof NotificationTrigger)[keyof typeof NotificationTrigger];

const VALID_TRIGGERS: ReadonlySet<string> = new Set(Object.values(NotificationTrigger));

export type NotificationDestinationType = "email" | "generic" | "slack" | "microsoft-teams";

/** Destinations that deliver to a URL and so require one. */
const URL_DESTINATIONS: ReadonlySet<NotificationDestinationType> = new Set([
  "generic",
  "slack",
  "microsoft-teams",
]);

export interface DeliveryResponse {
  body: string;
  code: string;
  headers: Record<string, string[]>;
  sentAt: Date | undefined;
  successful: string;
  url: string;
}

const deliveryResponsesSchema = z.array(
  z
    .object({
      body: z.string().nullish(),
      code: z.union([z.string(), z.number()]).nullish(),
      headers: z.record(z.array(z.string())).nullish(),
      "sent-at": z.string().nullish(),
      successful: z.union([z.string(), z.boolean()]).nullish(),
      url: z.string().nullish(),
    })
    .transform(
      (raw): DeliveryResponse => ({
        body: raw.body ?? "",
        code: raw.code === null || raw.code === undefined ? "" : String(raw.code),
        headers: raw.headers ?? {},
        sentAt: raw["sent-at"] ? new Date(raw["sent-at"]) : undefined,
        successful:
          raw.successful === null || raw.successful === undefined ? "" : String(raw.successful),
        url: raw.url ?? "",
      })
    )
);

export interface NotificationConfiguration {
  id: string;
  name: string;
  enabled: boolean;
  destinationType: string;
  url: string;
  triggers: string[];
  emailAddresses: string[];
  deliveryResponses: DeliveryResponse[];
  createdAt: Date | undefined;
  updatedAt: Date | undefined;
  /** Id of the workspace the configuration belongs to. */
  subscribableId: string | undefined;
}

export const notificationConfigurationCodec: ResourceCodec<NotificationConfiguration> = {
  type: "notification-configurations",
  decode: (node) => ({
    id: node.id,
    name: node.string("name"),
    enabled: node.boolean("enabled"),
    destinationType: node.string("destination-type"),
    url: node.string("url"),
    triggers: node.strings("triggers"),
    emailAddresses: node.strings("email-addresses"),
    deliveryResponses: node.object("delivery-responses", deliveryResponsesSchema) ?? [],
    createdAt: node.date("created-at"),
    updatedAt: node.date("updated-at"),
    subscribableId: node.relationshipId("subscribable"),
  }),
};

export interface NotificationConfigurationCreateOptions {
  name: string;
  destinationType: NotificationDestinationType;
  enabled: boolean;
  url?: string;
  /** Sent as X-TFE-Notification-Signature HMAC key; write only. */
  token?: string;
  triggers?: readonly NotificationTriggerType[];
  emailAddresses?: readonly string[];
  emailUserIds?: readonly string[];
}

export interface NotificationConfigurationUpdateOptions {
  name?: string;
  enabled?: boolean;
  url?: string;
  token?: string;
  triggers?: readonly NotificationTriggerType[];
  emailAddresses?: readonly string[];
  emailUserIds?: readonly string[];
}

function validTriggers(triggers: readonly string[] | undefined): boolean {
  return (triggers ?? []).every((trigger) => VALID_TRIGGERS.has(trigger));
}

function notificationBody(
  options: NotificationConfigurationUpdateOptions & { destinationType?: NotificationDestinationType }
) {
  return jsonApiBody(notificationConfigurationCodec.type, {
    attributes: {
      name: options.name,
      "destination-type": options.destinationType,
      enabled: options.enabled,
      url: options.url,
      token: options.token,
      triggers: options.triggers,
      "email-addresses": options.emailAddresses,
    },
    relationships: {
      users: toMany("users", options.emailUserIds),
    },
  });
}

export class NotificationConfigurations {
  private client: RequestBuilder;

  constructor(client: RequestBuilder) {
    this.client = client;
  }

  async list(
    workspaceId: string,
    options: ListOptions = {},
    call?: CallOptions
  ): Promise<ListResult<NotificationConfiguration>> {
    if (!validStringID(workspaceId)) {
      throw ErrInvalidWorkspaceID;
    }

    const req = this.client.newRequest(
      "GET",
      `workspaces/${segment(workspaceId)}/notification-configurations`,
      { query: pageQuery(options) }
    );
    return req.list(notificationConfigurationCodec, call);
  }

  async create(
    workspaceId: string,
    options: NotificationConfigurationCreateOptions,
    call?: CallOptions
  ): Promise<NotificationConfiguration> {
    if (!validStringID(workspaceId)) {
      throw ErrInvalidWorkspaceID;
    }
    if (!validString(options.destinationType)) {
      throw ErrRequiredDestinationType;
    }
    if (typeof options.enabled !== "boolean") {
      throw ErrRequiredEnabled;
    }
    if (!validString(options.name)) {
      throw ErrRequiredName;
    }
    if (!validTriggers(options.triggers)) {
      throw ErrInvalidNotificationTrigger;
    }
    if (URL_DESTINATIONS.has(options.destinationType) && !validString(options.url)) {
      throw ErrRequiredURL;
    }

    const req = this.client.newRequest(
      "POST",
      `workspaces/${segment(workspaceId)}/notification-configurations`,
      { body: notificationBody(options) }
    );
    return req.single(notificationConfigurationCodec, call);
  }

  async read(notificationConfigurationId: string, call?: CallOptions): Promise<NotificationConfiguration> {
    if (!validStringID(notificationConfigurationId)) {
      throw ErrInvalidNotificationConfigID;
    }

    return this.client
      .newRequest("GET", `notification-configurations/${segment(notificationConfigurationId)}`)
      .single(notificationConfigurationCodec, call);
  }

  async update(
    notificationConfigurationId: string,
    options: NotificationConfigurationUpdateOptions,
    call?: CallOptions
  ): Promise<NotificationConfiguration> {
    if (!validStringID(notificationConfigurationId)) {
      throw ErrInvalidNotificationConfigID;
    }
    if (options.name !== undefined && !validString(options.name)) {
      throw ErrRequiredName;
    }
    if (!validTriggers(options.triggers)) {
      throw ErrInvalidNotificationTrigger;
    }

    const req = this.client.newRequest(
      "PATCH",
      `notification-configurations/${segment(notificationConfigurationId)}`,
      { body: notificationBody(options) }
    );
    return req.single(notificationConfigurationCodec, call);
  }

  async delete(notificationConfigurationId: string, call?: CallOptions): Promise<void> {
    if (!validStringID(notificationConfigurationId)) {
      throw ErrInvalidNotificationConfigID;
    }

    return this.client
      .newRequest("DELETE", `notification-configurations/${segment(notificationConfigurationId)}`)
      .run(call);
  }

  /** Sends a test payload to the configured destination. */
  async verify(notificationConfigurationId: string, call?: CallOptions): Promise<NotificationConfiguration> {
    if (!validStringID(notificationConfigurationId)) {
      throw ErrInvalidNotificationConfigID;
    }

    return this.client
      .newRequest(
        "POST",
        `notification-configurations/${segment(notificationConfigurationId)}/actions/verify`
      )
      .single(notificationConfigurationCodec, call);
  }
}
