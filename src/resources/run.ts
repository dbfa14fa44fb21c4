import { z } from "zod";
import { ErrInvalidRunID, ErrInvalidWorkspaceID, ErrRequiredWorkspace } from "../core/errors.js";
import { jsonApiBody, jsonBody, toOne, type ResourceCodec } from "../core/jsonapi.js";
import type { RequestBuilder } from "../core/request.js";
import type { CallOptions, ListOptions, ListResultNextPrev } from "../core/types.js";
import { validString, validStringID } from "../core/validations.js";
import {
  flagsSchema,
  pageQuery,
  segment,
  statusTimestampsSchema,
  type Flags,
  type StatusTimestamps,
} from "./common.js";
import { applyCodec, type Apply } from "./apply.js";
import { planCodec, type Plan } from "./plan.js";
import { workspaceCodec, type Workspace } from "./workspace.js";

export const RunStatus = {
  Applied: "applied",
  ApplyQueued: "apply_queued",
  Applying: "applying",
  Canceled: "canceled",
  Confirmed: "confirmed",
  CostEstimated: "cost_estimated",
  CostEstimating: "cost_estimating",
  Discarded: "discarded",
  Errored: "errored",
  Fetching: "fetching",
  Pending: "pending",
  Planned: "planned",
  PlannedAndFinished: "planned_and_finished",
  PlanQueued: "plan_queued",
  Planning: "planning",
  PolicyChecked: "policy_checked",
  PolicyChecking: "policy_checking",
  PolicyOverride: "policy_override",
  PolicySoftFailed: "policy_soft_failed",
  Queuing: "queuing",
} as const;

export const RunSource = {
  API: "tfe-api",
  ConfigurationVersion: "tfe-configuration-version",
  UI: "tfe-ui",
} as const;

export interface RunVariable {
  key: string;
  value: string;
}

const runVariablesSchema = z.array(z.object({ key: z.string(), value: z.string() }));

export interface Run {
  id: string;
  actions: Flags | undefined;
  autoApply: boolean;
  createdAt: Date | undefined;
  hasChanges: boolean;
  isDestroy: boolean;
  message: string;
  permissions: Flags | undefined;
  planOnly: boolean;
  positionInQueue: number;
  refresh: boolean;
  refreshOnly: boolean;
  replaceAddrs: string[];
  source: string;
  status: string;
  statusTimestamps: StatusTimestamps | undefined;
  targetAddrs: string[];
  terraformVersion: string;
  variables: RunVariable[];
  configurationVersionId: string | undefined;
  apply: Apply | undefined;
  plan: Plan | undefined;
  workspace: Workspace | undefined;
}

export const runCodec: ResourceCodec<Run> = {
  type: "runs",
  decode: (node) => ({
    id: node.id,
    actions: node.object("actions", flagsSchema),
    autoApply: node.boolean("auto-apply"),
    createdAt: node.date("created-at"),
    hasChanges: node.boolean("has-changes"),
    isDestroy: node.boolean("is-destroy"),
    message: node.string("message"),
    permissions: node.object("permissions", flagsSchema),
    planOnly: node.boolean("plan-only"),
    positionInQueue: node.number("position-in-queue"),
    refresh: node.boolean("refresh"),
    refreshOnly: node.boolean("refresh-only"),
    replaceAddrs: node.strings("replace-addrs"),
    source: node.string("source"),
    status: node.string("status"),
    statusTimestamps: node.object("status-timestamps", statusTimestampsSchema),
    targetAddrs: node.strings("target-addrs"),
    terraformVersion: node.string("terraform-version"),
    variables: node.object("variables", runVariablesSchema) ?? [],
    configurationVersionId: node.relationshipId("configuration-version"),
    apply: node.one("apply", applyCodec),
    plan: node.one("plan", planCodec),
    workspace: node.one("workspace", workspaceCodec),
  }),
};

export type RunIncludeOpt =
  | "plan"
  | "apply"
  | "created_by"
  | "cost_estimate"
  | "configuration_version"
  | "configuration_version.ingress_attributes"
  | "workspace";

export interface RunListOptions extends ListOptions {
  /** Statuses to return, e.g. ["planned", "errored"]. */
  status?: readonly string[];
  operation?: readonly ("plan_only" | "plan_and_apply" | "save_plan" | "refresh_only" | "destroy" | "empty_apply")[];
  source?: readonly string[];
  /** Matches run id, commit message, commit sha and author. */
  search?: string;
  include?: readonly RunIncludeOpt[];
}

export interface RunReadOptions {
  include?: readonly RunIncludeOpt[];
}

export interface RunCreateOptions {
  workspaceId: string;
  configurationVersionId?: string;
  autoApply?: boolean;
  isDestroy?: boolean;
  message?: string;
  planOnly?: boolean;
  refresh?: boolean;
  refreshOnly?: boolean;
  replaceAddrs?: string[];
  targetAddrs?: string[];
  terraformVersion?: string;
  variables?: RunVariable[];
}

export interface RunActionOptions {
  comment?: string;
}

export class Runs {
  private client: RequestBuilder;

  constructor(client: RequestBuilder) {
    this.client = client;
  }

  async list(
    workspaceId: string,
    options: RunListOptions = {},
    call?: CallOptions
  ): Promise<ListResultNextPrev<Run>> {
    if (!validStringID(workspaceId)) {
      throw ErrInvalidWorkspaceID;
    }

    const req = this.client.newRequest("GET", `workspaces/${segment(workspaceId)}/runs`, {
      query: {
        ...pageQuery(options),
        "filter[status]": options.status,
        "filter[operation]": options.operation,
        "filter[source]": options.source,
        "search[basic]": options.search,
        include: options.include,
      },
    });
    return req.listNextPrev(runCodec, call);
  }

  async read(runId: string, options: RunReadOptions = {}, call?: CallOptions): Promise<Run> {
    if (!validStringID(runId)) {
      throw ErrInvalidRunID;
    }

    const req = this.client.newRequest("GET", `runs/${segment(runId)}`, {
      query: { include: options.include },
    });
    return req.single(runCodec, call);
  }

  async create(options: RunCreateOptions, call?: CallOptions): Promise<Run> {
    if (!validString(options.workspaceId)) {
      throw ErrRequiredWorkspace;
    }

    const req = this.client.newRequest("POST", "runs", {
      body: jsonApiBody(runCodec.type, {
        attributes: {
          "auto-apply": options.autoApply,
          "is-destroy": options.isDestroy,
          message: options.message,
          "plan-only": options.planOnly,
          refresh: options.refresh,
          "refresh-only": options.refreshOnly,
          "replace-addrs": options.replaceAddrs,
          "target-addrs": options.targetAddrs,
          "terraform-version": options.terraformVersion,
          variables: options.variables,
        },
        relationships: {
          workspace: toOne("workspaces", options.workspaceId),
          "configuration-version": toOne("configuration-versions", options.configurationVersionId),
        },
      }),
    });
    return req.single(runCodec, call);
  }

  /** Applies a run that is paused waiting for confirmation. */
  async apply(runId: string, options: RunActionOptions = {}, call?: CallOptions): Promise<void> {
    return this.action(runId, "apply", options, call);
  }

  async cancel(runId: string, options: RunActionOptions = {}, call?: CallOptions): Promise<void> {
    return this.action(runId, "cancel", options, call);
  }

  /**
   * Ends a run immediately. Only allowed after a normal cancel has been
   * requested and the cool-off period has passed.
   */
  async forceCancel(runId: string, options: RunActionOptions = {}, call?: CallOptions): Promise<void> {
    return this.action(runId, "force-cancel", options, call);
  }

  async discard(runId: string, options: RunActionOptions = {}, call?: CallOptions): Promise<void> {
    return this.action(runId, "discard", options, call);
  }

  private async action(
    runId: string,
    action: "apply" | "cancel" | "force-cancel" | "discard",
    options: RunActionOptions,
    call: CallOptions | undefined
  ): Promise<void> {
    if (!validStringID(runId)) {
      throw ErrInvalidRunID;
    }

    const req = this.client.newRequest("POST", `runs/${segment(runId)}/actions/${action}`, {
      body: jsonBody(options.comment === undefined ? {} : { comment: options.comment }),
    });
    return req.run(call);
  }
}
