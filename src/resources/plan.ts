import { ErrInvalidPlanID, TFEError } from "../core/errors.js";
import type { ResourceCodec } from "../core/jsonapi.js";
import { LogReader, type LogReaderOptions } from "../core/log-reader.js";
import type { RequestBuilder } from "../core/request.js";
import type { CallOptions } from "../core/types.js";
import { validStringID } from "../core/validations.js";
import { segment, statusTimestampsSchema, type StatusTimestamps } from "./common.js";

export const PlanStatus = {
  Canceled: "canceled",
  Created: "created",
  Errored: "errored",
  Finished: "finished",
  MFAWaiting: "mfa_waiting",
  Pending: "pending",
  Queued: "queued",
  Running: "running",
  Unreachable: "unreachable",
} as const;

/** Statuses after which a plan's logs will not grow. */
export const FINAL_PLAN_STATUSES: ReadonlySet<string> = new Set([
  PlanStatus.Canceled,
  PlanStatus.Errored,
  PlanStatus.Finished,
  PlanStatus.Unreachable,
]);

export interface Plan {
  id: string;
  hasChanges: boolean;
  logReadUrl: string;
  resourceAdditions: number;
  resourceChanges: number;
  resourceDestructions: number;
  resourceImports: number;
  status: string;
  statusTimestamps: StatusTimestamps | undefined;
}

export const planCodec: ResourceCodec<Plan> = {
  type: "plans",
  decode: (node) => ({
    id: node.id,
    hasChanges: node.boolean("has-changes"),
    logReadUrl: node.string("log-read-url"),
    resourceAdditions: node.number("resource-additions"),
    resourceChanges: node.number("resource-changes"),
    resourceDestructions: node.number("resource-destructions"),
    resourceImports: node.number("resource-imports"),
    status: node.string("status"),
    statusTimestamps: node.object("status-timestamps", statusTimestampsSchema),
  }),
};

/** Polling settings for a log stream. */
export type LogOptions = Pick<LogReaderOptions, "pollDelay" | "sleep" | "signal">;

export class Plans {
  private client: RequestBuilder;

  constructor(client: RequestBuilder) {
    this.client = client;
  }

  async read(planId: string, call?: CallOptions): Promise<Plan> {
    if (!validStringID(planId)) {
      throw ErrInvalidPlanID;
    }

    return this.client.newRequest("GET", `plans/${segment(planId)}`).single(planCodec, call);
  }

  /**
   * Opens the plan's log stream. The stream ends once the logs carry their
   * end marker and the plan has reached a final status.
   */
  async logs(planId: string, options: LogOptions = {}): Promise<LogReader> {
    const call: CallOptions = options.signal ? { signal: options.signal } : {};
    const plan = await this.read(planId, call);
    if (!plan.logReadUrl) {
      throw new TFEError(`plan ${planId} does not have a log URL`);
    }

    return new LogReader({
      ...options,
      url: plan.logReadUrl,
      fetchChunk: (url, signal) => this.client.fetchUnauthenticated(url, signal),
      done: async () => {
        const current = await this.read(planId, call);
        return FINAL_PLAN_STATUSES.has(current.status);
      },
    });
  }

  /**
   * Reads the JSON execution plan. The document is returned as sent; its
   * schema belongs to Terraform, not to this API.
   */
  async readJSONOutput(planId: string, call?: CallOptions): Promise<Uint8Array> {
    if (!validStringID(planId)) {
      throw ErrInvalidPlanID;
    }

    return this.client.newJSONRequest("GET", `plans/${segment(planId)}/json-output`).bytes(call);
  }
}
