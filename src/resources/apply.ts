import { ErrInvalidApplyID, TFEError } from "../core/errors.js";
import type { ResourceCodec } from "../core/jsonapi.js";
import { LogReader } from "../core/log-reader.js";
import type { RequestBuilder } from "../core/request.js";
import type { CallOptions } from "../core/types.js";
import { validStringID } from "../core/validations.js";
import { segment, statusTimestampsSchema, type StatusTimestamps } from "./common.js";
import type { LogOptions } from "./plan.js";

export const ApplyStatus = {
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

const FINAL_APPLY_STATUSES: ReadonlySet<string> = new Set([
  ApplyStatus.Canceled,
  ApplyStatus.Errored,
  ApplyStatus.Finished,
  ApplyStatus.Unreachable,
]);

export interface Apply {
  id: string;
  logReadUrl: string;
  resourceAdditions: number;
  resourceChanges: number;
  resourceDestructions: number;
  resourceImports: number;
  status: string;
  statusTimestamps: StatusTimestamps | undefined;
}

export const applyCodec: ResourceCodec<Apply> = {
  type: "applies",
  decode: (node) => ({
    id: node.id,
    logReadUrl: node.string("log-read-url"),
    resourceAdditions: node.number("resource-additions"),
    resourceChanges: node.number("resource-changes"),
    resourceDestructions: node.number("resource-destructions"),
    resourceImports: node.number("resource-imports"),
    status: node.string("status"),
    statusTimestamps: node.object("status-timestamps", statusTimestampsSchema),
  }),
};

export class Applies {
  private client: RequestBuilder;

  constructor(client: RequestBuilder) {
    this.client = client;
  }

  async read(applyId: string, call?: CallOptions): Promise<Apply> {
    if (!validStringID(applyId)) {
      throw ErrInvalidApplyID;
    }

    return this.client.newRequest("GET", `applies/${segment(applyId)}`).single(applyCodec, call);
  }

  async logs(applyId: string, options: LogOptions = {}): Promise<LogReader> {
    const call: CallOptions = options.signal ? { signal: options.signal } : {};
    const apply = await this.read(applyId, call);
    if (!apply.logReadUrl) {
      throw new TFEError(`apply ${applyId} does not have a log URL`);
    }

    return new LogReader({
      ...options,
      url: apply.logReadUrl,
      fetchChunk: (url, signal) => this.client.fetchUnauthenticated(url, signal),
      done: async () => {
        const current = await this.read(applyId, call);
        return FINAL_APPLY_STATUSES.has(current.status);
      },
    });
  }
}
