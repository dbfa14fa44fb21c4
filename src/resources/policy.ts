import { z } from "zod";
import {
  ErrInvalidName,
  ErrInvalidOrg,
  ErrInvalidPolicyID,
  ErrRequiredEnforcementLevel,
  ErrRequiredName,
} from "../core/errors.js";
import { jsonApiBody, rawBody, type ResourceCodec } from "../core/jsonapi.js";
import type { RequestBuilder } from "../core/request.js";
import type { CallOptions, ListOptions, ListResult } from "../core/types.js";
import { validString, validStringID } from "../core/validations.js";
import { pageQuery, segment } from "./common.js";
import { organizationCodec, type Organization } from "./organization.js";

export type EnforcementLevel = "advisory" | "hard-mandatory" | "soft-mandatory" | "mandatory";

export type PolicyKind = "sentinel" | "opa";

export interface Enforcement {
  path: string;
  mode: string;
}

const enforcementSchema = z.array(
  z.object({ path: z.string().nullish(), mode: z.string().nullish() }).transform(
    (raw): Enforcement => ({ path: raw.path ?? "", mode: raw.mode ?? "" })
  )
);

export interface Policy {
  id: string;
  name: string;
  description: string;
  kind: string;
  /** OPA query; empty for Sentinel policies. */
  query: string;
  enforcementLevel: string;
  enforce: Enforcement[];
  policySetCount: number;
  updatedAt: Date | undefined;
  organization: Organization | undefined;
}

export const policyCodec: ResourceCodec<Policy> = {
  type: "policies",
  decode: (node) => ({
    id: node.id,
    name: node.string("name"),
    description: node.string("description"),
    kind: node.string("kind"),
    query: node.string("query"),
    enforcementLevel: node.string("enforcement-level"),
    enforce: node.object("enforce", enforcementSchema) ?? [],
    policySetCount: node.number("policy-set-count"),
    updatedAt: node.date("updated-at"),
    organization: node.one("organization", organizationCodec),
  }),
};

export interface PolicyListOptions extends ListOptions {
  /** Partial policy name match. */
  search?: string;
  kind?: PolicyKind;
}

export interface PolicyUpdateOptions {
  description?: string;
  query?: string;
  enforcementLevel?: EnforcementLevel;
}

export interface PolicyCreateOptions extends PolicyUpdateOptions {
  name: string;
  kind?: PolicyKind;
}

function policyAttributes(options: PolicyUpdateOptions & { name?: string; kind?: PolicyKind }) {
  return {
    name: options.name,
    description: options.description,
    kind: options.kind,
    query: options.query,
    "enforcement-level": options.enforcementLevel,
  };
}

export class Policies {
  private client: RequestBuilder;

  constructor(client: RequestBuilder) {
    this.client = client;
  }

  async list(
    organization: string,
    options: PolicyListOptions = {},
    call?: CallOptions
  ): Promise<ListResult<Policy>> {
    if (!validStringID(organization)) {
      throw ErrInvalidOrg;
    }

    const req = this.client.newRequest("GET", `organizations/${segment(organization)}/policies`, {
      query: {
        ...pageQuery(options),
        "search[name]": options.search,
        "filter[kind]": options.kind,
      },
    });
    return req.list(policyCodec, call);
  }

  async create(
    organization: string,
    options: PolicyCreateOptions,
    call?: CallOptions
  ): Promise<Policy> {
    if (!validStringID(organization)) {
      throw ErrInvalidOrg;
    }
    if (!validString(options.name)) {
      throw ErrRequiredName;
    }
    if (!validStringID(options.name)) {
      throw ErrInvalidName;
    }
    if (!validString(options.enforcementLevel)) {
      throw ErrRequiredEnforcementLevel;
    }

    const req = this.client.newRequest("POST", `organizations/${segment(organization)}/policies`, {
      body: jsonApiBody(policyCodec.type, { attributes: policyAttributes(options) }),
    });
    return req.single(policyCodec, call);
  }

  async read(policyId: string, call?: CallOptions): Promise<Policy> {
    if (!validStringID(policyId)) {
      throw ErrInvalidPolicyID;
    }

    return this.client.newRequest("GET", `policies/${segment(policyId)}`).single(policyCodec, call);
  }

  async update(policyId: string, options: PolicyUpdateOptions, call?: CallOptions): Promise<Policy> {
    if (!validStringID(policyId)) {
      throw ErrInvalidPolicyID;
    }

    const req = this.client.newRequest("PATCH", `policies/${segment(policyId)}`, {
      body: jsonApiBody(policyCodec.type, { attributes: policyAttributes(options) }),
    });
    return req.single(policyCodec, call);
  }

  async delete(policyId: string, call?: CallOptions): Promise<void> {
    if (!validStringID(policyId)) {
      throw ErrInvalidPolicyID;
    }

    return this.client.newRequest("DELETE", `policies/${segment(policyId)}`).run(call);
  }

  /** Replaces the policy's source code. */
  async upload(policyId: string, content: Uint8Array | string, call?: CallOptions): Promise<void> {
    if (!validStringID(policyId)) {
      throw ErrInvalidPolicyID;
    }

    return this.client
      .newRequest("PUT", `policies/${segment(policyId)}/upload`, { body: rawBody(content) })
      .run(call);
  }

  async download(policyId: string, call?: CallOptions): Promise<Uint8Array> {
    if (!validStringID(policyId)) {
      throw ErrInvalidPolicyID;
    }

    return this.client.newRequest("GET", `policies/${segment(policyId)}/download`).bytes(call);
  }
}
