import { ErrInvalidName, ErrInvalidOrg, ErrRequiredEmail, ErrRequiredName } from "../core/errors.js";
import { jsonApiBody, type ResourceCodec } from "../core/jsonapi.js";
import type { RequestBuilder } from "../core/request.js";
import type { CallOptions, ListOptions, ListResult } from "../core/types.js";
import { validString, validStringID } from "../core/validations.js";
import { flagsSchema, pageQuery, segment, type Flags } from "./common.js";

export interface Organization {
  /** The organization name; globally unique within an installation. */
  name: string;
  email: string;
  externalId: string;
  collaboratorAuthPolicy: string;
  costEstimationEnabled: boolean;
  createdAt: Date | undefined;
  ownersTeamSamlRoleId: string;
  permissions: Flags | undefined;
  samlEnabled: boolean;
  sessionRemember: number;
  sessionTimeout: number;
  trialExpiresAt: Date | undefined;
  twoFactorConformant: boolean;
}

export const organizationCodec: ResourceCodec<Organization> = {
  type: "organizations",
  decode: (node) => ({
    name: node.id,
    email: node.string("email"),
    externalId: node.string("external-id"),
    collaboratorAuthPolicy: node.string("collaborator-auth-policy"),
    costEstimationEnabled: node.boolean("cost-estimation-enabled"),
    createdAt: node.date("created-at"),
    ownersTeamSamlRoleId: node.string("owners-team-saml-role-id"),
    permissions: node.object("permissions", flagsSchema),
    samlEnabled: node.boolean("saml-enabled"),
    sessionRemember: node.number("session-remember"),
    sessionTimeout: node.number("session-timeout"),
    trialExpiresAt: node.date("trial-expires-at"),
    twoFactorConformant: node.boolean("two-factor-conformant"),
  }),
};

export interface OrganizationListOptions extends ListOptions {
  /** Matches name or email. */
  query?: string;
  queryEmail?: string;
  queryName?: string;
}

export type OrganizationIncludeOpt = "entitlement_set";

export interface OrganizationReadOptions {
  include?: readonly OrganizationIncludeOpt[];
}

export interface OrganizationCreateOptions {
  name: string;
  email: string;
  collaboratorAuthPolicy?: "password" | "two_factor_mandatory";
  costEstimationEnabled?: boolean;
  ownersTeamSamlRoleId?: string;
  sessionRemember?: number;
  sessionTimeout?: number;
}

export interface OrganizationUpdateOptions {
  /** Renames the organization. */
  name?: string;
  email?: string;
  collaboratorAuthPolicy?: "password" | "two_factor_mandatory";
  costEstimationEnabled?: boolean;
  ownersTeamSamlRoleId?: string;
  sessionRemember?: number;
  sessionTimeout?: number;
}

function organizationAttributes(options: OrganizationUpdateOptions): Record<string, unknown> {
  return {
    name: options.name,
    email: options.email,
    "collaborator-auth-policy": options.collaboratorAuthPolicy,
    "cost-estimation-enabled": options.costEstimationEnabled,
    "owners-team-saml-role-id": options.ownersTeamSamlRoleId,
    "session-remember": options.sessionRemember,
    "session-timeout": options.sessionTimeout,
  };
}

export class Organizations {
  private client: RequestBuilder;

  constructor(client: RequestBuilder) {
    this.client = client;
  }

  async list(
    options: OrganizationListOptions = {},
    call?: CallOptions
  ): Promise<ListResult<Organization>> {
    const req = this.client.newRequest("GET", "organizations", {
      query: {
        ...pageQuery(options),
        q: options.query,
        "q[email]": options.queryEmail,
        "q[name]": options.queryName,
      },
    });
    return req.list(organizationCodec, call);
  }

  async read(
    organization: string,
    options: OrganizationReadOptions = {},
    call?: CallOptions
  ): Promise<Organization> {
    if (!validStringID(organization)) {
      throw ErrInvalidOrg;
    }

    const req = this.client.newRequest("GET", `organizations/${segment(organization)}`, {
      query: { include: options.include },
    });
    return req.single(organizationCodec, call);
  }

  async create(options: OrganizationCreateOptions, call?: CallOptions): Promise<Organization> {
    if (!validString(options.name)) {
      throw ErrRequiredName;
    }
    if (!validStringID(options.name)) {
      throw ErrInvalidName;
    }
    if (!validString(options.email)) {
      throw ErrRequiredEmail;
    }

    const req = this.client.newRequest("POST", "organizations", {
      body: jsonApiBody(organizationCodec.type, { attributes: organizationAttributes(options) }),
    });
    return req.single(organizationCodec, call);
  }

  async update(
    organization: string,
    options: OrganizationUpdateOptions,
    call?: CallOptions
  ): Promise<Organization> {
    if (!validStringID(organization)) {
      throw ErrInvalidOrg;
    }
    if (options.name !== undefined && !validStringID(options.name)) {
      throw ErrInvalidName;
    }

    const req = this.client.newRequest("PATCH", `organizations/${segment(organization)}`, {
      body: jsonApiBody(organizationCodec.type, { attributes: organizationAttributes(options) }),
    });
    return req.single(organizationCodec, call);
  }

  async delete(organization: string, call?: CallOptions): Promise<void> {
    if (!validStringID(organization)) {
      throw ErrInvalidOrg;
    }

    return this.client.newRequest("DELETE", `organizations/${segment(organization)}`).run(call);
  }
}
