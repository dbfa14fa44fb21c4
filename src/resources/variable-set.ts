import {
  ErrInvalidOrg,
  ErrInvalidVariableSetID,
  ErrRequiredGlobalFlag,
  ErrRequiredName,
  ErrRequiredWorkspacesList,
} from "../core/errors.js";
import { jsonApiBody, toMany, type ResourceCodec } from "../core/jsonapi.js";
import type { RequestBuilder } from "../core/request.js";
import type { CallOptions, ListOptions, ListResult } from "../core/types.js";
import { validString, validStringID } from "../core/validations.js";
import { pageQuery, segment } from "./common.js";
import { organizationCodec, type Organization } from "./organization.js";
import { projectCodec, type Project } from "./project.js";
import { workspaceCodec, type Workspace } from "./workspace.js";

export interface VariableSetVariable {
  id: string;
  key: string;
  value: string;
  description: string;
  category: string;
  hcl: boolean;
  sensitive: boolean;
}

const variableSetVariableCodec: ResourceCodec<VariableSetVariable> = {
  type: "vars",
  decode: (node) => ({
    id: node.id,
    key: node.string("key"),
    value: node.string("value"),
    description: node.string("description"),
    category: node.string("category"),
    hcl: node.boolean("hcl"),
    sensitive: node.boolean("sensitive"),
  }),
};

export interface VariableSet {
  id: string;
  name: string;
  description: string;
  global: boolean;
  priority: boolean;
  organization: Organization | undefined;
  workspaces: Workspace[];
  projects: Project[];
  variables: VariableSetVariable[];
}

export const variableSetCodec: ResourceCodec<VariableSet> = {
  type: "varsets",
  decode: (node) => ({
    id: node.id,
    name: node.string("name"),
    description: node.string("description"),
    global: node.boolean("global"),
    priority: node.boolean("priority"),
    organization: node.one("organization", organizationCodec),
    workspaces: node.many("workspaces", workspaceCodec),
    projects: node.many("projects", projectCodec),
    variables: node.many("vars", variableSetVariableCodec),
  }),
};

export type VariableSetIncludeOpt = "workspaces" | "projects" | "vars" | "current-run";

export interface VariableSetListOptions extends ListOptions {
  include?: readonly VariableSetIncludeOpt[];
  /** Partial name match. */
  query?: string;
}

export interface VariableSetReadOptions {
  include?: readonly VariableSetIncludeOpt[];
}

export interface VariableSetCreateOptions {
  name: string;
  description?: string;
  /** Whether the set applies to every workspace of the organization. */
  global: boolean;
  /** Whether the set's values win over workspace-level variables. */
  priority?: boolean;
}

export interface VariableSetUpdateOptions {
  name?: string;
  description?: string;
  global?: boolean;
  priority?: boolean;
  include?: readonly VariableSetIncludeOpt[];
}

export interface VariableSetAssignOptions {
  /** Ids of the workspaces the set applies to; replaces the current list. */
  workspaces: readonly string[];
}

export class VariableSets {
  private client: RequestBuilder;

  constructor(client: RequestBuilder) {
    this.client = client;
  }

  async list(
    organization: string,
    options: VariableSetListOptions = {},
    call?: CallOptions
  ): Promise<ListResult<VariableSet>> {
    if (!validStringID(organization)) {
      throw ErrInvalidOrg;
    }

    const req = this.client.newRequest("GET", `organizations/${segment(organization)}/varsets`, {
      query: { ...pageQuery(options), include: options.include, q: options.query },
    });
    return req.list(variableSetCodec, call);
  }

  async read(
    variableSetId: string,
    options: VariableSetReadOptions = {},
    call?: CallOptions
  ): Promise<VariableSet> {
    if (!validStringID(variableSetId)) {
      throw ErrInvalidVariableSetID;
    }

    const req = this.client.newRequest("GET", `varsets/${segment(variableSetId)}`, {
      query: { include: options.include },
    });
    return req.single(variableSetCodec, call);
  }

  async create(
    organization: string,
    options: VariableSetCreateOptions,
    call?: CallOptions
  ): Promise<VariableSet> {
    if (!validStringID(organization)) {
      throw ErrInvalidOrg;
    }
    if (!validString(options.name)) {
      throw ErrRequiredName;
    }
    if (typeof options.global !== "boolean") {
      throw ErrRequiredGlobalFlag;
    }

    const req = this.client.newRequest("POST", `organizations/${segment(organization)}/varsets`, {
      body: jsonApiBody(variableSetCodec.type, {
        attributes: {
          name: options.name,
          description: options.description,
          global: options.global,
          priority: options.priority,
        },
      }),
    });
    return req.single(variableSetCodec, call);
  }

  async update(
    variableSetId: string,
    options: VariableSetUpdateOptions,
    call?: CallOptions
  ): Promise<VariableSet> {
    if (!validStringID(variableSetId)) {
      throw ErrInvalidVariableSetID;
    }

    const req = this.client.newRequest("PATCH", `varsets/${segment(variableSetId)}`, {
      query: { include: options.include },
      body: jsonApiBody(variableSetCodec.type, {
        attributes: {
          name: options.name,
          description: options.description,
          global: options.global,
          priority: options.priority,
        },
      }),
    });
    return req.single(variableSetCodec, call);
  }

  async delete(variableSetId: string, call?: CallOptions): Promise<void> {
    if (!validStringID(variableSetId)) {
      throw ErrInvalidVariableSetID;
    }

    return this.client.newRequest("DELETE", `varsets/${segment(variableSetId)}`).run(call);
  }

  /**
   * Applies the set to exactly the given workspaces. A set assigned this way
   * is no longer global.
   */
  async assign(
    variableSetId: string,
    options: VariableSetAssignOptions,
    call?: CallOptions
  ): Promise<VariableSet> {
    if (!validStringID(variableSetId)) {
      throw ErrInvalidVariableSetID;
    }
    if (!Array.isArray(options.workspaces) || options.workspaces.length === 0) {
      throw ErrRequiredWorkspacesList;
    }

    const req = this.client.newRequest("PATCH", `varsets/${segment(variableSetId)}`, {
      query: { include: ["workspaces"] },
      body: jsonApiBody(variableSetCodec.type, {
        attributes: { global: false },
        relationships: { workspaces: toMany("workspaces", options.workspaces) },
      }),
    });
    return req.single(variableSetCodec, call);
  }
}
