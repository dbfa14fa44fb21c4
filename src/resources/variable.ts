import {
  ErrInvalidVariableID,
  ErrInvalidWorkspaceID,
  ErrRequiredCategory,
  ErrRequiredKey,
} from "../core/errors.js";
import { jsonApiBody, type ResourceCodec } from "../core/jsonapi.js";
import type { RequestBuilder } from "../core/request.js";
import type { CallOptions, ListOptions, ListResult } from "../core/types.js";
import { validString, validStringID } from "../core/validations.js";
import { pageQuery, segment } from "./common.js";
import { workspaceCodec, type Workspace } from "./workspace.js";

export type CategoryType = "env" | "terraform";

export interface Variable {
  id: string;
  key: string;
  /** Empty for sensitive variables. */
  value: string;
  description: string;
  category: string;
  hcl: boolean;
  sensitive: boolean;
  versionId: string;
  workspace: Workspace | undefined;
}

export const variableCodec: ResourceCodec<Variable> = {
  type: "vars",
  decode: (node) => ({
    id: node.id,
    key: node.string("key"),
    value: node.string("value"),
    description: node.string("description"),
    category: node.string("category"),
    hcl: node.boolean("hcl"),
    sensitive: node.boolean("sensitive"),
    versionId: node.string("version-id"),
    workspace: node.one("configurable", workspaceCodec),
  }),
};

export interface VariableCreateOptions {
  key: string;
  category: CategoryType;
  value?: string;
  description?: string;
  hcl?: boolean;
  sensitive?: boolean;
}

export type VariableUpdateOptions = Partial<VariableCreateOptions>;

function variableAttributes(options: VariableUpdateOptions): Record<string, unknown> {
  return {
    key: options.key,
    value: options.value,
    description: options.description,
    category: options.category,
    hcl: options.hcl,
    sensitive: options.sensitive,
  };
}

function validateIds(workspaceId: string, variableId: string): void {
  if (!validStringID(workspaceId)) {
    throw ErrInvalidWorkspaceID;
  }
  if (!validStringID(variableId)) {
    throw ErrInvalidVariableID;
  }
}

export class Variables {
  private client: RequestBuilder;

  constructor(client: RequestBuilder) {
    this.client = client;
  }

  async list(
    workspaceId: string,
    options: ListOptions = {},
    call?: CallOptions
  ): Promise<ListResult<Variable>> {
    if (!validStringID(workspaceId)) {
      throw ErrInvalidWorkspaceID;
    }

    const req = this.client.newRequest("GET", `workspaces/${segment(workspaceId)}/vars`, {
      query: pageQuery(options),
    });
    return req.list(variableCodec, call);
  }

  async create(
    workspaceId: string,
    options: VariableCreateOptions,
    call?: CallOptions
  ): Promise<Variable> {
    if (!validStringID(workspaceId)) {
      throw ErrInvalidWorkspaceID;
    }
    if (!validString(options.key)) {
      throw ErrRequiredKey;
    }
    if (!validString(options.category)) {
      throw ErrRequiredCategory;
    }

    const req = this.client.newRequest("POST", `workspaces/${segment(workspaceId)}/vars`, {
      body: jsonApiBody(variableCodec.type, { attributes: variableAttributes(options) }),
    });
    return req.single(variableCodec, call);
  }

  async read(workspaceId: string, variableId: string, call?: CallOptions): Promise<Variable> {
    validateIds(workspaceId, variableId);

    return this.client
      .newRequest("GET", `workspaces/${segment(workspaceId)}/vars/${segment(variableId)}`)
      .single(variableCodec, call);
  }

  async update(
    workspaceId: string,
    variableId: string,
    options: VariableUpdateOptions,
    call?: CallOptions
  ): Promise<Variable> {
    validateIds(workspaceId, variableId);

    const req = this.client.newRequest(
      "PATCH",
      `workspaces/${segment(workspaceId)}/vars/${segment(variableId)}`,
      { body: jsonApiBody(variableCodec.type, { id: variableId, attributes: variableAttributes(options) }) }
    );
    return req.single(variableCodec, call);
  }

  async delete(workspaceId: string, variableId: string, call?: CallOptions): Promise<void> {
    validateIds(workspaceId, variableId);

    return this.client
      .newRequest("DELETE", `workspaces/${segment(workspaceId)}/vars/${segment(variableId)}`)
      .run(call);
  }
}
