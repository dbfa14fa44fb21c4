import { ErrInvalidName, ErrInvalidOrg, ErrInvalidProjectID, ErrRequiredName } from "../core/errors.js";
import { jsonApiBody, type ResourceCodec } from "../core/jsonapi.js";
import type { RequestBuilder } from "../core/request.js";
import type { CallOptions, ListOptions, ListResult } from "../core/types.js";
import { validString, validStringID } from "../core/validations.js";
import { pageQuery, segment } from "./common.js";
import { organizationCodec, type Organization } from "./organization.js";

export interface Project {
  id: string;
  name: string;
  description: string;
  organization: Organization | undefined;
}

export const projectCodec: ResourceCodec<Project> = {
  type: "projects",
  decode: (node) => ({
    id: node.id,
    name: node.string("name"),
    description: node.string("description"),
    organization: node.one("organization", organizationCodec),
  }),
};

export interface ProjectListOptions extends ListOptions {
  /** Exact project names to return. */
  name?: string;
  /** Partial name match. */
  query?: string;
}

export interface ProjectCreateOptions {
  name: string;
  description?: string;
}

export interface ProjectUpdateOptions {
  name?: string;
  description?: string;
}

export class Projects {
  private client: RequestBuilder;

  constructor(client: RequestBuilder) {
    this.client = client;
  }

  async list(
    organization: string,
    options: ProjectListOptions = {},
    call?: CallOptions
  ): Promise<ListResult<Project>> {
    if (!validStringID(organization)) {
      throw ErrInvalidOrg;
    }

    const req = this.client.newRequest("GET", `organizations/${segment(organization)}/projects`, {
      query: {
        ...pageQuery(options),
        "filter[names]": options.name,
        q: options.query,
      },
    });
    return req.list(projectCodec, call);
  }

  async read(projectId: string, call?: CallOptions): Promise<Project> {
    if (!validStringID(projectId)) {
      throw ErrInvalidProjectID;
    }

    return this.client.newRequest("GET", `projects/${segment(projectId)}`).single(projectCodec, call);
  }

  async create(
    organization: string,
    options: ProjectCreateOptions,
    call?: CallOptions
  ): Promise<Project> {
    if (!validStringID(organization)) {
      throw ErrInvalidOrg;
    }
    if (!validString(options.name)) {
      throw ErrRequiredName;
    }

    const req = this.client.newRequest("POST", `organizations/${segment(organization)}/projects`, {
      body: jsonApiBody(projectCodec.type, {
        attributes: { name: options.name, description: options.description },
      }),
    });
    return req.single(projectCodec, call);
  }

  async update(projectId: string, options: ProjectUpdateOptions, call?: CallOptions): Promise<Project> {
    if (!validStringID(projectId)) {
      throw ErrInvalidProjectID;
    }
    if (options.name !== undefined && !validString(options.name)) {
      throw ErrInvalidName;
    }

    const req = this.client.newRequest("PATCH", `projects/${segment(projectId)}`, {
      body: jsonApiBody(projectCodec.type, {
        attributes: { name: options.name, description: options.description },
      }),
    });
    return req.single(projectCodec, call);
  }

  async delete(projectId: string, call?: CallOptions): Promise<void> {
    if (!validStringID(projectId)) {
      throw ErrInvalidProjectID;
    }

    return this.client.newRequest("DELETE", `projects/${segment(projectId)}`).run(call);
  }
}
