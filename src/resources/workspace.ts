import { z } from "zod";
import {
  APIError,
  ErrInvalidName,
  ErrInvalidOrg,
  ErrInvalidWorkspaceID,
  ErrInvalidWorkspaceValue,
  ErrRequiredName,
  ErrRequiredWorkspace,
  ErrWorkspaceLocked,
  ErrWorkspaceNotLocked,
} from "../core/errors.js";
import { jsonApiBody, jsonBody, toOne, type ResourceCodec } from "../core/jsonapi.js";
import type { ClientRequest, RequestBuilder } from "../core/request.js";
import type { CallOptions, ListOptions, ListResult } from "../core/types.js";
import { validString, validStringID } from "../core/validations.js";
import { flagsSchema, pageQuery, segment, type Flags } from "./common.js";
import { organizationCodec, type Organization } from "./organization.js";
import { projectCodec, type Project } from "./project.js";

export interface VCSRepo {
  branch: string;
  identifier: string;
  ingressSubmodules: boolean;
  oauthTokenId: string;
  tagsRegex: string;
  repositoryHttpUrl: string;
  serviceProvider: string;
}

export const vcsRepoSchema = z
  .object({
    branch: z.string().nullish(),
    identifier: z.string().nullish(),
    "ingress-submodules": z.boolean().nullish(),
    "oauth-token-id": z.string().nullish(),
    "tags-regex": z.string().nullish(),
    "repository-http-url": z.string().nullish(),
    "service-provider": z.string().nullish(),
  })
  .transform(
    (raw): VCSRepo => ({
      branch: raw.branch ?? "",
      identifier: raw.identifier ?? "",
      ingressSubmodules: raw["ingress-submodules"] ?? false,
      oauthTokenId: raw["oauth-token-id"] ?? "",
      tagsRegex: raw["tags-regex"] ?? "",
      repositoryHttpUrl: raw["repository-http-url"] ?? "",
      serviceProvider: raw["service-provider"] ?? "",
    })
  );

export interface Workspace {
  id: string;
  name: string;
  description: string;
  actions: Flags | undefined;
  allowDestroyPlan: boolean;
  autoApply: boolean;
  createdAt: Date | undefined;
  updatedAt: Date | undefined;
  environment: string;
  executionMode: string;
  locked: boolean;
  permissions: Flags | undefined;
  queueAllRuns: boolean;
  resourceCount: number;
  speculativeEnabled: boolean;
  tagNames: string[];
  terraformVersion: string;
  triggerPrefixes: string[];
  vcsRepo: VCSRepo | undefined;
  workingDirectory: string;
  currentRunId: string | undefined;
  organization: Organization | undefined;
  project: Project | undefined;
}

export const workspaceCodec: ResourceCodec<Workspace> = {
  type: "workspaces",
  decode: (node) => ({
    id: node.id,
    name: node.string("name"),
    description: node.string("description"),
    actions: node.object("actions", flagsSchema),
    allowDestroyPlan: node.boolean("allow-destroy-plan"),
    autoApply: node.boolean("auto-apply"),
    createdAt: node.date("created-at"),
    updatedAt: node.date("updated-at"),
    environment: node.string("environment"),
    executionMode: node.string("execution-mode"),
    locked: node.boolean("locked"),
    permissions: node.object("permissions", flagsSchema),
    queueAllRuns: node.boolean("queue-all-runs"),
    resourceCount: node.number("resource-count"),
    speculativeEnabled: node.boolean("speculative-enabled"),
    tagNames: node.strings("tag-names"),
    terraformVersion: node.string("terraform-version"),
    triggerPrefixes: node.strings("trigger-prefixes"),
    vcsRepo: node.object("vcs-repo", vcsRepoSchema),
    workingDirectory: node.string("working-directory"),
    currentRunId: node.relationshipId("current-run"),
    organization: node.one("organization", organizationCodec),
    project: node.one("project", projectCodec),
  }),
};

export type WorkspaceIncludeOpt =
  | "organization"
  | "current_configuration_version"
  | "current_configuration_version.ingress_attributes"
  | "current_run"
  | "current_run.plan"
  | "current_run.configuration_version"
  | "current_state_version"
  | "locked_by"
  | "outputs"
  | "project"
  | "readme";

export interface WorkspaceListOptions extends ListOptions {
  /** Partial workspace name match. */
  search?: string;
  /** Comma-separated tag names the workspace must carry. */
  tags?: string;
  excludeTags?: string;
  wildcardName?: string;
  projectId?: string;
  include?: readonly WorkspaceIncludeOpt[];
}

export interface WorkspaceReadOptions {
  include?: readonly WorkspaceIncludeOpt[];
}

export interface VCSRepoOptions {
  branch?: string;
  identifier?: string;
  ingressSubmodules?: boolean;
  oauthTokenId?: string;
  tagsRegex?: string;
}

export interface WorkspaceUpdateOptions {
  name?: string;
  description?: string;
  allowDestroyPlan?: boolean;
  autoApply?: boolean;
  executionMode?: "remote" | "local" | "agent";
  queueAllRuns?: boolean;
  speculativeEnabled?: boolean;
  terraformVersion?: string;
  triggerPrefixes?: string[];
  /** null detaches the workspace from its repository. */
  vcsRepo?: VCSRepoOptions | null;
  workingDirectory?: string;
  projectId?: string;
}

export interface WorkspaceCreateOptions extends WorkspaceUpdateOptions {
  name: string;
  tagNames?: string[];
}

export interface WorkspaceLockOptions {
  reason?: string;
}

function vcsRepoAttribute(vcsRepo: VCSRepoOptions | null | undefined): unknown {
  if (vcsRepo === undefined || vcsRepo === null) {
    return vcsRepo;
  }
  return {
    branch: vcsRepo.branch,
    identifier: vcsRepo.identifier,
    "ingress-submodules": vcsRepo.ingressSubmodules,
    "oauth-token-id": vcsRepo.oauthTokenId,
    "tags-regex": vcsRepo.tagsRegex,
  };
}

function workspaceBody(options: WorkspaceUpdateOptions & { tagNames?: string[] }) {
  return jsonApiBody(workspaceCodec.type, {
    attributes: {
      name: options.name,
      description: options.description,
      "allow-destroy-plan": options.allowDestroyPlan,
      "auto-apply": options.autoApply,
      "execution-mode": options.executionMode,
      "queue-all-runs": options.queueAllRuns,
      "speculative-enabled": options.speculativeEnabled,
      "tag-names": options.tagNames,
      "terraform-version": options.terraformVersion,
      "trigger-prefixes": options.triggerPrefixes,
      "vcs-repo": vcsRepoAttribute(options.vcsRepo),
      "working-directory": options.workingDirectory,
    },
    relationships: {
      project: toOne("projects", options.projectId),
    },
  });
}

function validateWorkspaceName(organization: string, workspace: string): void {
  if (!validStringID(organization)) {
    throw ErrInvalidOrg;
  }
  if (!validString(workspace)) {
    throw ErrRequiredWorkspace;
  }
  if (!validStringID(workspace)) {
    throw ErrInvalidWorkspaceValue;
  }
}

export class Workspaces {
  private client: RequestBuilder;

  constructor(client: RequestBuilder) {
    this.client = client;
  }

  async list(
    organization: string,
    options: WorkspaceListOptions = {},
    call?: CallOptions
  ): Promise<ListResult<Workspace>> {
    if (!validStringID(organization)) {
      throw ErrInvalidOrg;
    }

    const req = this.client.newRequest("GET", `organizations/${segment(organization)}/workspaces`, {
      query: {
        ...pageQuery(options),
        "search[name]": options.search,
        "search[tags]": options.tags,
        "search[exclude-tags]": options.excludeTags,
        "search[wildcard-name]": options.wildcardName,
        "filter[project][id]": options.projectId,
        include: options.include,
      },
    });
    return req.list(workspaceCodec, call);
  }

  async read(
    organization: string,
    workspace: string,
    options: WorkspaceReadOptions = {},
    call?: CallOptions
  ): Promise<Workspace> {
    validateWorkspaceName(organization, workspace);

    const req = this.client.newRequest(
      "GET",
      `organizations/${segment(organization)}/workspaces/${segment(workspace)}`,
      { query: { include: options.include } }
    );
    return req.single(workspaceCodec, call);
  }

  async readById(
    workspaceId: string,
    options: WorkspaceReadOptions = {},
    call?: CallOptions
  ): Promise<Workspace> {
    if (!validStringID(workspaceId)) {
      throw ErrInvalidWorkspaceID;
    }

    const req = this.client.newRequest("GET", `workspaces/${segment(workspaceId)}`, {
      query: { include: options.include },
    });
    return req.single(workspaceCodec, call);
  }

  async create(
    organization: string,
    options: WorkspaceCreateOptions,
    call?: CallOptions
  ): Promise<Workspace> {
    if (!validStringID(organization)) {
      throw ErrInvalidOrg;
    }
    if (!validString(options.name)) {
      throw ErrRequiredName;
    }
    if (!validStringID(options.name)) {
      throw ErrInvalidName;
    }

    const req = this.client.newRequest("POST", `organizations/${segment(organization)}/workspaces`, {
      body: workspaceBody(options),
    });
    return req.single(workspaceCodec, call);
  }

  async update(
    organization: string,
    workspace: string,
    options: WorkspaceUpdateOptions,
    call?: CallOptions
  ): Promise<Workspace> {
    validateWorkspaceName(organization, workspace);
    if (options.name !== undefined && !validStringID(options.name)) {
      throw ErrInvalidName;
    }

    const req = this.client.newRequest(
      "PATCH",
      `organizations/${segment(organization)}/workspaces/${segment(workspace)}`,
      { body: workspaceBody(options) }
    );
    return req.single(workspaceCodec, call);
  }

  async updateById(
    workspaceId: string,
    options: WorkspaceUpdateOptions,
    call?: CallOptions
  ): Promise<Workspace> {
    if (!validStringID(workspaceId)) {
      throw ErrInvalidWorkspaceID;
    }
    if (options.name !== undefined && !validStringID(options.name)) {
      throw ErrInvalidName;
    }

    const req = this.client.newRequest("PATCH", `workspaces/${segment(workspaceId)}`, {
      body: workspaceBody(options),
    });
    return req.single(workspaceCodec, call);
  }

  async delete(organization: string, workspace: string, call?: CallOptions): Promise<void> {
    validateWorkspaceName(organization, workspace);

    return this.client
      .newRequest("DELETE", `organizations/${segment(organization)}/workspaces/${segment(workspace)}`)
      .run(call);
  }

  async deleteById(workspaceId: string, call?: CallOptions): Promise<void> {
    if (!validStringID(workspaceId)) {
      throw ErrInvalidWorkspaceID;
    }

    return this.client.newRequest("DELETE", `workspaces/${segment(workspaceId)}`).run(call);
  }

  async lock(
    workspaceId: string,
    options: WorkspaceLockOptions = {},
    call?: CallOptions
  ): Promise<Workspace> {
    if (!validStringID(workspaceId)) {
      throw ErrInvalidWorkspaceID;
    }

    const req = this.client.newRequest("POST", `workspaces/${segment(workspaceId)}/actions/lock`, {
      body: jsonBody(options.reason === undefined ? {} : { reason: options.reason }),
    });
    return this.lockAction(req, ErrWorkspaceLocked, call);
  }

  async unlock(workspaceId: string, call?: CallOptions): Promise<Workspace> {
    if (!validStringID(workspaceId)) {
      throw ErrInvalidWorkspaceID;
    }

    const req = this.client.newRequest("POST", `workspaces/${segment(workspaceId)}/actions/unlock`);
    return this.lockAction(req, ErrWorkspaceNotLocked, call);
  }

  async forceUnlock(workspaceId: string, call?: CallOptions): Promise<Workspace> {
    if (!validStringID(workspaceId)) {
      throw ErrInvalidWorkspaceID;
    }

    const req = this.client.newRequest(
      "POST",
      `workspaces/${segment(workspaceId)}/actions/force-unlock`
    );
    return this.lockAction(req, ErrWorkspaceNotLocked, call);
  }

  /**
   * The lock endpoints answer 409 when the workspace is already in the
   * requested state.
   */
  private async lockAction(
    req: ClientRequest,
    conflict: Error,
    call: CallOptions | undefined
  ): Promise<Workspace> {
    try {
      return await req.single(workspaceCodec, call);
    } catch (error) {
      if (error instanceof APIError && error.status === 409) {
        throw conflict;
      }
      throw error;
    }
  }
}
