import { z } from "zod";
import {
  ErrInvalidName,
  ErrInvalidOrg,
  ErrInvalidProvider,
  ErrInvalidRegistryName,
  ErrInvalidVersion,
  ErrRequiredName,
  ErrRequiredNamespace,
  ErrRequiredProvider,
  ErrRequiredVersion,
} from "../core/errors.js";
import type { ResourceCodec } from "../core/jsonapi.js";
import type { RequestBuilder } from "../core/request.js";
import type { CallOptions } from "../core/types.js";
import { validString, validStringID } from "../core/validations.js";
import { flagsSchema, segment, type Flags } from "./common.js";
import { organizationCodec, type Organization } from "./organization.js";
import { isRegistryName, type RegistryName } from "./registry-provider.js";
import { vcsRepoSchema, type VCSRepo } from "./workspace.js";

export const RegistryModuleStatus = {
  Pending: "pending",
  NoVersionTags: "no_version_tags",
  SetupFailed: "setup_failed",
  SetupComplete: "setup_complete",
} as const;

export interface RegistryModuleVersionStatus {
  version: string;
  status: string;
  error: string;
}

const versionStatusesSchema = z.array(
  z
    .object({
      version: z.string().nullish(),
      status: z.string().nullish(),
      error: z.string().nullish(),
    })
    .transform(
      (raw): RegistryModuleVersionStatus => ({
        version: raw.version ?? "",
        status: raw.status ?? "",
        error: raw.error ?? "",
      })
    )
);

export interface RegistryModule {
  id: string;
  name: string;
  provider: string;
  namespace: string;
  registryName: string;
  noCode: boolean;
  publishingMechanism: string;
  status: string;
  permissions: Flags | undefined;
  vcsRepo: VCSRepo | undefined;
  versionStatuses: RegistryModuleVersionStatus[];
  createdAt: Date | undefined;
  updatedAt: Date | undefined;
  organization: Organization | undefined;
}

export const registryModuleCodec: ResourceCodec<RegistryModule> = {
  type: "registry-modules",
  decode: (node) => ({
    id: node.id,
    name: node.string("name"),
    provider: node.string("provider"),
    namespace: node.string("namespace"),
    registryName: node.string("registry-name"),
    noCode: node.boolean("no-code"),
    publishingMechanism: node.string("publishing-mechanism"),
    status: node.string("status"),
    permissions: node.object("permissions", flagsSchema),
    vcsRepo: node.object("vcs-repo", vcsRepoSchema),
    versionStatuses: node.object("version-statuses", versionStatusesSchema) ?? [],
    createdAt: node.date("created-at"),
    updatedAt: node.date("updated-at"),
    organization: node.one("organization", organizationCodec),
  }),
};

/**
 * Identifies a registry module. When `id` is given the other fields are
 * ignored by `read`.
 */
export interface RegistryModuleID {
  id?: string;
  organization: string;
  name: string;
  provider: string;
  /** Required for public modules; private modules default to the organization. */
  namespace?: string;
  /** Defaults to "private". */
  registryName?: RegistryName;
}

// ============================================================================
// Public registry documents
// ============================================================================

const str = z
  .string()
  .nullish()
  .transform((value) => value ?? "");

const strings = z
  .array(z.string())
  .nullish()
  .transform((value) => value ?? []);

/** Input defaults arrive as any JSON value; they are surfaced as text. */
function stringifyDefault(value: unknown): string {
  if (value === undefined || value === null) return "";
  return typeof value === "string" ? value : JSON.stringify(value);
}

const inputSchema = z
  .object({
    name: str,
    type: str,
    description: str,
    default: z.unknown(),
    required: z.boolean().nullish(),
  })
  .transform((raw) => ({
    name: raw.name,
    type: raw.type,
    description: raw.description,
    default: stringifyDefault(raw.default),
    required: raw.required ?? false,
  }));

const outputSchema = z.object({ name: str, description: str });

const providerDependencySchema = z.object({
  name: str,
  namespace: str,
  source: str,
  version: str,
});

const resourceSchema = z.object({ name: str, type: str });

const rootSchema = z
  .object({
    path: str,
    name: str,
    readme: str,
    empty: z.boolean().nullish(),
    inputs: z.array(inputSchema).nullish(),
    outputs: z.array(outputSchema).nullish(),
    provider_dependencies: z.array(providerDependencySchema).nullish(),
    resources: z.array(resourceSchema).nullish(),
  })
  .transform((raw) => ({
    path: raw.path,
    name: raw.name,
    readme: raw.readme,
    empty: raw.empty ?? false,
    inputs: raw.inputs ?? [],
    outputs: raw.outputs ?? [],
    providerDependencies: raw.provider_dependencies ?? [],
    resources: raw.resources ?? [],
  }));

export const terraformRegistryModuleSchema = z
  .object({
    id: str,
    owner: str,
    namespace: str,
    name: str,
    version: str,
    provider: str,
    provider_logo_url: str,
    description: str,
    source: str,
    tag: str,
    published_at: str,
    downloads: z.number().nullish(),
    verified: z.boolean().nullish(),
    root: rootSchema.nullish(),
    providers: strings,
    versions: strings,
  })
  .transform((raw) => ({
    id: raw.id,
    owner: raw.owner,
    namespace: raw.namespace,
    name: raw.name,
    version: raw.version,
    provider: raw.provider,
    providerLogoUrl: raw.provider_logo_url,
    description: raw.description,
    source: raw.source,
    tag: raw.tag,
    publishedAt: raw.published_at,
    downloads: raw.downloads ?? 0,
    verified: raw.verified ?? false,
    root: raw.root ?? undefined,
    providers: raw.providers,
    versions: raw.versions,
  }));

export type TerraformRegistryModule = z.output<typeof terraformRegistryModuleSchema>;

// ============================================================================
// Service
// ============================================================================

function validateModuleName(moduleId: RegistryModuleID): void {
  if (!validStringID(moduleId.organization)) {
    throw ErrInvalidOrg;
  }
  if (!validString(moduleId.name)) {
    throw ErrRequiredName;
  }
  if (!validStringID(moduleId.name)) {
    throw ErrInvalidName;
  }
}

function validateRegistry(registryName: string | undefined, namespace: string | undefined): void {
  if (registryName === undefined || registryName === "private") return;
  if (registryName !== "public") {
    throw ErrInvalidRegistryName;
  }
  if (!validString(namespace)) {
    throw ErrRequiredNamespace;
  }
}

export class RegistryModules {
  private client: RequestBuilder;

  constructor(client: RequestBuilder) {
    this.client = client;
  }

  async read(moduleId: RegistryModuleID, call?: CallOptions): Promise<RegistryModule> {
    if (validStringID(moduleId.id)) {
      return this.client
        .newRequest("GET", `registry-modules/${segment(moduleId.id)}`)
        .single(registryModuleCodec, call);
    }

    validateModuleName(moduleId);
    if (!validString(moduleId.provider)) {
      throw ErrRequiredProvider;
    }
    if (!validStringID(moduleId.provider)) {
      throw ErrInvalidProvider;
    }
    validateRegistry(moduleId.registryName, moduleId.namespace);

    const registryName = moduleId.registryName ?? "private";
    const namespace =
      registryName === "private" && !moduleId.namespace?.trim()
        ? moduleId.organization
        : (moduleId.namespace ?? "");

    const path = [
      "organizations",
      segment(moduleId.organization),
      "registry-modules",
      segment(registryName),
      segment(namespace),
      segment(moduleId.name),
      segment(moduleId.provider),
    ].join("/");
    return this.client.newRequest("GET", path).single(registryModuleCodec, call);
  }

  /** Deletes the module with every provider and version it has. */
  async deleteByName(moduleId: RegistryModuleID, call?: CallOptions): Promise<void> {
    validateModuleName(moduleId);
    if (!isRegistryName(moduleId.registryName)) {
      throw ErrInvalidRegistryName;
    }
    validateRegistry(moduleId.registryName, moduleId.namespace);

    const namespace =
      moduleId.registryName === "private" && !moduleId.namespace?.trim()
        ? moduleId.organization
        : (moduleId.namespace ?? "");

    const path = [
      "organizations",
      segment(moduleId.organization),
      "registry-modules",
      segment(moduleId.registryName),
      segment(namespace),
      segment(moduleId.name),
    ].join("/");
    return this.client.newRequest("DELETE", path).run(call);
  }

  /**
   * Reads one version of a module through the registry protocol API. Public
   * modules are served from the `public/` mirror.
   */
  async readTerraformRegistryModule(
    moduleId: RegistryModuleID,
    version: string,
    call?: CallOptions
  ): Promise<TerraformRegistryModule> {
    if (!validString(version)) {
      throw ErrRequiredVersion;
    }
    if (!validStringID(version)) {
      throw ErrInvalidVersion;
    }

    const prefix = moduleId.registryName === "public" ? "public/v1/modules" : "v1/modules";
    const path = [
      prefix,
      segment(validString(moduleId.namespace) ? moduleId.namespace : moduleId.organization),
      segment(moduleId.name),
      segment(moduleId.provider),
      segment(version),
    ].join("/");
    return this.client.newRegistryRequest("GET", path).json(terraformRegistryModuleSchema, call);
  }
}
