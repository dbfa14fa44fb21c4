import {
  ErrInvalidName,
  ErrInvalidNamespace,
  ErrInvalidOrg,
  ErrInvalidRegistryName,
  ErrNamespaceMustMatchOrg,
  ErrRequiredName,
  ErrRequiredNamespace,
} from "../core/errors.js";
import { jsonApiBody, type ResourceCodec } from "../core/jsonapi.js";
import type { RequestBuilder } from "../core/request.js";
import type { CallOptions, ListOptions, ListResult } from "../core/types.js";
import { validString, validStringID } from "../core/validations.js";
import { flagsSchema, pageQuery, segment, type Flags } from "./common.js";
import { organizationCodec, type Organization } from "./organization.js";

export type RegistryName = "private" | "public";

export function isRegistryName(value: string | undefined): value is RegistryName {
  return value === "private" || value === "public";
}

export interface RegistryProvider {
  id: string;
  name: string;
  namespace: string;
  registryName: string;
  permissions: Flags | undefined;
  createdAt: Date | undefined;
  updatedAt: Date | undefined;
  organization: Organization | undefined;
}

export const registryProviderCodec: ResourceCodec<RegistryProvider> = {
  type: "registry-providers",
  decode: (node) => ({
    id: node.id,
    name: node.string("name"),
    namespace: node.string("namespace"),
    registryName: node.string("registry-name"),
    permissions: node.object("permissions", flagsSchema),
    createdAt: node.date("created-at"),
    updatedAt: node.date("updated-at"),
    organization: node.one("organization", organizationCodec),
  }),
};

/**
 * Addresses a provider by name rather than by its opaque id.
 */
export interface RegistryProviderID {
  organizationName: string;
  registryName: RegistryName;
  namespace: string;
  name: string;
}

export interface RegistryProviderListOptions extends ListOptions {
  registryName?: RegistryName;
  organizationName?: string;
  /** Fuzzy search over namespace and name. */
  search?: string;
}

export interface RegistryProviderCreateOptions {
  name: string;
  namespace: string;
  registryName: RegistryName;
}

function validateNames(name: string, namespace: string, registryName: string): void {
  if (!validString(name)) {
    throw ErrRequiredName;
  }
  if (!validStringID(name)) {
    throw ErrInvalidName;
  }
  if (!validString(namespace)) {
    throw ErrRequiredNamespace;
  }
  if (!validStringID(namespace)) {
    throw ErrInvalidNamespace;
  }
  if (!isRegistryName(registryName)) {
    throw ErrInvalidRegistryName;
  }
}

function providerPath(id: RegistryProviderID): string {
  if (!validStringID(id.organizationName)) {
    throw ErrInvalidOrg;
  }
  validateNames(id.name, id.namespace, id.registryName);

  return [
    "organizations",
    segment(id.organizationName),
    "registry-providers",
    segment(id.registryName),
    segment(id.namespace),
    segment(id.name),
  ].join("/");
}

export class RegistryProviders {
  private client: RequestBuilder;

  constructor(client: RequestBuilder) {
    this.client = client;
  }

  async list(
    organization: string,
    options: RegistryProviderListOptions = {},
    call?: CallOptions
  ): Promise<ListResult<RegistryProvider>> {
    if (!validStringID(organization)) {
      throw ErrInvalidOrg;
    }

    const req = this.client.newRequest(
      "GET",
      `organizations/${segment(organization)}/registry-providers`,
      {
        query: {
          ...pageQuery(options),
          "filter[registry_name]": options.registryName,
          "filter[organization_name]": options.organizationName,
          q: options.search,
        },
      }
    );
    return req.list(registryProviderCodec, call);
  }

  /**
   * Private providers live under the organization's own namespace; the
   * namespace must equal the organization name.
   */
  async create(
    organization: string,
    options: RegistryProviderCreateOptions,
    call?: CallOptions
  ): Promise<RegistryProvider> {
    if (!validStringID(organization)) {
      throw ErrInvalidOrg;
    }
    validateNames(options.name, options.namespace, options.registryName);
    if (options.registryName === "private" && options.namespace !== organization) {
      throw ErrNamespaceMustMatchOrg;
    }

    const req = this.client.newRequest(
      "POST",
      `organizations/${segment(organization)}/registry-providers`,
      {
        body: jsonApiBody(registryProviderCodec.type, {
          attributes: {
            name: options.name,
            namespace: options.namespace,
            "registry-name": options.registryName,
          },
        }),
      }
    );
    return req.single(registryProviderCodec, call);
  }

  async read(providerId: RegistryProviderID, call?: CallOptions): Promise<RegistryProvider> {
    return this.client.newRequest("GET", providerPath(providerId)).single(registryProviderCodec, call);
  }

  async delete(providerId: RegistryProviderID, call?: CallOptions): Promise<void> {
    return this.client.newRequest("DELETE", providerPath(providerId)).run(call);
  }
}
