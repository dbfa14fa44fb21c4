/**
 * tfe-client - main entry point
 */

import {
  DEFAULT_ADDRESS,
  DEFAULT_BASE_PATH,
  DEFAULT_REGISTRY_PATH,
  HEADER_API_VERSION,
  HEADER_APP_NAME,
  HEADER_RATE_LIMIT,
  HEADER_TFE_VERSION,
  PING_ENDPOINT,
  USER_AGENT,
  type CallOptions,
  type ClientConfig,
  type ObservabilityAdapter,
  type RetryConfig,
} from "./core/types.js";
import { TFEError } from "./core/errors.js";
import { parseRateLimitLimit } from "./core/header-parser.js";
import { RequestPipeline } from "./core/pipeline.js";
import { RequestBuilder } from "./core/request.js";
import { RateLimiter } from "./strategies/rate-limit.js";
import { DEFAULT_RETRY_CONFIG, RetryStrategy } from "./strategies/retry.js";
import { AdminGeneralSettings } from "./resources/admin-setting-general.js";
import { Applies } from "./resources/apply.js";
import { IPRanges } from "./resources/ip-ranges.js";
import { NotificationConfigurations } from "./resources/notification-configuration.js";
import { Organizations } from "./resources/organization.js";
import { Plans } from "./resources/plan.js";
import { Policies } from "./resources/policy.js";
import { Projects } from "./resources/project.js";
import { RegistryModules } from "./resources/registry-module.js";
import { RegistryProviders } from "./resources/registry-provider.js";
import { Runs } from "./resources/run.js";
import { VariableSets } from "./resources/variable-set.js";
import { Variables } from "./resources/variable.js";
import { Workspaces } from "./resources/workspace.js";

/** App names reported by the hosted service. */
const CLOUD_APP_NAMES: ReadonlySet<string> = new Set(["HCP Terraform", "Terraform Cloud"]);

type Environment = Record<string, string | undefined>;

/**
 * Configuration taken from the environment: TFE_ADDRESS and TFE_TOKEN.
 */
export function defaultConfig(env: Environment = process.env): ClientConfig {
  const config: ClientConfig = {
    address: env.TFE_ADDRESS?.trim() || DEFAULT_ADDRESS,
    basePath: DEFAULT_BASE_PATH,
    registryBasePath: DEFAULT_REGISTRY_PATH,
  };
  const token = env.TFE_TOKEN?.trim();
  if (token) {
    config.token = token;
  }
  return config;
}

function nonBlank(value: string | undefined): string | undefined {
  return value === undefined || value.trim() === "" ? undefined : value;
}

/**
 * Layers caller values over the environment defaults. Blank strings do not
 * override.
 */
function resolveConfig(config: ClientConfig, env: Environment): ClientConfig {
  const defaults = defaultConfig(env);
  return {
    ...config,
    address: nonBlank(config.address) ?? defaults.address,
    basePath: nonBlank(config.basePath) ?? defaults.basePath,
    registryBasePath: nonBlank(config.registryBasePath) ?? defaults.registryBasePath,
    token: nonBlank(config.token) ?? defaults.token,
  };
}

function withTrailingSlash(path: string): string {
  return path.endsWith("/") ? path : `${path}/`;
}

function normalizeObservability(
  observability: ClientConfig["observability"]
): ObservabilityAdapter[] {
  if (Array.isArray(observability)) return observability;
  return observability ? [observability] : [];
}

interface ValidatedConfig {
  address: URL;
  token: string;
  retry: RetryConfig;
}

function validateConfig(config: ClientConfig): ValidatedConfig {
  const errors: string[] = [];

  const token = config.token ?? "";
  if (token === "") {
    errors.push("missing API token");
  }

  let address: URL | undefined;
  try {
    address = new URL(config.address ?? DEFAULT_ADDRESS);
  } catch (error) {
    errors.push(`invalid address: ${error instanceof Error ? error.message : String(error)}`);
  }
  if (address && address.protocol !== "http:" && address.protocol !== "https:") {
    errors.push(`invalid address: unsupported scheme "${address.protocol}"`);
  }

  const retry: RetryConfig = { ...DEFAULT_RETRY_CONFIG, ...config.retry };
  if (retry.retryMax < 0) {
    errors.push("retry.retryMax must be non-negative");
  }
  if (retry.retryWaitMax < retry.retryWaitMin) {
    errors.push("retry.retryWaitMax must not be less than retry.retryWaitMin");
  }
  if (retry.serverErrorWaitMax < retry.serverErrorWaitMin) {
    errors.push("retry.serverErrorWaitMax must not be less than retry.serverErrorWaitMin");
  }

  if (errors.length > 0 || !address) {
    throw new TFEError(`Invalid client configuration:\n  - ${errors.join("\n  - ")}`);
  }

  return { address, token, retry };
}

export class Client {
  readonly organizations: Organizations;
  readonly workspaces: Workspaces;
  readonly projects: Projects;
  readonly runs: Runs;
  readonly plans: Plans;
  readonly applies: Applies;
  readonly variables: Variables;
  readonly variableSets: VariableSets;
  readonly policies: Policies;
  readonly notificationConfigurations: NotificationConfigurations;
  readonly registryProviders: RegistryProviders;
  readonly registryModules: RegistryModules;
  readonly meta: { readonly ipRanges: IPRanges };
  readonly admin: { readonly generalSettings: AdminGeneralSettings };

  private requests: RequestBuilder;
  private pipeline: RequestPipeline;
  private rateLimiter: RateLimiter;
  private retryStrategy: RetryStrategy;
  private apiVersion = "";
  private tfeVersion = "";
  private remoteAppName = "";

  constructor(config: ClientConfig = {}, env: Environment = process.env) {
    const resolved = resolveConfig(config, env);
    const { address, token, retry } = validateConfig(resolved);

    const headers = new Headers({ "User-Agent": USER_AGENT });
    for (const [name, value] of Object.entries(resolved.headers ?? {})) {
      headers.set(name, value);
    }

    this.rateLimiter = new RateLimiter();
    this.retryStrategy = new RetryStrategy(retry, {
      retryServerErrors: resolved.retryServerErrors ?? false,
      ...(resolved.retryLogHook ? { retryLogHook: resolved.retryLogHook } : {}),
      onInvalidResetHeader: (raw) =>
        this.pipeline.warn("ignoring unparsable X-RateLimit-Reset header", { value: raw }),
    });
    this.pipeline = new RequestPipeline({
      fetch: resolved.fetch ?? globalThis.fetch,
      rateLimiter: this.rateLimiter,
      retryStrategy: this.retryStrategy,
      observability: normalizeObservability(resolved.observability),
      ...(resolved.sanitizer ? { sanitizerOptions: resolved.sanitizer } : {}),
    });
    this.requests = new RequestBuilder({
      baseURL: new URL(withTrailingSlash(resolved.basePath ?? DEFAULT_BASE_PATH), address),
      registryBaseURL: new URL(
        withTrailingSlash(resolved.registryBasePath ?? DEFAULT_REGISTRY_PATH),
        address
      ),
      token,
      headers,
      pipeline: this.pipeline,
    });

    this.organizations = new Organizations(this.requests);
    this.workspaces = new Workspaces(this.requests);
    this.projects = new Projects(this.requests);
    this.runs = new Runs(this.requests);
    this.plans = new Plans(this.requests);
    this.applies = new Applies(this.requests);
    this.variables = new Variables(this.requests);
    this.variableSets = new VariableSets(this.requests);
    this.policies = new Policies(this.requests);
    this.notificationConfigurations = new NotificationConfigurations(this.requests);
    this.registryProviders = new RegistryProviders(this.requests);
    this.registryModules = new RegistryModules(this.requests);
    this.meta = { ipRanges: new IPRanges(this.requests) };
    this.admin = { generalSettings: new AdminGeneralSettings(this.requests) };
  }

  /**
   * Builds a client and pings the server, so that the rate limiter follows
   * the limit it advertises.
   */
  static async create(config: ClientConfig = {}, call?: CallOptions): Promise<Client> {
    const client = new Client(config);
    await client.ping(call);
    return client;
  }

  /**
   * Reads the API metadata headers: the rate limit, and the API version, TFE
   * version and app name the server reports.
   */
  async ping(call?: CallOptions): Promise<void> {
    const response = await this.requests.newRequest("GET", PING_ENDPOINT).send(call);

    this.configureLimiter(response.headers.get(HEADER_RATE_LIMIT));
    this.apiVersion = response.headers.get(HEADER_API_VERSION) ?? "";
    this.tfeVersion = response.headers.get(HEADER_TFE_VERSION) ?? "";
    this.remoteAppName = response.headers.get(HEADER_APP_NAME) ?? "";
  }

  /**
   * Applies a raw X-RateLimit-Limit value. Anything that is not a positive
   * number turns limiting off.
   */
  configureLimiter(rawLimit: string | null): void {
    const parsed = parseRateLimitLimit(rawLimit);
    if (parsed.kind === "invalid") {
      this.pipeline.warn("ignoring unparsable X-RateLimit-Limit header", { value: parsed.raw });
    }
    this.rateLimiter.configureFromLimit(parsed.kind === "value" ? parsed.value : undefined);
  }

  setRetryServerErrors(retry: boolean): void {
    this.retryStrategy.setRetryServerErrors(retry);
  }

  /** The TFP-API-Version reported by the last ping; empty before one. */
  remoteAPIVersion(): string {
    return this.apiVersion;
  }

  remoteTFEVersion(): string {
    return this.tfeVersion;
  }

  appName(): string {
    return this.remoteAppName;
  }

  isCloud(): boolean {
    return CLOUD_APP_NAMES.has(this.remoteAppName);
  }

  baseURL(): URL {
    return this.requests.baseURL;
  }
}

