/**
 * Public API surface for tfe-client.
 *
 * This is the only file consumers should import from.
 */

// Main client
export { Client, defaultConfig } from "./index.js";

// Configuration & call options
export type {
  ClientConfig,
  CallOptions,
  FetchFunction,
  RetryConfig,
  RetryLogHook,
  RawResponse,
  SanitizerOptions,
  ListOptions,
  ListResult,
  ListResultNextPrev,
  Pagination,
  PaginationNextPrev,
} from "./core/types.js";
export {
  DEFAULT_ADDRESS,
  DEFAULT_BASE_PATH,
  DEFAULT_REGISTRY_PATH,
  SDK_VERSION,
  USER_AGENT,
} from "./core/types.js";

// Errors
export * from "./core/errors.js";

// Observability extension point
export type {
  ObservabilityAdapter,
  RequestContext,
  ResponseContext,
  ErrorContext,
  Metric,
} from "./core/types.js";
export { ConsoleObservability } from "./observability/console.js";
export type { ConsoleObservabilityConfig } from "./observability/console.js";

// Pagination & logs
export { paginate, DEFAULT_MAX_PAGES } from "./strategies/pagination.js";
export type { PaginateOptions } from "./strategies/pagination.js";
export { LogReader } from "./core/log-reader.js";

// Resources
export * from "./resources/admin-setting-general.js";
export * from "./resources/apply.js";
export * from "./resources/ip-ranges.js";
export * from "./resources/notification-configuration.js";
export * from "./resources/organization.js";
export * from "./resources/plan.js";
export * from "./resources/policy.js";
export * from "./resources/project.js";
export * from "./resources/registry-module.js";
export * from "./resources/registry-provider.js";
export * from "./resources/run.js";
export * from "./resources/variable-set.js";
export * from "./resources/variable.js";
export * from "./resources/workspace.js";
