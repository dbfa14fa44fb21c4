/**
 * Core type definitions for the TFE client
 */

// ============================================================================
// Transport
// ============================================================================

export type HttpMethod = "GET" | "POST" | "PUT" | "PATCH" | "DELETE";

/**
 * A fully read HTTP response. The body is buffered so that it can be handed
 * to the error translator and to the unmarshaler without re-reading a stream.
 */
export interface RawResponse {
  status: number;
  statusText: string;
  headers: Headers;
  body: Uint8Array;
}

export type FetchFunction = (
  input: string | URL,
  init?: RequestInit
) => Promise<Response>;

/**
 * Per-call options accepted by every service method.
 */
export interface CallOptions {
  /**
   * Aborts the call, including any pending retry backoff or limiter wait.
   */
  signal?: AbortSignal;

  /**
   * Invoked once with the status and headers of the final response of the
   * exchange, even when that response is translated into an error.
   */
  onResponseHeaders?: (status: number, headers: Headers) => void;
}

// ============================================================================
// Query parameters
// ============================================================================

export type QueryValues = Record<string, string | readonly string[]>;

export type QueryParam =
  | string
  | number
  | boolean
  | readonly string[]
  | null
  | undefined;

export type QueryParams = Record<string, QueryParam>;

// ============================================================================
// Pagination
// ============================================================================

/**
 * ListOptions is embedded by every list operation's options.
 */
export interface ListOptions {
  /** The page number to request. */
  pageNumber?: number;
  /** The number of elements returned in a single page. */
  pageSize?: number;
}

export interface PaginationNextPrev {
  currentPage: number;
  previousPage: number;
  nextPage: number;
}

export interface Pagination extends PaginationNextPrev {
  totalCount: number;
  totalPages: number;
}

export interface ListResult<T> {
  items: T[];
  pagination: Pagination;
}

export interface ListResultNextPrev<T> {
  items: T[];
  pagination: PaginationNextPrev;
}

// ============================================================================
// Retry & Rate Limiting
// ============================================================================

/**
 * Observes each retry before the backoff sleep. attemptNum starts at 0.
 */
export type RetryLogHook = (
  attemptNum: number,
  response: RawResponse | undefined
) => void;

export interface RetryConfig {
  /** Maximum number of retries; a request is attempted retryMax + 1 times. */
  retryMax: number;
  /** Lower bound (ms) of the 429 backoff window. */
  retryWaitMin: number;
  /** Upper bound (ms) of the 429 backoff window. */
  retryWaitMax: number;
  /** Lower bound (ms) of the linear-jitter window for 5xx and transport errors. */
  serverErrorWaitMin: number;
  /** Upper bound (ms) of the linear-jitter window for 5xx and transport errors. */
  serverErrorWaitMax: number;
}

export interface RateLimitConfig {
  tokensPerSecond: number;
  maxTokens: number;
}

// ============================================================================
// Observability
// ============================================================================

export interface RequestContext {
  method: HttpMethod;
  url: string;
  requestId: string;
  headers: Record<string, string>;
  timestamp: Date;
}

export interface ResponseContext {
  method: HttpMethod;
  url: string;
  requestId: string;
  statusCode: number;
  attempts: number;
  duration: number;
  timestamp: Date;
}

export interface ErrorContext {
  method: HttpMethod;
  url: string;
  requestId: string;
  error: {
    name: string;
    message: string;
    status?: number;
  };
  attempts: number;
  duration: number;
  timestamp: Date;
}

export interface Metric {
  name: string;
  value: number;
  tags: Record<string, string>;
  timestamp: Date;
}

export interface ObservabilityAdapter {
  logRequest(context: RequestContext): void;
  logResponse(context: ResponseContext): void;
  logError(context: ErrorContext): void;
  logWarning(message: string, metadata?: Record<string, unknown>): void;
  recordMetric(metric: Metric): void;
}

export interface SanitizerOptions {
  /** Extra key fragments to redact, on top of the built-in list. */
  redactedKeys?: string[];
}

// ============================================================================
// Configuration
// ============================================================================

export interface ClientConfig {
  /** The address of the Terraform Enterprise API. */
  address?: string;
  /** The base path on which the API is served. */
  basePath?: string;
  /** The base path of the registry API. */
  registryBasePath?: string;
  /** API token used to access the API. */
  token?: string;
  /** Headers added to every request. */
  headers?: Record<string, string>;
  /** Custom transport; defaults to the global fetch. */
  fetch?: FetchFunction;
  /** Also retry transport errors and 5xx responses. */
  retryServerErrors?: boolean;
  retryLogHook?: RetryLogHook;
  retry?: Partial<RetryConfig>;
  observability?: ObservabilityAdapter | ObservabilityAdapter[];
  sanitizer?: SanitizerOptions;
}

export const DEFAULT_ADDRESS = "https://app.terraform.io";
export const DEFAULT_BASE_PATH = "/api/v2/";
export const DEFAULT_REGISTRY_PATH = "/api/registry/";
export const PING_ENDPOINT = "ping";

export const CONTENT_TYPE_JSONAPI = "application/vnd.api+json";
export const CONTENT_TYPE_JSON = "application/json";
export const CONTENT_TYPE_OCTET_STREAM = "application/octet-stream";

export const HEADER_RATE_LIMIT = "X-RateLimit-Limit";
export const HEADER_RATE_RESET = "X-RateLimit-Reset";
export const HEADER_APP_NAME = "TFP-AppName";
export const HEADER_API_VERSION = "TFP-API-Version";
export const HEADER_TFE_VERSION = "X-TFE-Version";

export const SDK_VERSION = "0.1.0";
export const USER_AGENT = `tfe-client/${SDK_VERSION}`;
