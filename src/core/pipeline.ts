/**
 * Request pipeline
 * Flow: rate-limit → retry → fetch → error-map
 */

import { randomUUID } from "node:crypto";
import type {
  CallOptions,
  ErrorContext,
  FetchFunction,
  HttpMethod,
  Metric,
  ObservabilityAdapter,
  RawResponse,
  RequestContext,
  ResponseContext,
  SanitizerOptions,
} from "./types.js";
import { APIError } from "./errors.js";
import { mapResponseError } from "./error-mapper.js";
import { sanitizeHeaders, sanitizeUrl } from "./request-sanitizer.js";
import { sanitizeMetric, sanitizeRecord } from "./observability-sanitizer.js";
import type { RateLimiter } from "../strategies/rate-limit.js";
import type { RetryStrategy } from "../strategies/retry.js";

export interface PipelineConfig {
  fetch: FetchFunction;
  rateLimiter: RateLimiter;
  retryStrategy: RetryStrategy;
  observability: ObservabilityAdapter[];
  sanitizerOptions?: SanitizerOptions;
}

/**
 * A request ready to go on the wire.
 */
export interface OutgoingRequest {
  method: HttpMethod;
  url: string;
  headers: Headers;
  body?: string | Uint8Array;
}

export class RequestPipeline {
  private config: PipelineConfig;

  constructor(config: PipelineConfig) {
    this.config = config;
  }

  /**
   * Invokes action on every adapter in isolation. A throwing adapter never
   * reaches the caller; failures are summarised on console.error rather than
   * on the adapters themselves.
   */
  private safelyBroadcastObservability(
    action: (adapter: ObservabilityAdapter) => void,
    actionName: string
  ): void {
    const failures: Array<{ adapter: string; error: unknown }> = [];

    for (const obs of this.config.observability) {
      try {
        action(obs);
      } catch (error) {
        failures.push({
          adapter: obs.constructor?.name || "UnknownObservabilityAdapter",
          error,
        });
      }
    }

    if (failures.length > 0) {
      const summary = failures
        .map(
          ({ adapter, error }) =>
            `  - ${adapter}: ${error instanceof Error ? error.message : String(error)}`
        )
        .join("\n");

      console.error(
        `[tfe-client] Observability failure in ${actionName} (${failures.length}/${this.config.observability.length} adapters failed):\n${summary}`
      );
    }
  }

  private recordMetric(name: string, value: number, tags: Record<string, string>): void {
    const metric: Metric = { name, value, tags, timestamp: new Date() };
    const sanitized = sanitizeMetric(metric, this.config.sanitizerOptions);
    this.safelyBroadcastObservability((obs) => obs.recordMetric(sanitized), `recordMetric:${name}`);
  }

  warn(message: string, metadata?: Record<string, unknown>): void {
    const sanitized = metadata && sanitizeRecord(metadata, this.config.sanitizerOptions);
    this.safelyBroadcastObservability((obs) => obs.logWarning(message, sanitized), "logWarning");
  }

  /**
   * Runs one logical exchange: takes a limiter token, sends with retries and
   * translates a failed final response into an error.
   */
  async execute(request: OutgoingRequest, call: CallOptions = {}): Promise<RawResponse> {
    const requestId = randomUUID();
    const startTime = Date.now();
    const url = sanitizeUrl(request.url, this.config.sanitizerOptions);
    let attempts = 0;

    const requestContext: RequestContext = {
      method: request.method,
      url,
      requestId,
      headers: sanitizeHeaders(request.headers, this.config.sanitizerOptions),
      timestamp: new Date(),
    };
    this.safelyBroadcastObservability((obs) => obs.logRequest(requestContext), "logRequest");

    try {
      await this.config.rateLimiter.acquire(call.signal);

      const { response } = await this.config.retryStrategy.execute(
        (attempt) => {
          attempts = attempt + 1;
          return this.executeHttpRequest(request, call.signal);
        },
        call.signal,
        (attempt, wait, response) => {
          this.recordMetric("tfe.request.retry", 1, {
            method: request.method,
            attempt: String(attempt + 1),
            status: response ? String(response.status) : "transport_error",
            waitMs: String(Math.round(wait)),
          });
        }
      );

      call.onResponseHeaders?.(response.status, response.headers);

      const error = mapResponseError(response);
      if (error) {
        throw error;
      }

      const duration = Date.now() - startTime;
      const responseContext: ResponseContext = {
        method: request.method,
        url,
        requestId,
        statusCode: response.status,
        attempts,
        duration,
        timestamp: new Date(),
      };
      this.safelyBroadcastObservability((obs) => obs.logResponse(responseContext), "logResponse");

      this.recordMetric("tfe.request.count", 1, {
        method: request.method,
        status: String(response.status),
      });
      this.recordMetric("tfe.request.duration", duration, { method: request.method });

      return response;
    } catch (error) {
      const duration = Date.now() - startTime;
      const status = error instanceof APIError ? error.status : undefined;

      const errorContext: ErrorContext = {
        method: request.method,
        url,
        requestId,
        error: {
          name: error instanceof Error ? error.name : "Error",
          message: error instanceof Error ? error.message : String(error),
          ...(status === undefined ? {} : { status }),
        },
        attempts,
        duration,
        timestamp: new Date(),
      };
      this.safelyBroadcastObservability((obs) => obs.logError(errorContext), "logError");

      this.recordMetric("tfe.request.error", 1, {
        method: request.method,
        error: errorContext.error.name,
      });

      throw error;
    }
  }

  /**
   * Sends once, without the limiter or retries, and translates the status.
   * Used for log chunks, which are fetched from a pre-signed URL.
   */
  async executeOnce(request: OutgoingRequest, signal?: AbortSignal): Promise<RawResponse> {
    const response = await this.executeHttpRequest(request, signal);
    const error = mapResponseError(response);
    if (error) {
      throw error;
    }
    return response;
  }

  private async executeHttpRequest(
    request: OutgoingRequest,
    signal: AbortSignal | undefined
  ): Promise<RawResponse> {
    const init: RequestInit = {
      method: request.method,
      headers: request.headers,
    };
    if (request.body !== undefined) {
      init.body = request.body;
    }
    if (signal) {
      init.signal = signal;
    }

    const response = await this.config.fetch(request.url, init);
    const body = new Uint8Array(await response.arrayBuffer());

    return {
      status: response.status,
      statusText: response.statusText,
      headers: response.headers,
      body,
    };
  }
}
