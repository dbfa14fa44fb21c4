/**
 * Console observability adapter - one JSON object per line
 */

import type {
  ObservabilityAdapter,
  RequestContext,
  ResponseContext,
  ErrorContext,
  Metric,
} from "../core/types.js";

export interface ConsoleObservabilityConfig {
  pretty?: boolean;
  /** Skip metric lines; request, response and error lines are still written. */
  omitMetrics?: boolean;
  /** Where lines go. Defaults to console.log. */
  write?: (line: string) => void;
}

export class ConsoleObservability implements ObservabilityAdapter {
  private config: ConsoleObservabilityConfig;

  constructor(config: ConsoleObservabilityConfig = {}) {
    this.config = config;
  }

  logRequest(context: RequestContext): void {
    this.output({
      level: "debug",
      type: "request",
      method: context.method,
      url: context.url,
      requestId: context.requestId,
      headers: context.headers,
      timestamp: context.timestamp.toISOString(),
    });
  }

  logResponse(context: ResponseContext): void {
    this.output({
      level: "info",
      type: "response",
      method: context.method,
      url: context.url,
      requestId: context.requestId,
      statusCode: context.statusCode,
      attempts: context.attempts,
      duration: context.duration,
      timestamp: context.timestamp.toISOString(),
    });
  }

  logError(context: ErrorContext): void {
    this.output({
      level: "error",
      type: "error",
      method: context.method,
      url: context.url,
      requestId: context.requestId,
      error: context.error,
      attempts: context.attempts,
      duration: context.duration,
      timestamp: context.timestamp.toISOString(),
    });
  }

  logWarning(message: string, metadata?: Record<string, unknown>): void {
    this.output({
      level: "warn",
      type: "warning",
      message,
      metadata,
      timestamp: new Date().toISOString(),
    });
  }

  recordMetric(metric: Metric): void {
    if (this.config.omitMetrics) {
      return;
    }

    this.output({
      level: "info",
      type: "metric",
      name: metric.name,
      value: metric.value,
      tags: metric.tags,
      timestamp: metric.timestamp.toISOString(),
    });
  }

  private output(data: Record<string, unknown>): void {
    const line = this.config.pretty ? JSON.stringify(data, null, 2) : JSON.stringify(data);
    if (this.config.write) {
      this.config.write(line);
    } else {
      console.log(line);
    }
  }
}
