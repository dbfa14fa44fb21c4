import { describe, it, expect, vi } from "vitest";
import { ConsoleObservability } from "./console.js";

const timestamp = new Date("2024-01-15T09:30:00.000Z");

function capture(config: ConstructorParameters<typeof ConsoleObservability>[0] = {}) {
  const lines: string[] = [];
  const adapter = new ConsoleObservability({ ...config, write: (line) => lines.push(line) });
  return { adapter, lines };
}

describe("ConsoleObservability", () => {
  it("should write one JSON object per line", () => {
    const { adapter, lines } = capture();

    adapter.logRequest({
      method: "GET",
      url: "https://tfe.example.com/api/v2/ping",
      requestId: "req-1",
      headers: { authorization: "[REDACTED]" },
      timestamp,
    });

    expect(lines).toEqual([
      JSON.stringify({
        level: "debug",
        type: "request",
        method: "GET",
        url: "https://tfe.example.com/api/v2/ping",
        requestId: "req-1",
        headers: { authorization: "[REDACTED]" },
        timestamp: "2024-01-15T09:30:00.000Z",
      }),
    ]);
  });

  it("should log errors with their status", () => {
    const { adapter, lines } = capture();

    adapter.logError({
      method: "DELETE",
      url: "https://tfe.example.com/api/v2/workspaces/ws-1",
      requestId: "req-2",
      error: { name: "APIError", message: "409 Conflict", status: 409 },
      attempts: 1,
      duration: 12,
      timestamp,
    });

    expect(JSON.parse(lines[0] ?? "")).toEqual({
      level: "error",
      type: "error",
      method: "DELETE",
      url: "https://tfe.example.com/api/v2/workspaces/ws-1",
      requestId: "req-2",
      error: { name: "APIError", message: "409 Conflict", status: 409 },
      attempts: 1,
      duration: 12,
      timestamp: "2024-01-15T09:30:00.000Z",
    });
  });

  it("should skip metrics when asked to", () => {
    const { adapter, lines } = capture({ omitMetrics: true });

    adapter.recordMetric({ name: "tfe.request.count", value: 1, tags: {}, timestamp });
    adapter.logWarning("ignoring unparsable X-RateLimit-Limit header", { value: "lots" });

    expect(lines).toHaveLength(1);
    expect(JSON.parse(lines[0] ?? "")).toMatchObject({
      level: "warn",
      message: "ignoring unparsable X-RateLimit-Limit header",
      metadata: { value: "lots" },
    });
  });

  it("should indent in pretty mode", () => {
    const { adapter, lines } = capture({ pretty: true });

    adapter.recordMetric({ name: "tfe.request.duration", value: 5, tags: { method: "GET" }, timestamp });

    expect(lines[0]).toBe(
      JSON.stringify(
        {
          level: "info",
          type: "metric",
          name: "tfe.request.duration",
          value: 5,
          tags: { method: "GET" },
          timestamp: "2024-01-15T09:30:00.000Z",
        },
        null,
        2
      )
    );
  });

  it("should default to console.log", () => {
    const log = vi.spyOn(console, "log").mockImplementation(() => {});
    new ConsoleObservability().logWarning("hello");

    expect(log).toHaveBeenCalledTimes(1);
    expect(JSON.parse(String(log.mock.calls[0]?.[0]))).toMatchObject({ type: "warning", message: "hello" });
    log.mockRestore();
  });
});
