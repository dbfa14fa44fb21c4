import { describe, it, expect, vi } from "vitest";
import {
  RetryStrategy,
  linearJitterBackoff,
  rateLimitBackoff,
  sleep,
} from "./retry.js";
import type { RawResponse } from "../core/types.js";

function raw(status: number, headers: Record<string, string> = {}): RawResponse {
  return { status, statusText: "", headers: new Headers(headers), body: new Uint8Array() };
}

function strategy(
  config: ConstructorParameters<typeof RetryStrategy>[0] = {},
  options: ConstructorParameters<typeof RetryStrategy>[1] = {}
) {
  const sleepFn = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
  const retry = new RetryStrategy(config, { sleep: sleepFn, random: () => 0, ...options });
  return { retry, sleepFn };
}

describe("rateLimitBackoff", () => {
  it("should wait at least the reset time", () => {
    const wait = rateLimitBackoff(100, 400, raw(429, { "X-RateLimit-Reset": "2" }), () => 0.5);
    expect(wait).toBeGreaterThanOrEqual(2000);
    expect(wait).toBe(2150);
  });

  it("should use min as the floor when the reset is shorter", () => {
    expect(rateLimitBackoff(100, 400, raw(429, { "X-RateLimit-Reset": "0.05" }), () => 0)).toBe(100);
  });

  it("should report an unparsable reset and fall back to min", () => {
    const onInvalid = vi.fn();
    const wait = rateLimitBackoff(
      100,
      400,
      raw(429, { "X-RateLimit-Reset": "soon" }),
      () => 1,
      onInvalid
    );
    expect(onInvalid).toHaveBeenCalledWith("soon");
    expect(wait).toBe(400);
  });
});

describe("linearJitterBackoff", () => {
  it("should scale with the attempt number", () => {
    expect(linearJitterBackoff(700, 900, 0, () => 0)).toBe(700);
    expect(linearJitterBackoff(700, 900, 2, () => 1)).toBe(2700);
  });

  it("should not jitter when max is not above min", () => {
    expect(linearJitterBackoff(500, 500, 1, () => 0.9)).toBe(1000);
  });
});

describe("RetryStrategy", () => {
  it("should always retry 429", async () => {
    const { retry, sleepFn } = strategy();
    const send = vi
      .fn<[number], Promise<RawResponse>>()
      .mockResolvedValueOnce(raw(429))
      .mockResolvedValueOnce(raw(200));

    const result = await retry.execute(send);

    expect(result.response.status).toBe(200);
    expect(result.attempts).toBe(2);
    expect(sleepFn).toHaveBeenCalledTimes(1);
    expect(sleepFn.mock.calls[0]?.[0]).toBe(100);
  });

  it("should make exactly one attempt on 503 without server-error retries", async () => {
    const { retry, sleepFn } = strategy();
    const send = vi.fn(async () => raw(503));

    const result = await retry.execute(send);

    expect(result.response.status).toBe(503);
    expect(result.attempts).toBe(1);
    expect(send).toHaveBeenCalledTimes(1);
    expect(sleepFn).not.toHaveBeenCalled();
  });

  it("should make retryMax + 1 attempts on 503 with server-error retries", async () => {
    const { retry, sleepFn } = strategy({ retryMax: 3 }, { retryServerErrors: true });
    const send = vi.fn(async () => raw(503));

    const result = await retry.execute(send);

    expect(send).toHaveBeenCalledTimes(4);
    expect(result.attempts).toBe(4);
    expect(sleepFn.mock.calls.map(([ms]) => ms)).toEqual([700, 1400, 2100]);
  });

  it("should rethrow transport errors unless server-error retries are on", async () => {
    const failure = new TypeError("fetch failed");
    const { retry } = strategy();
    const send = vi.fn(async (): Promise<RawResponse> => {
      throw failure;
    });

    await expect(retry.execute(send)).rejects.toBe(failure);
    expect(send).toHaveBeenCalledTimes(1);
  });

  it("should retry transport errors once enabled", async () => {
    const { retry } = strategy({ retryMax: 5 });
    retry.setRetryServerErrors(true);
    const send = vi
      .fn<[number], Promise<RawResponse>>()
      .mockRejectedValueOnce(new TypeError("fetch failed"))
      .mockResolvedValueOnce(raw(200));

    const result = await retry.execute(send);
    expect(result.attempts).toBe(2);
  });

  it("should stop immediately once the signal is aborted", async () => {
    const controller = new AbortController();
    const reason = new Error("caller gave up");
    controller.abort(reason);

    const { retry, sleepFn } = strategy();
    const send = vi.fn(async () => raw(429));

    await expect(retry.execute(send, controller.signal)).rejects.toBe(reason);
    expect(send).toHaveBeenCalledTimes(1);
    expect(sleepFn).not.toHaveBeenCalled();
  });

  it("should call the log hook before each backoff", async () => {
    const hook = vi.fn();
    const { retry } = strategy({ retryMax: 2 }, { retryLogHook: hook });
    const send = vi.fn(async () => raw(429));

    const result = await retry.execute(send);

    expect(result.response.status).toBe(429);
    expect(hook.mock.calls.map(([attempt]) => attempt)).toEqual([0, 1]);
  });

  it("should report each retry to the observer", async () => {
    const observer = vi.fn();
    const { retry } = strategy();
    const send = vi
      .fn<[number], Promise<RawResponse>>()
      .mockResolvedValueOnce(raw(429, { "X-RateLimit-Reset": "1" }))
      .mockResolvedValueOnce(raw(200));

    await retry.execute(send, undefined, observer);

    expect(observer).toHaveBeenCalledTimes(1);
    expect(observer.mock.calls[0]?.slice(0, 2)).toEqual([0, 1000]);
  });
});

describe("sleep", () => {
  it("should reject with the abort reason", async () => {
    const controller = new AbortController();
    const pending = sleep(60_000, controller.signal);
    controller.abort(new Error("stop"));
    await expect(pending).rejects.toThrow("stop");
  });
});
