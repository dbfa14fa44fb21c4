import { describe, it, expect, vi } from "vitest";
import { LogReader, defaultPollDelay } from "./log-reader.js";

const encoder = new TextEncoder();
const decoder = new TextDecoder();

const LOG_URL = "https://archivist.example.com/v1/object/log-1";

/**
 * Serves chunks by fetch number; every other fetch returns nothing. The
 * operation counts as done from the 30th fetch on.
 */
function logServer(chunks: Record<number, string>) {
  const state = { logReads: 0, doneCalls: 0 };
  const fetchChunk = vi.fn(async (_url: string) => {
    state.logReads++;
    return encoder.encode(chunks[state.logReads] ?? "");
  });
  const done = vi.fn(async () => {
    state.doneCalls++;
    return state.logReads >= 30;
  });
  return { state, fetchChunk, done };
}

const noSleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});

describe("LogReader", () => {
  it("should read a stream with start and end markers", async () => {
    const server = logServer({
      1: "\x02",
      2: "Terraform run started",
      15: " - logs - ",
      29: "Terraform run finished",
      30: "\x03",
    });
    const reader = new LogReader({
      url: LOG_URL,
      fetchChunk: server.fetchChunk,
      done: server.done,
      sleep: noSleep,
    });

    const output = decoder.decode(await reader.readAll());

    expect(output).toBe("\x02Terraform run started - logs - Terraform run finished\x03");
    expect(server.state.logReads).toBe(31);
    expect(server.state.doneCalls).toBe(4);
  });

  it("should read a stream without markers", async () => {
    const server = logServer({
      1: "Terraform run started",
      15: " - logs - ",
      30: "Terraform run finished",
    });
    const reader = new LogReader({
      url: LOG_URL,
      fetchChunk: server.fetchChunk,
      done: server.done,
      sleep: noSleep,
    });

    const output = decoder.decode(await reader.readAll());

    expect(output).toBe("Terraform run started - logs - Terraform run finished");
    expect(server.state.logReads).toBe(31);
    expect(server.state.doneCalls).toBe(25);
  });

  it("should request chunks by limit and offset", async () => {
    const server = logServer({ 1: "\x02abc", 2: "de\x03" });
    const reader = new LogReader({
      url: `${LOG_URL}?stale=1`,
      fetchChunk: server.fetchChunk,
      done: async () => true,
      sleep: noSleep,
    });

    const chunks: string[] = [];
    for await (const chunk of reader) {
      chunks.push(decoder.decode(chunk));
    }

    expect(chunks).toEqual(["\x02abc", "de\x03"]);
    expect(server.fetchChunk.mock.calls.map(([url]) => url)).toEqual([
      `${LOG_URL}?limit=65536&offset=0`,
      `${LOG_URL}?limit=65536&offset=4`,
      `${LOG_URL}?limit=65536&offset=7`,
    ]);
  });

  it("should send the read size as the limit and return chunks whole", async () => {
    const server = logServer({ 1: "\x02abc", 2: "de\x03" });
    const reader = new LogReader({
      url: LOG_URL,
      fetchChunk: server.fetchChunk,
      done: async () => true,
      sleep: noSleep,
    });

    const first = await reader.read(2);
    const second = await reader.read(2);

    expect(decoder.decode(first ?? new Uint8Array())).toBe("\x02abc");
    expect(decoder.decode(second ?? new Uint8Array())).toBe("de\x03");
    expect(server.fetchChunk.mock.calls.map(([url]) => url)).toEqual([
      `${LOG_URL}?limit=2&offset=0`,
      `${LOG_URL}?limit=2&offset=4`,
    ]);
  });

  it("should sleep between empty polls", async () => {
    const sleep = vi.fn(async (_ms: number, _signal?: AbortSignal) => {});
    const server = logServer({ 3: "late" });
    const reader = new LogReader({
      url: LOG_URL,
      fetchChunk: server.fetchChunk,
      done: server.done,
      sleep,
      pollDelay: (reads) => reads * 10,
    });

    const chunk = await reader.read(16);

    expect(decoder.decode(chunk ?? new Uint8Array())).toBe("late");
    expect(sleep.mock.calls.map(([ms]) => ms)).toEqual([10, 20]);
  });

  it("should return null after the stream has ended", async () => {
    const reader = new LogReader({
      url: LOG_URL,
      fetchChunk: async () => new Uint8Array(),
      done: async () => true,
      sleep: noSleep,
    });

    // a stream without markers asks done() only after its second poll
    expect(await reader.read()).toBeNull();
    expect(await reader.read()).toBeNull();
  });

  it("should stop when the signal aborts", async () => {
    const controller = new AbortController();
    const reason = new Error("stop reading");
    const reader = new LogReader({
      url: LOG_URL,
      fetchChunk: async () => new Uint8Array(),
      done: async () => false,
      signal: controller.signal,
      sleep: async () => {
        controller.abort(reason);
      },
    });

    await expect(reader.read()).rejects.toBe(reason);
  });
});

describe("defaultPollDelay", () => {
  it("should double every five polls up to two seconds", () => {
    expect(defaultPollDelay(5)).toBe(1000);
    expect(defaultPollDelay(10)).toBe(2000);
    expect(defaultPollDelay(25)).toBe(2000);
    expect(defaultPollDelay(1)).toBeCloseTo(574.35, 1);
  });
});
