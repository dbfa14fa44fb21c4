/**
 * Streams plan and apply logs.
 *
 * Logs are fetched in chunks from a log read URL while the operation is still
 * running. A stream that supports markers starts with STX (0x02) and ends with
 * ETX (0x03); chunks are returned unchanged, markers included. When a poll
 * returns nothing, the `done` predicate decides whether the stream is over.
 */

import { sleep as defaultSleep, type SleepFunction } from "../strategies/retry.js";

const STX = 0x02;
const ETX = 0x03;

export const DEFAULT_CHUNK_SIZE = 64 * 1024;

export type ChunkFetcher = (url: string, signal?: AbortSignal) => Promise<Uint8Array>;

export interface LogReaderOptions {
  /** The log read URL of a plan or apply. */
  url: string;
  fetchChunk: ChunkFetcher;
  /** Reports whether the operation producing the logs has finished. */
  done: () => Promise<boolean>;
  signal?: AbortSignal;
  /** Wait before the nth consecutive empty poll. */
  pollDelay?: (reads: number) => number;
  sleep?: SleepFunction;
}

/**
 * 500ms doubling every five polls, capped at 2s.
 */
export function defaultPollDelay(reads: number): number {
  return Math.min(Math.pow(2, reads / 5) * 500, 2000);
}

export class LogReader implements AsyncIterable<Uint8Array> {
  private options: LogReaderOptions;
  private pollDelay: (reads: number) => number;
  private sleep: SleepFunction;
  private offset = 0;
  private reads = 0;
  private startOfText = false;
  private endOfText = false;
  private finished = false;

  constructor(options: LogReaderOptions) {
    this.options = options;
    this.pollDelay = options.pollDelay ?? defaultPollDelay;
    this.sleep = options.sleep ?? defaultSleep;
  }

  /**
   * Resolves with the next non-empty chunk, or null once the stream has
   * ended. `size` is sent as the `limit` of each poll; the chunk is whatever
   * the server returns for it.
   */
  async read(size: number = DEFAULT_CHUNK_SIZE): Promise<Uint8Array | null> {
    if (this.finished) {
      return null;
    }

    let result = await this.readChunk(size);
    if (result === "no-progress") {
      // the poll counter restarts on every read that has to wait
      for (this.reads = 1; ; this.reads++) {
        await this.sleep(this.pollDelay(this.reads), this.options.signal);
        result = await this.readChunk(size);
        if (result !== "no-progress") break;
      }
    }

    if (result === "eof") {
      this.finished = true;
      return null;
    }
    return result;
  }

  async readAll(size: number = DEFAULT_CHUNK_SIZE): Promise<Uint8Array> {
    const chunks: Uint8Array[] = [];
    for (let chunk = await this.read(size); chunk !== null; chunk = await this.read(size)) {
      chunks.push(chunk);
    }

    const total = chunks.reduce((sum, chunk) => sum + chunk.length, 0);
    const out = new Uint8Array(total);
    let position = 0;
    for (const chunk of chunks) {
      out.set(chunk, position);
      position += chunk.length;
    }
    return out;
  }

  async *[Symbol.asyncIterator](): AsyncIterator<Uint8Array> {
    for (let chunk = await this.read(); chunk !== null; chunk = await this.read()) {
      yield chunk;
    }
  }

  private async readChunk(size: number): Promise<Uint8Array | "eof" | "no-progress"> {
    this.options.signal?.throwIfAborted();

    const url = new URL(this.options.url);
    url.search = `limit=${size}&offset=${this.offset}`;
    const chunk = await this.options.fetchChunk(url.toString(), this.options.signal);

    if (chunk.length > 0) {
      if (this.offset === 0 && chunk[0] === STX) {
        this.startOfText = true;
      }
      if (this.startOfText && chunk[chunk.length - 1] === ETX) {
        this.endOfText = true;
      }
      this.offset += chunk.length;
      return chunk;
    }

    const shouldAskDone =
      (this.startOfText && this.endOfText) ||
      // stream stopped without an ETX
      (this.startOfText && this.reads % 10 === 0) ||
      // stream without markers
      (!this.startOfText && this.reads > 1);

    if (shouldAskDone && (await this.options.done())) {
      return "eof";
    }
    return "no-progress";
  }
}
