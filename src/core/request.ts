/**
 * Request construction and execution.
 *
 * Services never touch fetch directly: they build a ClientRequest through the
 * RequestBuilder and pick how its response is decoded.
 */

import { serializeRequestBody, type RequestBody, type ResourceCodec, type Schema } from "./jsonapi.js";
import { encodeQueryParams, toQueryValues } from "./query-encoder.js";
import { unmarshalJSON, unmarshalList, unmarshalListNextPrev, unmarshalResource } from "./unmarshal.js";
import type { OutgoingRequest, RequestPipeline } from "./pipeline.js";
import {
  CONTENT_TYPE_JSON,
  CONTENT_TYPE_JSONAPI,
  type CallOptions,
  type HttpMethod,
  type ListResult,
  type ListResultNextPrev,
  type QueryParams,
  type RawResponse,
} from "./types.js";

export interface RequestOptions {
  body?: RequestBody;
  query?: QueryParams;
}

export interface RequestBuilderConfig {
  baseURL: URL;
  registryBaseURL: URL;
  token: string;
  /** Client-wide headers, applied before the request-specific ones. */
  headers: Headers;
  pipeline: RequestPipeline;
}

const BODY_METHODS: ReadonlySet<HttpMethod> = new Set(["POST", "PUT", "PATCH", "DELETE"]);

export class ClientRequest {
  readonly method: HttpMethod;
  readonly url: string;
  /** Sent as-is; may be modified until the request is sent. */
  readonly headers: Headers;
  readonly body: string | Uint8Array | undefined;
  private pipeline: RequestPipeline;

  constructor(pipeline: RequestPipeline, request: OutgoingRequest) {
    this.pipeline = pipeline;
    this.method = request.method;
    this.url = request.url;
    this.headers = request.headers;
    this.body = request.body;
  }

  send(call?: CallOptions): Promise<RawResponse> {
    const outgoing: OutgoingRequest = {
      method: this.method,
      url: this.url,
      headers: this.headers,
    };
    if (this.body !== undefined) {
      outgoing.body = this.body;
    }
    return this.pipeline.execute(outgoing, call);
  }

  async single<T>(codec: ResourceCodec<T>, call?: CallOptions): Promise<T> {
    const response = await this.send(call);
    return unmarshalResource(response.body, codec);
  }

  async list<T>(codec: ResourceCodec<T>, call?: CallOptions): Promise<ListResult<T>> {
    const response = await this.send(call);
    return unmarshalList(response.body, codec);
  }

  async listNextPrev<T>(codec: ResourceCodec<T>, call?: CallOptions): Promise<ListResultNextPrev<T>> {
    const response = await this.send(call);
    return unmarshalListNextPrev(response.body, codec);
  }

  async json<T>(schema: Schema<T>, call?: CallOptions): Promise<T> {
    const response = await this.send(call);
    return unmarshalJSON(response.body, schema);
  }

  async bytes(call?: CallOptions): Promise<Uint8Array> {
    const response = await this.send(call);
    return response.body;
  }

  /** Sends the request and discards the response body. */
  async run(call?: CallOptions): Promise<void> {
    await this.send(call);
  }
}

export class RequestBuilder {
  private config: RequestBuilderConfig;

  constructor(config: RequestBuilderConfig) {
    this.config = config;
  }

  get baseURL(): URL {
    return new URL(this.config.baseURL);
  }

  get pipeline(): RequestPipeline {
    return this.config.pipeline;
  }

  /** A request exchanging JSON:API documents. */
  newRequest(method: HttpMethod, path: string, options: RequestOptions = {}): ClientRequest {
    return this.build(this.config.baseURL, method, path, options, CONTENT_TYPE_JSONAPI);
  }

  /** A request whose response is plain JSON. */
  newJSONRequest(method: HttpMethod, path: string, options: RequestOptions = {}): ClientRequest {
    return this.build(this.config.baseURL, method, path, options, CONTENT_TYPE_JSON);
  }

  /** A request against the module registry API, which speaks plain JSON. */
  newRegistryRequest(method: HttpMethod, path: string, options: RequestOptions = {}): ClientRequest {
    return this.build(this.config.registryBaseURL, method, path, options, CONTENT_TYPE_JSON);
  }

  /**
   * Fetches a URL once with the default headers only: no credentials, no
   * limiter and no retries. Log read URLs are pre-signed.
   */
  async fetchUnauthenticated(url: string, signal?: AbortSignal): Promise<Uint8Array> {
    const response = await this.config.pipeline.executeOnce(
      { method: "GET", url, headers: new Headers(this.config.headers) },
      signal
    );
    return response.body;
  }

  private build(
    base: URL,
    method: HttpMethod,
    path: string,
    options: RequestOptions,
    accept: string
  ): ClientRequest {
    const url = new URL(path, base);
    const query = encodeQueryParams(toQueryValues(options.query));
    if (query) {
      url.search = url.search ? `${url.search.slice(1)}&${query}` : query;
    }

    const headers = new Headers(this.config.headers);
    headers.set("Authorization", `Bearer ${this.config.token}`);
    headers.set("Accept", accept);

    const request: OutgoingRequest = { method, url: url.toString(), headers };
    if (options.body !== undefined && BODY_METHODS.has(method)) {
      const { contentType, payload } = serializeRequestBody(options.body);
      headers.set("Content-Type", contentType);
      request.body = payload;
    }

    return new ClientRequest(this.config.pipeline, request);
  }
}
