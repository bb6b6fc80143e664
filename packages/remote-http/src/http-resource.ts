/**
 * HttpResourceClient - RemoteResource over fetch.
 *
 *   index   GET    /{resource}
 *   show    GET    /{resource}/{id}
 *   store   POST   /{resource}
 *   update  PUT    /{resource}/{id}
 *   destroy DELETE /{resource}/{id}
 *
 * Bodies are JSON both ways. Any HTTP status resolves to a ResourceResponse;
 * only transport failures and timeouts throw.
 */

import {
  Logger,
  ResourceResponse,
  type FilterValue,
  type KeyValue,
  type RemoteResource,
  type RequestOptions,
  type TandemError,
} from "@tandem/core";
import {ErrRequestFailed, ErrRequestTimedOut} from "./errors.js";

export type HttpMethod = "GET" | "POST" | "PUT" | "DELETE";

export type FetchFn = (url: string, init: RequestInit) => Promise<Response>;

/** A request as interceptors see it; rewriting it changes what is sent */
export interface HttpRequest {
  readonly method: HttpMethod;
  readonly url: string;
  readonly headers: Readonly<Record<string, string>>;
  readonly body?: unknown;
}

export interface Interceptor {
  onRequest?(request: HttpRequest): HttpRequest | Promise<HttpRequest>;
  onResponse?(response: ResourceResponse, request: HttpRequest): ResourceResponse | Promise<ResourceResponse>;
  /** Return a response to recover from a transport failure, or null to let it throw */
  onError?(error: TandemError, request: HttpRequest): ResourceResponse | null | Promise<ResourceResponse | null>;
}

export interface HttpResourceClientOptions {
  baseUrl: string;
  /** Per-request timeout, default 10000 */
  timeoutMs?: number;
  defaultHeaders?: Record<string, string>;
  interceptors?: readonly Interceptor[];
  fetch?: FetchFn;
  logger?: Logger;
}

const DEFAULT_HEADERS: Readonly<Record<string, string>> = {
  Accept: "application/json",
  "Content-Type": "application/json",
};

export class HttpResourceClient implements RemoteResource {
  readonly baseUrl: string;
  readonly timeoutMs: number;
  private readonly defaultHeaders: Record<string, string>;
  private readonly interceptors: Interceptor[];
  private readonly fetchFn: FetchFn;
  private readonly logger: Logger;

  constructor(opts: HttpResourceClientOptions) {
    this.baseUrl = opts.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = opts.timeoutMs ?? 10_000;
    this.defaultHeaders = { ...DEFAULT_HEADERS, ...opts.defaultHeaders };
    this.interceptors = [...(opts.interceptors ?? [])];
    this.fetchFn = opts.fetch ?? ((url, init) => fetch(url, init));
    this.logger = opts.logger ?? Logger.silent();
  }

  /** Interceptors run in registration order */
  use(interceptor: Interceptor): this {
    this.interceptors.push(interceptor);
    return this;
  }

  // -------------------------------------------------------------------------
  // RemoteResource
  // -------------------------------------------------------------------------

  index(resource: string, opts: RequestOptions = {}): Promise<ResourceResponse> {
    return this.get(`/${resource}${queryString(opts.filters)}`, opts);
  }

  show(resource: string, id: KeyValue, opts: RequestOptions = {}): Promise<ResourceResponse> {
    return this.get(memberPath(resource, id), opts);
  }

  store(resource: string, data: Record<string, unknown>, opts: RequestOptions = {}): Promise<ResourceResponse> {
    return this.post(`/${resource}`, data, opts);
  }

  update(resource: string, id: KeyValue, data: Record<string, unknown>, opts: RequestOptions = {}): Promise<ResourceResponse> {
    return this.put(memberPath(resource, id), data, opts);
  }

  destroy(resource: string, id: KeyValue, opts: RequestOptions = {}): Promise<ResourceResponse> {
    return this.delete(memberPath(resource, id), opts);
  }

  // -------------------------------------------------------------------------
  // Raw verbs
  // -------------------------------------------------------------------------

  get(path: string, opts: RequestOptions = {}): Promise<ResourceResponse> {
    return this.send("GET", path, undefined, opts);
  }

  post(path: string, body: unknown, opts: RequestOptions = {}): Promise<ResourceResponse> {
    return this.send("POST", path, body, opts);
  }

  put(path: string, body: unknown, opts: RequestOptions = {}): Promise<ResourceResponse> {
    return this.send("PUT", path, body, opts);
  }

  delete(path: string, opts: RequestOptions = {}): Promise<ResourceResponse> {
    return this.send("DELETE", path, undefined, opts);
  }

  // -------------------------------------------------------------------------
  // Transport
  // -------------------------------------------------------------------------

  private async send(method: HttpMethod, path: string, body: unknown, opts: RequestOptions): Promise<ResourceResponse> {
    let request: HttpRequest = {
      method,
      url: `${this.baseUrl}${path.startsWith("/") ? path : `/${path}`}`,
      headers: { ...this.defaultHeaders, ...opts.headers },
      body,
    };
    for (const i of this.interceptors) {
      if (i.onRequest) request = await i.onRequest(request);
    }

    let response: ResourceResponse;
    try {
      response = await this.dispatch(request);
    } catch (thrown) {
      const error = this.transportError(thrown, request);
      const recovered = await this.recover(error, request);
      if (!recovered) throw error;
      response = recovered;
    }

    for (const i of this.interceptors) {
      if (i.onResponse) response = await i.onResponse(response, request);
    }
    this.logger.debug(`${request.method} ${request.url}`, { status: response.statusCode });
    return response;
  }

  private async dispatch(request: HttpRequest): Promise<ResourceResponse> {
    const res = await this.fetchFn(request.url, {
      method: request.method,
      headers: request.headers,
      body: request.body === undefined ? undefined : JSON.stringify(request.body),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    const headers: Record<string, string> = {};
    res.headers.forEach((value, key) => { headers[key] = value; });
    return new ResourceResponse({
      statusCode: res.status,
      data: parseBody(await res.text()),
      headers,
      message: res.statusText,
    });
  }

  private transportError(thrown: unknown, request: HttpRequest): TandemError {
    const where = { method: request.method, url: request.url };
    if (isTimeout(thrown)) {
      return ErrRequestTimedOut.create({ ...where, timeoutMs: this.timeoutMs }, thrown);
    }
    return ErrRequestFailed.create(where, thrown);
  }

  private async recover(error: TandemError, request: HttpRequest): Promise<ResourceResponse | null> {
    for (const i of this.interceptors) {
      const recovered = i.onError ? await i.onError(error, request) : null;
      if (recovered) return recovered;
    }
    this.logger.debug(`${request.method} ${request.url} failed`, error);
    return null;
  }
}

// ============================================================================
// Helpers
// ============================================================================

function memberPath(resource: string, id: KeyValue): string {
  return `/${resource}/${encodeURIComponent(String(id))}`;
}

function queryString(filters: Record<string, FilterValue> | undefined): string {
  if (!filters) return "";
  const params = new URLSearchParams();
  for (const [key, value] of Object.entries(filters)) params.set(key, String(value));
  const qs = params.toString();
  return qs ? `?${qs}` : "";
}

/** JSON when it parses, the raw text otherwise, null for an empty body */
function parseBody(text: string): unknown {
  if (text === "") return null;
  try {
    return JSON.parse(text);
  } catch {
    return text;
  }
}

/** AbortSignal.timeout rejects fetch with a DOMException named TimeoutError */
function isTimeout(thrown: unknown): boolean {
  return typeof thrown === "object" && thrown !== null && "name" in thrown && thrown.name === "TimeoutError";
}
