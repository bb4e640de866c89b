/**
 * Request/response pipeline over fetch.
 *
 * A request carries named steps. Request steps run in order and rewrite the
 * request; then the request is sent; then response steps run in order over
 * the (request, response) pair. A response step may return {@link halt} to
 * stop the chain with its result.
 */

import { compressZstd, decompressZstd, type Compression } from "./compression.ts";
import { TransportError, ValidationError } from "./types.ts";

export type HttpMethod = "GET" | "POST";

export type RequestBody = string | Uint8Array | null;

export interface AuthConfig {
  username?: string;
  password?: string;
}

export interface TransportOptions {
  /** Server URL. Query-string parameters already present are kept. */
  baseUrl?: string;
  /** Sent as X-ClickHouse-User / X-ClickHouse-Key headers. */
  auth?: AuthConfig;
  /** Extra request headers. Headers set by steps take precedence. */
  headers?: Record<string, string>;
  /** AbortSignal for manual cancellation */
  signal?: AbortSignal;
  /** Request timeout in milliseconds */
  timeout?: number;
  /** Compress the request body and ask for a compressed response. */
  compression?: Compression;
  /** fetch implementation; defaults to the global one. */
  fetch?: typeof fetch;
  /** Log requests and responses to the console. */
  debug?: boolean;
  /**
   * Decode response bodies by content type (default true): JSON is parsed,
   * other text becomes a string. When false the body stays raw bytes.
   */
  decodeBody?: boolean;
}

export type JsonValue = null | boolean | number | string | JsonValue[] | { [key: string]: JsonValue };

export interface PipelineResponse<B = never> {
  status: number;
  headers: Headers;
  /** Raw bytes, text or parsed JSON once decoded, or whatever a response step replaced it with. */
  body: Uint8Array | string | JsonValue | B;
}

export type Exchange<O extends TransportOptions, P extends object, B> = [
  request: PipelineRequest<O, P, B>,
  response: PipelineResponse<B>,
];

export class Halt<T> {
  readonly value: T;

  constructor(value: T) {
    this.value = value;
  }
}

export function halt<T>(value: T): Halt<T> {
  return new Halt(value);
}

type MaybePromise<T> = T | Promise<T>;

export type RequestStep<O extends TransportOptions, P extends object, B> = (
  request: PipelineRequest<O, P, B>,
) => MaybePromise<PipelineRequest<O, P, B>>;

export type ResponseStep<O extends TransportOptions, P extends object, B> = (
  request: PipelineRequest<O, P, B>,
  response: PipelineResponse<B>,
) => MaybePromise<Exchange<O, P, B> | Halt<Exchange<O, P, B>>>;

export type NamedStep<S> = readonly [name: string, step: S];

export interface PipelineRequest<O extends TransportOptions = TransportOptions, P extends object = object, B = never> {
  method: HttpMethod;
  /** Raw query string without the leading "?". */
  query: string;
  headers: Headers;
  body: RequestBody;
  options: O;
  /** Request-scoped state owned by steps. */
  private: Partial<P>;
  requestSteps: NamedStep<RequestStep<O, P, B>>[];
  responseSteps: NamedStep<ResponseStep<O, P, B>>[];
}

export interface NewRequestInit<O> {
  method?: HttpMethod;
  options: O;
  body?: RequestBody;
  query?: string;
}

const encoder = new TextEncoder();
const decoder = new TextDecoder();

function createSignal(signal?: AbortSignal, timeout?: number): AbortSignal | undefined {
  if (timeout === undefined) return signal;
  const timer = AbortSignal.timeout(timeout);
  return signal ? AbortSignal.any([signal, timer]) : timer;
}

function log(options: TransportOptions, ...args: unknown[]): void {
  if (options.debug) {
    console.log("[chpipe]", ...args);
  }
}

function putHeaders<O extends TransportOptions, P extends object, B>(
  request: PipelineRequest<O, P, B>,
): PipelineRequest<O, P, B> {
  const { headers, auth } = request.options;
  for (const [name, value] of Object.entries(headers ?? {})) {
    if (!request.headers.has(name)) request.headers.set(name, value);
  }
  if (auth?.username) {
    request.headers.set("x-clickhouse-user", auth.username);
    if (auth.password) request.headers.set("x-clickhouse-key", auth.password);
  }
  return request;
}

async function compressBody<O extends TransportOptions, P extends object, B>(
  request: PipelineRequest<O, P, B>,
): Promise<PipelineRequest<O, P, B>> {
  if (request.options.compression !== "zstd") return request;
  request.headers.set("accept-encoding", "zstd");
  if (request.method === "POST" && request.body !== null) {
    const bytes = typeof request.body === "string" ? encoder.encode(request.body) : request.body;
    request.body = await compressZstd(bytes);
    request.headers.set("content-encoding", "zstd");
  }
  return request;
}

async function decompressBody<O extends TransportOptions, P extends object, B>(
  request: PipelineRequest<O, P, B>,
  response: PipelineResponse<B>,
): Promise<Exchange<O, P, B>> {
  const encoding = response.headers.get("content-encoding")?.trim().toLowerCase();
  if (encoding === "zstd" && response.body instanceof Uint8Array) {
    response.body = await decompressZstd(response.body);
  }
  return [request, response];
}

type BodyKind = "json" | "text" | "binary";

const TEXT_MIME = /^(text\/.+|application\/(xml|x-ndjson))$/;

function bodyKind(contentType: string): BodyKind {
  const mime = (contentType.split(";")[0] ?? "").trim().toLowerCase();
  if (mime === "application/json") return "json";
  // a charset parameter does not make octet-stream text
  if (mime === "application/octet-stream") return "binary";
  if (TEXT_MIME.test(mime) || /;\s*charset=/i.test(contentType)) return "text";
  return "binary";
}

function decodeBody<O extends TransportOptions, P extends object, B>(
  request: PipelineRequest<O, P, B>,
  response: PipelineResponse<B>,
): Exchange<O, P, B> {
  const { body } = response;
  if (request.options.decodeBody === false || !(body instanceof Uint8Array)) return [request, response];

  const kind = bodyKind(response.headers.get("content-type") ?? "");
  if (kind === "json") {
    response.body = JSON.parse(decoder.decode(body));
  } else if (kind === "text") {
    response.body = decoder.decode(body);
  }
  return [request, response];
}

/**
 * Create a request with the default steps: headers and body compression
 * before sending, decompression and text decoding after.
 */
export function newRequest<O extends TransportOptions, P extends object = object, B = never>(
  init: NewRequestInit<O>,
): PipelineRequest<O, P, B> {
  return {
    method: init.method ?? "POST",
    query: init.query ?? "",
    headers: new Headers(),
    body: init.body ?? null,
    options: init.options,
    private: {},
    requestSteps: [
      ["put_headers", putHeaders],
      ["compress_body", compressBody],
    ],
    responseSteps: [
      ["decompress_body", decompressBody],
      ["decode_body", decodeBody],
    ],
  };
}

export function prependRequestSteps<O extends TransportOptions, P extends object, B>(
  request: PipelineRequest<O, P, B>,
  steps: NamedStep<RequestStep<O, P, B>>[],
): PipelineRequest<O, P, B> {
  request.requestSteps.unshift(...steps);
  return request;
}

/**
 * Insert response steps ahead of the step named `before`, or at the end when
 * no step has that name.
 */
export function insertResponseSteps<O extends TransportOptions, P extends object, B>(
  request: PipelineRequest<O, P, B>,
  before: string,
  steps: NamedStep<ResponseStep<O, P, B>>[],
): PipelineRequest<O, P, B> {
  const index = request.responseSteps.findIndex(([name]) => name === before);
  request.responseSteps.splice(index === -1 ? request.responseSteps.length : index, 0, ...steps);
  return request;
}

export function appendResponseSteps<O extends TransportOptions, P extends object, B>(
  request: PipelineRequest<O, P, B>,
  steps: NamedStep<ResponseStep<O, P, B>>[],
): PipelineRequest<O, P, B> {
  request.responseSteps.push(...steps);
  return request;
}

/** Resolve the request URL: base URL plus the accumulated query string. */
export function requestUrl(options: TransportOptions, query: string): URL {
  const { baseUrl } = options;
  if (!baseUrl) throw new ValidationError("baseUrl is required");
  let url: URL;
  try {
    url = new URL(baseUrl);
  } catch {
    throw new ValidationError(`Invalid baseUrl: ${baseUrl}`);
  }
  if (query) {
    url.search = url.search ? `${url.search.slice(1)}&${query}` : query;
  }
  return url;
}

async function send<O extends TransportOptions, P extends object, B>(
  request: PipelineRequest<O, P, B>,
): Promise<PipelineResponse<B>> {
  const { options } = request;
  const url = requestUrl(options, request.query);
  const fetchImpl = options.fetch ?? globalThis.fetch;
  log(options, request.method, url.toString());

  let response: Response;
  let body: Uint8Array;
  try {
    response = await fetchImpl(url.toString(), {
      method: request.method,
      headers: request.headers,
      body: request.method === "GET" ? null : request.body,
      signal: createSignal(options.signal, options.timeout),
    });
    body = new Uint8Array(await response.arrayBuffer());
  } catch (err: unknown) {
    const message = err instanceof Error ? err.message : String(err);
    throw new TransportError(`Request to ${url.origin} failed: ${message}`, { cause: err });
  }

  log(options, response.status, response.headers.get("content-type") ?? "", `${body.length} bytes`);
  return { status: response.status, headers: response.headers, body };
}

/** Run request steps, send, then run response steps until one halts. */
export async function run<O extends TransportOptions, P extends object, B>(
  request: PipelineRequest<O, P, B>,
): Promise<Exchange<O, P, B>> {
  let current = request;
  for (const [, step] of request.requestSteps) {
    current = await step(current);
  }

  let exchange: Exchange<O, P, B> = [current, await send(current)];
  for (const [name, step] of current.responseSteps) {
    const outcome = await step(...exchange);
    if (outcome instanceof Halt) {
      log(current.options, `halted by ${name}`);
      return outcome.value;
    }
    exchange = outcome;
  }
  return exchange;
}
