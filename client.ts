import {
  DEFAULT_BASE_URL,
  attach,
  type ClickHousePrivate,
  type ClickHouseResponse,
  type ClientOptions,
} from "./clickhouse.ts";
import { newRequest, run, type HttpMethod } from "./pipeline.ts";
import { Table } from "./table.ts";
import { ServerError, type QueryParams } from "./types.ts";

export interface Client {
  readonly options: Readonly<ClientOptions>;
}

export interface QueryOptions extends ClientOptions {
  /**
   * POST (default) sends the SQL as the request body. GET sends it as the
   * `query` parameter; ClickHouse runs GET requests read-only.
   */
  method?: HttpMethod;
}

export type QueryResponse = ClickHouseResponse;

export type QueryResult = { ok: true; response: QueryResponse } | { ok: false; error: Error };

/**
 * Create a client. Options given here are defaults for every query and can be
 * overridden per call.
 *
 * @example
 * const client = createClient({ database: "system" });
 * const response = await queryOrThrow(client, "SELECT number + 1 FROM numbers LIMIT 3");
 * response.body; // => "1\n2\n3\n"
 */
export function createClient(options: ClientOptions = {}): Client {
  return { options: Object.freeze({ baseUrl: DEFAULT_BASE_URL, ...options }) };
}

/**
 * Run a query and return the response, whatever its status. Throws
 * ValidationError or MissingOptionalDependencyError before anything is sent,
 * TransportError when the server cannot be reached, and any error raised
 * while decoding a table.
 *
 * @example
 * const response = await queryOrThrow(
 *   client,
 *   "SELECT number FROM numbers WHERE number > {num:UInt8} LIMIT 3",
 *   { num: 5 },
 * );
 * response.body; // => "6\n7\n8\n"
 */
export async function queryOrThrow(
  client: Client,
  sql: string,
  params: QueryParams = {},
  options: QueryOptions = {},
): Promise<QueryResponse> {
  const { method = "POST", ...rest } = options;
  const request = newRequest<ClientOptions, ClickHousePrivate, Table>({
    method,
    body: sql,
    options: { ...client.options, ...rest },
  });
  request.private.params = params;
  const [, response] = await run(attach(request));
  return response;
}

/** Same as {@link queryOrThrow}, but failures come back as `{ ok: false, error }`. */
export async function query(
  client: Client,
  sql: string,
  params: QueryParams = {},
  options: QueryOptions = {},
): Promise<QueryResult> {
  try {
    return { ok: true, response: await queryOrThrow(client, sql, params, options) };
  } catch (err: unknown) {
    return { ok: false, error: err instanceof Error ? err : new Error(String(err)) };
  }
}

function bodyText(body: QueryResponse["body"]): string {
  if (typeof body === "string") return body;
  if (body instanceof Uint8Array) return new TextDecoder().decode(body);
  if (body instanceof Table) return "";
  return JSON.stringify(body);
}

/** Return the response if it is 2xx, otherwise throw a ServerError carrying its body. */
export function ensureOk(response: QueryResponse): QueryResponse {
  if (response.status >= 200 && response.status < 300) return response;

  const text = bodyText(response.body);
  const header = response.headers.get("x-clickhouse-exception-code");
  const code = header !== null && /^\d+$/.test(header) ? Number(header) : undefined;
  throw new ServerError(response.status, text, code);
}
