/**
 * ClickHouse steps for the request pipeline.
 *
 * `clickhouse_run` shapes the outgoing request: default endpoint, output
 * format header, SQL placement, `param_*` values and the target database.
 * `clickhouse_result` turns a Parquet answer into a {@link Table} when the
 * caller asked for the `table` format.
 */

import {
  DEFAULT_FORMAT,
  FORMAT_HEADER,
  TABLE_FORMAT,
  TABLE_WIRE_FORMAT,
  formatHeader,
  resolveFormat,
  type ResolvedFormat,
} from "./formats.ts";
import { appendQuery, encodeForm, encodeParams, type QueryPair } from "./params.ts";
import { loadTableDecoder, type TableDecoder } from "./parquet.ts";
import {
  halt,
  insertResponseSteps,
  prependRequestSteps,
  type Exchange,
  type Halt,
  type PipelineRequest,
  type PipelineResponse,
  type TransportOptions,
} from "./pipeline.ts";
import type { Table } from "./table.ts";
import { MissingOptionalDependencyError, ValidationError, type QueryParams } from "./types.ts";

export const DEFAULT_BASE_URL = "http://localhost:8123";

/** ClickHouse settings sent as query-string parameters, e.g. `max_execution_time`. */
export type ClickHouseSettings = Record<string, string | number | boolean>;

export interface ClickHouseOptions {
  /**
   * Response format: "tsv" (default), "csv", "json", "table", or any
   * format name listed at https://clickhouse.com/docs/en/interfaces/formats.
   * "table" requests Parquet and decodes it into a {@link Table}.
   */
  format?: string;
  /** Database the query runs against. */
  database?: string;
  settings?: ClickHouseSettings;
  sessionId?: string;
  queryId?: string;
  /** Decoder for the "table" format. Defaults to the hyparquet-backed one. */
  tableDecoder?: TableDecoder;
}

export type ClientOptions = TransportOptions & ClickHouseOptions;

/** Request-scoped state kept by the ClickHouse steps. */
export interface ClickHousePrivate {
  /** Format decision; once set the request is not shaped again. */
  clickhouseFormat: ResolvedFormat;
  tableDecoder: TableDecoder;
  params: QueryParams;
}

export type ClickHouseRequest = PipelineRequest<ClientOptions, ClickHousePrivate, Table>;
export type ClickHouseResponse = PipelineResponse<Table>;
type ClickHouseExchange = Exchange<ClientOptions, ClickHousePrivate, Table>;

function settingValue(value: string | number | boolean): string {
  if (typeof value === "boolean") return value ? "1" : "0";
  return String(value);
}

function optionPairs(options: ClientOptions): QueryPair[] {
  const pairs: QueryPair[] = [];
  for (const [name, value] of Object.entries(options.settings ?? {})) {
    pairs.push([name, settingValue(value)]);
  }
  if (options.compression === "zstd") pairs.push(["enable_http_compression", "1"]);
  if (options.sessionId) pairs.push(["session_id", options.sessionId]);
  if (options.queryId) pairs.push(["query_id", options.queryId]);
  return pairs;
}

/**
 * Request step. Validates everything first so that a bad format, missing SQL
 * or unencodable parameter leaves the request untouched.
 */
export async function prepareRequest(request: ClickHouseRequest): Promise<ClickHouseRequest> {
  if (request.private.clickhouseFormat !== undefined) return request;

  const { options } = request;
  const token = options.format ?? DEFAULT_FORMAT;
  const tableDecoder =
    token === TABLE_FORMAT ? (options.tableDecoder ?? (await loadTableDecoder())) : undefined;
  const format = resolveFormat(token, { tableSupport: tableDecoder !== undefined });

  const sql = request.body;
  if (typeof sql !== "string" || sql.trim() === "") {
    throw new ValidationError("sql is required");
  }
  const paramPairs = request.private.params ? encodeParams(request.private.params) : [];

  request.options = { ...options, baseUrl: options.baseUrl ?? DEFAULT_BASE_URL };
  request.private.clickhouseFormat = format;
  if (tableDecoder) request.private.tableDecoder = tableDecoder;
  request.headers.set(FORMAT_HEADER, formatHeader(format));

  if (request.method === "GET") {
    request.query = appendQuery(request.query, [["query", sql]], encodeForm);
    request.body = null;
  }

  request.query = appendQuery(request.query, paramPairs);
  if (options.database) {
    request.query = appendQuery(request.query, [["database", options.database]]);
  }
  request.query = appendQuery(request.query, optionPairs(options));

  // ahead of decode_body, so the decoder gets the bytes as received
  return insertResponseSteps(request, "decode_body", [["clickhouse_result", interpretResponse]]);
}

/**
 * Response step. Decodes only when a table was requested *and* the server
 * answered in Parquet: a FORMAT clause inside the SQL wins over the header,
 * so the echoed header is what counts. Halting skips decode_body.
 */
export async function interpretResponse(
  request: ClickHouseRequest,
  response: ClickHouseResponse,
): Promise<ClickHouseExchange | Halt<ClickHouseExchange>> {
  if (response.status !== 200) return [request, response];
  if (request.private.clickhouseFormat !== TABLE_FORMAT) return [request, response];
  if (response.headers.get(FORMAT_HEADER) !== TABLE_WIRE_FORMAT) return [request, response];

  const decoder = request.private.tableDecoder;
  if (!decoder) {
    throw new MissingOptionalDependencyError("hyparquet", `format: ${JSON.stringify(TABLE_FORMAT)}`);
  }
  const { body } = response;
  if (!(body instanceof Uint8Array)) return [request, response];

  response.body = await decoder.decode(body);
  return halt<ClickHouseExchange>([request, response]);
}

/** Register the ClickHouse steps on a request. */
export function attach(request: ClickHouseRequest): ClickHouseRequest {
  return prependRequestSteps(request, [["clickhouse_run", prepareRequest]]);
}
