export {
  createClient,
  query,
  queryOrThrow,
  ensureOk,
  type Client,
  type QueryOptions,
  type QueryResponse,
  type QueryResult,
} from "./client.ts";
export {
  DEFAULT_BASE_URL,
  attach,
  prepareRequest,
  interpretResponse,
  type ClickHouseOptions,
  type ClickHouseSettings,
  type ClientOptions,
} from "./clickhouse.ts";
export {
  DEFAULT_FORMAT,
  FORMAT_ALIASES,
  FORMAT_HEADER,
  TABLE_FORMAT,
  TABLE_WIRE_FORMAT,
  resolveFormat,
  formatHeader,
  isSupportedFormat,
  supportedFormats,
  type ResolvedFormat,
} from "./formats.ts";
export { encodeParams, encodeParamValue, appendQuery, encodeRfc3986, encodeForm, type QueryPair } from "./params.ts";
export {
  Halt,
  halt,
  newRequest,
  run,
  prependRequestSteps,
  appendResponseSteps,
  insertResponseSteps,
  type AuthConfig,
  type HttpMethod,
  type JsonValue,
  type PipelineRequest,
  type PipelineResponse,
  type RequestStep,
  type ResponseStep,
  type TransportOptions,
} from "./pipeline.ts";
export { Table, type ColumnDef, type Row } from "./table.ts";
export { createParquetDecoder, loadTableDecoder, type TableDecoder } from "./parquet.ts";
export { init as initCompression, type Compression } from "./compression.ts";
export { configFromEnv } from "./config.ts";
export {
  ClickHouseDateTime64,
  PlainDate,
  PlainDateTime,
  Tuple,
  tuple,
  ValidationError,
  MissingOptionalDependencyError,
  TransportError,
  ServerError,
  type QueryParamValue,
  type QueryParams,
} from "./types.ts";
