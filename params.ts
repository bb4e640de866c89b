/**
 * Query parameter serialization.
 *
 * Values for {name:Type} placeholders travel as `param_<name>` query-string
 * pairs. ClickHouse parses a top-level value in its escaped text form and a
 * value nested in a container as a quoted literal, so the two contexts
 * encode strings differently.
 */

import {
  ClickHouseDateTime64,
  PlainDate,
  PlainDateTime,
  Tuple,
  ValidationError,
  type QueryParams,
  type QueryParamValue,
} from "./types.ts";

export type QueryPair = readonly [key: string, value: string];

const MICROS_PER_SECOND = 1_000_000n;

function escapeText(text: string): string {
  return text.replace(/\\/g, "\\\\").replace(/\t/g, "\\t").replace(/\n/g, "\\n");
}

function formatNumber(value: number): string {
  if (Number.isNaN(value)) return "nan";
  if (value === Infinity) return "inf";
  if (value === -Infinity) return "-inf";
  return String(value);
}

/** Unix seconds; integral when there is no sub-second part, else six decimals. */
function formatEpochMicros(micros: bigint): string {
  if (micros % MICROS_PER_SECOND === 0n) return (micros / MICROS_PER_SECOND).toString();
  const sign = micros < 0n ? "-" : "";
  const abs = micros < 0n ? -micros : micros;
  const whole = abs / MICROS_PER_SECOND;
  const fraction = (abs % MICROS_PER_SECOND).toString().padStart(6, "0");
  return `${sign}${whole}.${fraction}`;
}

function dateToMicros(date: Date): bigint {
  const ms = date.getTime();
  if (Number.isNaN(ms)) throw new ValidationError("Invalid Date cannot be used as a query parameter");
  return BigInt(ms) * 1000n;
}

function isPlainObject(value: object): value is { readonly [key: string]: QueryParamValue } {
  const proto = Object.getPrototypeOf(value);
  return proto === Object.prototype || proto === null;
}

function encodeEntries(entries: Iterable<readonly [QueryParamValue, QueryParamValue]>): string {
  const parts: string[] = [];
  for (const [key, value] of entries) {
    parts.push(`${encodeNested(key)}:${encodeNested(value)}`);
  }
  return `{${parts.join(",")}}`;
}

/** Encode a value that sits inside an array, tuple or map. */
function encodeNested(value: QueryParamValue): string {
  if (typeof value === "string") return `'${escapeText(value).replace(/'/g, "''")}'`;
  if (value === null) return "NULL";
  if (value instanceof PlainDate || value instanceof PlainDateTime) return `'${value}'`;
  return encodeParamValue(value);
}

/**
 * Encode one top-level parameter value to its wire text.
 *
 * @example
 * encodeParamValue("a\tb")            // => "a\\tb"
 * encodeParamValue([["a", "b"], []])  // => "[['a','b'],[]]"
 * encodeParamValue(tuple(1, "a"))     // => "(1,'a')"
 * encodeParamValue(new Map([["a", 1]])) // => "{'a':1}"
 */
export function encodeParamValue(value: QueryParamValue): string {
  if (typeof value === "string") return escapeText(value);
  if (typeof value === "number") return formatNumber(value);
  if (typeof value === "bigint" || typeof value === "boolean") return String(value);
  if (value === null) return "\\N";
  if (value instanceof Date) return formatEpochMicros(dateToMicros(value));
  if (value instanceof ClickHouseDateTime64) return formatEpochMicros(value.toMicros());
  if (value instanceof Tuple) return `(${value.values.map(encodeNested).join(",")})`;
  if (Array.isArray(value)) return `[${value.map(encodeNested).join(",")}]`;
  if (value instanceof Map) return encodeEntries(value);
  if (isPlainObject(value)) return encodeEntries(Object.entries(value));
  return String(value);
}

/**
 * Turn named parameters into `param_<name>` pairs, in insertion order.
 * The input is left untouched.
 */
export function encodeParams(params: QueryParams): QueryPair[] {
  const entries = params instanceof Map ? [...params.entries()] : Object.entries(params);
  return entries.map(([name, value]) => [`param_${name}`, encodeParamValue(value)] as const);
}

function percentEncode(char: string): string {
  return `%${char.charCodeAt(0).toString(16).toUpperCase()}`;
}

/** RFC 3986: everything but unreserved characters is percent-encoded. */
export function encodeRfc3986(text: string): string {
  return encodeURIComponent(text).replace(/[!'()*]/g, percentEncode);
}

/** application/x-www-form-urlencoded, as browsers and URLSearchParams write it. */
export function encodeForm(text: string): string {
  return encodeURIComponent(text).replace(/[!'()~]/g, percentEncode).replace(/%20/g, "+");
}

/**
 * Append pairs to a raw query string (no leading "?"), keeping what is
 * already there.
 */
export function appendQuery(
  query: string,
  pairs: readonly QueryPair[],
  encode: (text: string) => string = encodeRfc3986,
): string {
  if (pairs.length === 0) return query;
  const encoded = pairs.map(([key, value]) => `${encode(key)}=${encode(value)}`).join("&");
  return query ? `${query}&${encoded}` : encoded;
}
