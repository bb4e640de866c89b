/**
 * Output format negotiation.
 *
 * ClickHouse picks the response serialization from the X-ClickHouse-Format
 * header. Canonical names pass through unchanged; a few short aliases map to
 * canonical names; the `table` sentinel asks for a Parquet response decoded
 * into a {@link Table} once it arrives.
 */

import formatList from "./formats.json" with { type: "json" };
import { MissingOptionalDependencyError, ValidationError } from "./types.ts";

export const FORMATS_PAGE = "https://clickhouse.com/docs/en/interfaces/formats";

/** Request/response header carrying the wire format. */
export const FORMAT_HEADER = "x-clickhouse-format";

/** Sentinel requesting a decoded table instead of raw bytes. */
export const TABLE_FORMAT = "table";

/** Wire format sent for {@link TABLE_FORMAT}. */
export const TABLE_WIRE_FORMAT = "Parquet";

export const DEFAULT_FORMAT = "tsv";

export const FORMAT_ALIASES: ReadonlyMap<string, string> = new Map([
  ["tsv", "TabSeparated"],
  ["csv", "CSV"],
  ["json", "JSON"],
]);

const SUPPORTED_FORMATS: ReadonlySet<string> = new Set(formatList);

/** A canonical ClickHouse format name, or the table sentinel. */
export type ResolvedFormat = string;

export interface ResolveOptions {
  /** Whether a table decoder is available in this process. */
  tableSupport: boolean;
}

export function isSupportedFormat(name: string): boolean {
  return SUPPORTED_FORMATS.has(name);
}

export function supportedFormats(): string[] {
  return [...SUPPORTED_FORMATS];
}

/**
 * Resolve a user-supplied format token. Throws before anything is sent:
 * ValidationError for unknown tokens, MissingOptionalDependencyError when
 * `table` is requested without a decoder.
 */
export function resolveFormat(token: string, options: ResolveOptions): ResolvedFormat {
  if (token === TABLE_FORMAT) {
    if (!options.tableSupport) {
      throw new MissingOptionalDependencyError("hyparquet", `format: ${JSON.stringify(TABLE_FORMAT)}`);
    }
    return TABLE_FORMAT;
  }

  const alias = FORMAT_ALIASES.get(token);
  if (alias !== undefined) return alias;
  if (SUPPORTED_FORMATS.has(token)) return token;

  const expected = [...FORMAT_ALIASES.keys(), TABLE_FORMAT].map((name) => JSON.stringify(name));
  throw new ValidationError(
    `the given format ${JSON.stringify(token)} is invalid. Expecting one of [${expected.join(", ")}] ` +
      `or one of the valid options described in ${FORMATS_PAGE}`,
  );
}

/** Header value to send for a resolved format. */
export function formatHeader(format: ResolvedFormat): string {
  return format === TABLE_FORMAT ? TABLE_WIRE_FORMAT : format;
}
