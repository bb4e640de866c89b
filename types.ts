/**
 * Shared types for query parameters and the errors raised while shaping requests.
 */

/**
 * DateTime64 value with more precision than a JS Date carries.
 * `ticks` counts units of 10^-precision seconds since the Unix epoch.
 */
export class ClickHouseDateTime64 {
  public ticks: bigint;
  public precision: number;

  constructor(ticks: bigint, precision: number) {
    if (!Number.isInteger(precision) || precision < 0 || precision > 9) {
      throw new RangeError(`DateTime64 precision must be between 0 and 9, got ${precision}`);
    }
    this.ticks = ticks;
    this.precision = precision;
  }

  static fromDate(date: Date): ClickHouseDateTime64 {
    return new ClickHouseDateTime64(BigInt(date.getTime()), 3);
  }

  /** Microseconds since the epoch. Sub-microsecond ticks are truncated. */
  toMicros(): bigint {
    if (this.precision <= 6) return this.ticks * 10n ** BigInt(6 - this.precision);
    return this.ticks / 10n ** BigInt(this.precision - 6);
  }
}

function pad(value: number, width: number): string {
  return String(value).padStart(width, "0");
}

/** Calendar date without a time zone, rendered as YYYY-MM-DD. */
export class PlainDate {
  readonly year: number;
  readonly month: number;
  readonly day: number;

  constructor(year: number, month: number, day: number) {
    const utc = new Date(Date.UTC(year, month - 1, day));
    if (
      !Number.isInteger(year) ||
      utc.getUTCFullYear() !== year ||
      utc.getUTCMonth() !== month - 1 ||
      utc.getUTCDate() !== day
    ) {
      throw new RangeError(`Invalid date: ${year}-${month}-${day}`);
    }
    this.year = year;
    this.month = month;
    this.day = day;
  }

  static from(text: string): PlainDate {
    const match = /^(\d{4})-(\d{2})-(\d{2})$/.exec(text);
    if (!match) throw new RangeError(`Invalid date: ${text}`);
    return new PlainDate(Number(match[1]), Number(match[2]), Number(match[3]));
  }

  toString(): string {
    return `${pad(this.year, 4)}-${pad(this.month, 2)}-${pad(this.day, 2)}`;
  }
}

/** Wall-clock date and time without a time zone, rendered as YYYY-MM-DD hh:mm:ss. */
export class PlainDateTime {
  readonly date: PlainDate;
  readonly hour: number;
  readonly minute: number;
  readonly second: number;

  constructor(date: PlainDate, hour = 0, minute = 0, second = 0) {
    if (!inRange(hour, 23) || !inRange(minute, 59) || !inRange(second, 59)) {
      throw new RangeError(`Invalid time: ${hour}:${minute}:${second}`);
    }
    this.date = date;
    this.hour = hour;
    this.minute = minute;
    this.second = second;
  }

  toString(): string {
    return `${this.date} ${pad(this.hour, 2)}:${pad(this.minute, 2)}:${pad(this.second, 2)}`;
  }
}

function inRange(value: number, max: number): boolean {
  return Number.isInteger(value) && value >= 0 && value <= max;
}

/**
 * Fixed-arity tuple. JS arrays always encode as ClickHouse arrays,
 * so tuples need their own wrapper.
 */
export class Tuple {
  readonly values: readonly QueryParamValue[];

  constructor(values: readonly QueryParamValue[]) {
    this.values = values;
  }

  get length(): number {
    return this.values.length;
  }
}

export function tuple(...values: QueryParamValue[]): Tuple {
  return new Tuple(values);
}

/** Query parameter value - primitives, temporal values and containers of them */
export type QueryParamValue =
  | string
  | number
  | bigint
  | boolean
  | null
  | Date
  | ClickHouseDateTime64
  | PlainDate
  | PlainDateTime
  | Tuple
  | QueryParamValue[]
  | Map<QueryParamValue, QueryParamValue>
  | { readonly [key: string]: QueryParamValue };

/** Query parameters for parameterized queries like SELECT {x:UInt64} */
export type QueryParams =
  | { readonly [name: string]: QueryParamValue }
  | Map<string, QueryParamValue>;

/** Bad input caught before any request is sent. */
export class ValidationError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** An optional package needed for the requested feature is not installed. */
export class MissingOptionalDependencyError extends Error {
  readonly dependency: string;

  constructor(dependency: string, feature: string) {
    super(`${feature} - you need to install ${dependency} as a dependency in order to use this format`);
    this.name = "MissingOptionalDependencyError";
    this.dependency = dependency;
  }
}

/** The request never produced a response (connection refused, abort, timeout). */
export class TransportError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "TransportError";
  }
}

/**
 * Non-2xx answer from ClickHouse. `code` comes from the
 * X-ClickHouse-Exception-Code header when the server sent one.
 */
export class ServerError extends Error {
  readonly status: number;
  readonly body: string;
  readonly code?: number;

  constructor(status: number, body: string, code?: number) {
    super(`Query failed: ${status} - ${body.trim()}`);
    this.name = "ServerError";
    this.status = status;
    this.body = body;
    this.code = code;
  }
}
