/**
 * Client options from the environment.
 *
 * Environment:
 *   CH_URL       - full server URL (wins over CH_PROTOCOL/CH_HOST/CH_PORT)
 *   CH_PROTOCOL  - http or https (default: http)
 *   CH_HOST      - ClickHouse host (default: localhost)
 *   CH_PORT      - ClickHouse HTTP port (default: 8123)
 *   CH_USER      - Username
 *   CH_PASSWORD  - Password (default: "")
 *   CH_DATABASE  - Database to query
 *   CH_FORMAT    - Response format (default: tsv)
 */

import type { ClientOptions } from "./clickhouse.ts";
import { ValidationError } from "./types.ts";

type Env = Readonly<Record<string, string | undefined>>;

function parsePort(value: string): number {
  const port = /^\d+$/.test(value) ? parseInt(value, 10) : NaN;
  if (isNaN(port) || port < 1 || port > 65535) {
    throw new ValidationError(`Invalid CH_PORT: ${value}`);
  }
  return port;
}

function baseUrlFrom(env: Env): string | undefined {
  if (env.CH_URL) return env.CH_URL;
  if (!env.CH_HOST && !env.CH_PORT && !env.CH_PROTOCOL) return undefined;

  const protocol = env.CH_PROTOCOL ?? "http";
  if (protocol !== "http" && protocol !== "https") {
    throw new ValidationError(`Invalid CH_PROTOCOL: ${protocol}`);
  }
  const port = parsePort(env.CH_PORT ?? "8123");
  return `${protocol}://${env.CH_HOST ?? "localhost"}:${port}`;
}

export function configFromEnv(env: Env = process.env): ClientOptions {
  const options: ClientOptions = {};

  const baseUrl = baseUrlFrom(env);
  if (baseUrl) options.baseUrl = baseUrl;
  if (env.CH_USER) options.auth = { username: env.CH_USER, password: env.CH_PASSWORD ?? "" };
  if (env.CH_DATABASE) options.database = env.CH_DATABASE;
  if (env.CH_FORMAT) options.format = env.CH_FORMAT;

  return options;
}
