/**
 * Query CLI - prints the response body to stdout.
 * Installed as the `chpipe` bin through bin/chpipe.js, which registers tsx.
 *
 * Usage:
 *   chpipe 'SELECT 1'                 # single query
 *   chpipe --format csv 'SELECT 1'    # other format
 *   chpipe                            # interactive REPL
 *
 * Options: --format/-f, --database/-d, --get (send as GET), --debug.
 * Connection settings come from the CH_* environment variables (see config.ts).
 */

import * as readline from "node:readline";
import { parseArgs } from "node:util";
import {
  createClient,
  ensureOk,
  queryOrThrow,
  type Client,
  type QueryOptions,
  type QueryResponse,
} from "./client.ts";
import { configFromEnv } from "./config.ts";
import { Table } from "./table.ts";

// Convert non-JSON-safe types for serialization
function toJSON(obj: unknown): unknown {
  if (typeof obj === "bigint") return obj.toString();
  if (obj instanceof Date) return obj.toISOString();
  if (Array.isArray(obj)) return obj.map(toJSON);
  if (obj !== null && typeof obj === "object") {
    const result: Record<string, unknown> = {};
    for (const [k, v] of Object.entries(obj)) {
      result[k] = toJSON(v);
    }
    return result;
  }
  return obj;
}

function printBody(body: QueryResponse["body"]): void {
  if (body instanceof Table) {
    for (const row of body) {
      console.log(JSON.stringify(toJSON(row)));
    }
  } else if (typeof body === "string" || body instanceof Uint8Array) {
    process.stdout.write(body);
  } else {
    console.log(JSON.stringify(body, null, 2));
  }
}

async function runQuery(client: Client, sql: string, options: QueryOptions): Promise<void> {
  const response = ensureOk(await queryOrThrow(client, sql, {}, options));
  printBody(response.body);
}

async function runInteractive(client: Client, options: QueryOptions): Promise<void> {
  const rl = readline.createInterface({
    input: process.stdin,
    output: process.stdout,
    prompt: "ch> ",
  });

  console.log(`Connected to ${client.options.baseUrl}`);
  console.log('Type queries, or "exit" to quit.\n');
  rl.prompt();

  for await (const line of rl) {
    const sql = line.trim();
    if (!sql) {
      rl.prompt();
      continue;
    }
    if (sql.toLowerCase() === "exit" || sql.toLowerCase() === "quit") {
      break;
    }

    try {
      await runQuery(client, sql, options);
    } catch (err) {
      console.error(`Error: ${err instanceof Error ? err.message : String(err)}`);
    }
    console.log();
    rl.prompt();
  }

  rl.close();
}

async function main() {
  const { values, positionals } = parseArgs({
    options: {
      format: { type: "string", short: "f" },
      database: { type: "string", short: "d" },
      get: { type: "boolean", default: false },
      debug: { type: "boolean", default: false },
    },
    allowPositionals: true,
  });

  const client = createClient(configFromEnv());
  const options: QueryOptions = {
    method: values.get ? "GET" : "POST",
    debug: values.debug,
  };
  if (values.format) options.format = values.format;
  if (values.database) options.database = values.database;

  const sql = positionals.join(" ");
  if (sql) {
    await runQuery(client, sql, options);
  } else {
    await runInteractive(client, options);
  }
}

main().catch((err: unknown) => {
  console.error(err instanceof Error ? err.message : String(err));
  process.exit(1);
});
