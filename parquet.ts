/**
 * Parquet → {@link Table} decoding, backed by the optional `hyparquet` package.
 *
 * The package is imported on first use. When it is not installed,
 * {@link loadTableDecoder} resolves to undefined and the `table` format is
 * reported as unavailable instead of failing deep inside a request.
 */

import type { FileMetaData } from "hyparquet";
import { Table, type ColumnDef, type Row } from "./table.ts";

export interface TableDecoder {
  decode(bytes: Uint8Array): Promise<Table>;
}

interface SchemaNode {
  element: { name: string; type?: string; converted_type?: string };
  children: SchemaNode[];
}

/** The slice of the hyparquet API used here. */
export interface ParquetModule<M> {
  parquetMetadata(buffer: ArrayBuffer): M;
  parquetSchema(metadata: M): SchemaNode;
  parquetReadObjects(options: { file: ArrayBuffer; metadata?: M }): Promise<Row[]>;
}

function toArrayBuffer(bytes: Uint8Array): ArrayBuffer {
  const buffer = new ArrayBuffer(bytes.byteLength);
  new Uint8Array(buffer).set(bytes);
  return buffer;
}

export function createParquetDecoder<M>(parquet: ParquetModule<M>): TableDecoder {
  return {
    async decode(bytes) {
      const file = toArrayBuffer(bytes);
      const metadata = parquet.parquetMetadata(file);
      const columns: ColumnDef[] = parquet.parquetSchema(metadata).children.map(({ element }) => ({
        name: element.name,
        type: element.converted_type ?? element.type ?? "GROUP",
      }));
      const rows = await parquet.parquetReadObjects({ file, metadata });
      return Table.fromRows(columns, rows);
    },
  };
}

function isModuleNotFound(err: unknown): boolean {
  return err instanceof Error && "code" in err && err.code === "ERR_MODULE_NOT_FOUND";
}

async function importDefaultDecoder(): Promise<TableDecoder | undefined> {
  try {
    const hyparquet = await import("hyparquet");
    return createParquetDecoder<FileMetaData>(hyparquet);
  } catch (err) {
    if (isModuleNotFound(err)) return undefined;
    throw err;
  }
}

let defaultDecoder: Promise<TableDecoder | undefined> | undefined;

/** Resolve the built-in decoder once per process; undefined when hyparquet is missing. */
export function loadTableDecoder(): Promise<TableDecoder | undefined> {
  defaultDecoder ??= importDefaultDecoder();
  return defaultDecoder;
}
