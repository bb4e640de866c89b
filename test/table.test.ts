import { describe, it } from "node:test";
import assert from "node:assert/strict";
import { readFileSync } from "node:fs";

import { createParquetDecoder, loadTableDecoder, type ParquetModule } from "../parquet.ts";
import { Table } from "../table.ts";

const columns = [
  { name: "id", type: "INT64" },
  { name: "name", type: "UTF8" },
];

describe("Table", () => {
  const table = new Table(columns, [
    [1n, 2n, 3n],
    ["a", "b", "c"],
  ]);

  it("reports its shape", () => {
    assert.equal(table.length, 3);
    assert.equal(table.numCols, 2);
    assert.deepEqual(table.columnNames, ["id", "name"]);
  });

  it("reads columns and cells", () => {
    assert.deepEqual(table.getColumn("name"), ["a", "b", "c"]);
    assert.equal(table.getColumn("missing"), undefined);
    assert.equal(table.getAt(1, 0), 2n);
  });

  it("materializes rows", () => {
    assert.deepEqual(table.get(0), { id: 1n, name: "a" });
    assert.deepEqual(table.toArray(), [
      { id: 1n, name: "a" },
      { id: 2n, name: "b" },
      { id: 3n, name: "c" },
    ]);
    assert.deepEqual([...table].map((row) => row.name), ["a", "b", "c"]);
  });

  it("rejects out-of-range rows", () => {
    assert.throws(() => table.get(3), { name: "RangeError", message: "Index out of bounds: 3" });
    assert.throws(() => table.get(-1), RangeError);
  });

  it("exposes columns by name", () => {
    assert.deepEqual(table.toColumns(), { id: [1n, 2n, 3n], name: ["a", "b", "c"] });
  });

  it("validates column lengths", () => {
    assert.throws(() => new Table(columns, [[1n], ["a", "b"]]), {
      message: "Column length mismatch: 'id' has 1 rows, 'name' has 2 rows",
    });
    assert.throws(() => new Table(columns, [[1n]]), { message: "Expected 2 columns of data, got 1" });
  });

  it("builds from rows", () => {
    const built = Table.fromRows(columns, [
      { id: 1n, name: "a" },
      { id: 2n, name: "b" },
    ]);
    assert.deepEqual(built.getColumn("id"), [1n, 2n]);
    assert.throws(() => Table.fromRows(columns, [{ id: 1n }]), { message: "Missing column 'name' in data" });
  });

  it("can be empty", () => {
    const empty = new Table(columns, [[], []]);
    assert.equal(empty.length, 0);
    assert.deepEqual(empty.toArray(), []);
  });
});

describe("createParquetDecoder", () => {
  interface FakeMetadata {
    size: number;
  }

  function fakeParquet(reads: ArrayBuffer[]): ParquetModule<FakeMetadata> {
    return {
      parquetMetadata(buffer) {
        return { size: buffer.byteLength };
      },
      parquetSchema() {
        return {
          element: { name: "schema" },
          children: [
            { element: { name: "id", type: "INT64" }, children: [] },
            { element: { name: "name", type: "BYTE_ARRAY", converted_type: "UTF8" }, children: [] },
            { element: { name: "tags" }, children: [{ element: { name: "list" }, children: [] }] },
          ],
        };
      },
      async parquetReadObjects({ file, metadata }) {
        reads.push(file);
        return [{ id: 7n, name: "x", tags: [], size: metadata?.size }];
      },
    };
  }

  it("maps the top-level schema to columns and reads rows", async () => {
    const reads: ArrayBuffer[] = [];
    const decoder = createParquetDecoder(fakeParquet(reads));
    const table = await decoder.decode(new Uint8Array([1, 2, 3, 4]));

    assert.deepEqual(table.columns, [
      { name: "id", type: "INT64" },
      { name: "name", type: "UTF8" },
      { name: "tags", type: "GROUP" },
    ]);
    assert.deepEqual(table.toArray(), [{ id: 7n, name: "x", tags: [] }]);
    assert.equal(reads[0]?.byteLength, 4);
  });

  it("reads from a copy of a sliced view", async () => {
    const reads: ArrayBuffer[] = [];
    const decoder = createParquetDecoder(fakeParquet(reads));
    const backing = new Uint8Array([9, 9, 1, 2, 9]);
    await decoder.decode(backing.subarray(2, 4));

    assert.deepEqual(new Uint8Array(reads[0] ?? new ArrayBuffer(0)), new Uint8Array([1, 2]));
  });
});

describe("loadTableDecoder", () => {
  it("decodes a Parquet file with hyparquet", async (t) => {
    const decoder = await loadTableDecoder();
    if (!decoder) {
      t.skip("hyparquet is not installed");
      return;
    }
    const bytes = new Uint8Array(readFileSync(new URL("./fixtures/numbers.parquet", import.meta.url)));
    const table = await decoder.decode(bytes);

    assert.deepEqual(table.columns, [
      { name: "number", type: "INT64" },
      { name: "s", type: "UTF8" },
    ]);
    assert.deepEqual(table.toArray(), [
      { number: 0n, s: "a" },
      { number: 1n, s: "b" },
      { number: 2n, s: "c" },
    ]);
  });

  it("returns the same decoder on every call", async () => {
    assert.equal(await loadTableDecoder(), await loadTableDecoder());
  });
});
