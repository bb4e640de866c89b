/** Column name and the type reported by the decoder that produced it. */
export interface ColumnDef {
  name: string;
  type: string;
}

export type Row = Record<string, unknown>;

/**
 * In-memory columnar result. Column data is held per column; rows are
 * materialized on access.
 */
export class Table implements Iterable<Row> {
  readonly columns: ColumnDef[];
  readonly rowCount: number;

  private readonly columnData: unknown[][];
  private readonly nameToIndex: Map<string, number>;

  constructor(columns: ColumnDef[], columnData: unknown[][]) {
    if (columns.length !== columnData.length) {
      throw new Error(`Expected ${columns.length} columns of data, got ${columnData.length}`);
    }
    const rowCount = columnData[0]?.length ?? 0;
    columnData.forEach((data, i) => {
      if (data.length !== rowCount) {
        throw new Error(
          `Column length mismatch: '${columns[0]?.name}' has ${rowCount} rows, '${columns[i]?.name}' has ${data.length} rows`,
        );
      }
    });
    this.columns = columns;
    this.columnData = columnData;
    this.rowCount = rowCount;
    this.nameToIndex = new Map(columns.map((c, i) => [c.name, i]));
  }

  /** Build from row objects; every row must carry every column. */
  static fromRows(columns: ColumnDef[], rows: Row[]): Table {
    const columnData = columns.map((column) =>
      rows.map((row) => {
        if (!(column.name in row)) throw new Error(`Missing column '${column.name}' in data`);
        return row[column.name];
      }),
    );
    return new Table(columns, columnData);
  }

  get length(): number {
    return this.rowCount;
  }
  get numCols(): number {
    return this.columns.length;
  }
  get columnNames(): string[] {
    return this.columns.map((c) => c.name);
  }

  /** Get column values by name. */
  getColumn(name: string): unknown[] | undefined {
    const idx = this.nameToIndex.get(name);
    return idx !== undefined ? this.columnData[idx] : undefined;
  }

  /** Get value at specific row and column index. */
  getAt(rowIndex: number, colIndex: number): unknown {
    return this.columnData[colIndex]?.[rowIndex];
  }

  /** Get row at index as a plain object. */
  get(index: number): Row {
    if (index < 0 || index >= this.rowCount) {
      throw new RangeError(`Index out of bounds: ${index}`);
    }
    const row: Row = {};
    this.columns.forEach((column, i) => {
      row[column.name] = this.columnData[i]?.[index];
    });
    return row;
  }

  *[Symbol.iterator](): Iterator<Row> {
    for (let i = 0; i < this.rowCount; i++) {
      yield this.get(i);
    }
  }

  toArray(): Row[] {
    return [...this];
  }

  /** Column name to values, in column order. */
  toColumns(): Record<string, unknown[]> {
    const result: Record<string, unknown[]> = {};
    this.columns.forEach((column, i) => {
      result[column.name] = this.columnData[i] ?? [];
    });
    return result;
  }
}
