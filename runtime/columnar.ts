/**
 * Columnar Storage
 * Column-major transposition of a finalized row batch for whole-column and slice reads.
 */
import { Row, Value } from '../spec/types';
import { NULL } from './values';

export class ColumnarStorage {
  private constructor(
    private readonly columnIndex: ReadonlyMap<string, number>,
    private readonly columns: ReadonlyArray<readonly Value[]>,
    readonly rowCount: number
  ) {}

  /**
   * Column names come from the first row, in order. Missing fields become null.
   */
  static fromRows(rows: readonly Row[]): ColumnarStorage {
    if (rows.length === 0) {
      return new ColumnarStorage(new Map(), [], 0);
    }

    const names = [...rows[0].keys()];
    const columnIndex = new Map(names.map((name, i) => [name, i] as const));
    const columns: Value[][] = names.map(() => new Array<Value>(rows.length));

    rows.forEach((row, r) => {
      names.forEach((name, c) => {
        columns[c][r] = row.get(name) ?? NULL;
      });
    });

    return new ColumnarStorage(columnIndex, columns, rows.length);
  }

  /**
   * Worth building only for narrow, long batches.
   */
  static shouldUseColumnar(columnCount: number, rowCount: number): boolean {
    return columnCount > 0 && columnCount < 10 && rowCount >= 100;
  }

  get columnCount(): number {
    return this.columns.length;
  }

  columnNames(): string[] {
    return [...this.columnIndex.keys()];
  }

  /**
   * Shared, read-only column.
   */
  getColumn(name: string): readonly Value[] | undefined {
    const idx = this.columnIndex.get(name);
    return idx === undefined ? undefined : this.columns[idx];
  }

  getValue(name: string, row: number): Value | undefined {
    const column = this.getColumn(name);
    return column && row >= 0 && row < column.length ? column[row] : undefined;
  }

  /**
   * Zero-copy view over rows `[start, end)`. Undefined when out of range.
   */
  getColumnSlice(name: string, start: number, end: number): Value | undefined {
    const column = this.getColumn(name);
    if (!column || start < 0 || end > column.length || start > end) {
      return undefined;
    }
    return { type: 'slice', column, start, length: end - start };
  }

  getRow(row: number): Row | undefined {
    if (row < 0 || row >= this.rowCount) {
      return undefined;
    }
    const result: Row = new Map();
    for (const [name, idx] of this.columnIndex) {
      result.set(name, this.columns[idx][row]);
    }
    return result;
  }
}
