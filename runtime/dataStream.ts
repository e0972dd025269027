/**
 * Batch executor
 * Evaluates a data script once per row of a fixed input batch, with full history.
 */
import { DataScript, Row, Value } from '../spec/types';
import { ColumnarStorage } from './columnar';
import { RuntimeError } from './errors';
import { BaseRowExecutor, ExecutorOptions } from './executor';
import * as V from './values';

export class DataStreamExecutor extends BaseRowExecutor {
  private readonly inputRows: readonly Row[];
  /** Indexed by input row; undefined where a row produced no output */
  private outputHistory: Array<Row | undefined> = [];
  private index = 0;
  private columnar: ColumnarStorage | null | undefined;

  constructor(script: DataScript, rows: readonly Row[], options: ExecutorOptions = {}) {
    super(script, options);
    // Constant-only scripts still run once
    this.inputRows = Object.freeze(rows.length === 0 ? [new Map()] : [...rows]);
    this.logger.debug('Batch executor created', {
      rows: this.inputRows.length,
      errorPolicy: this.errorPolicy,
    });
  }

  /**
   * Run every row in order. The first failing row aborts the run
   * unless the error-block policy is active.
   */
  executeAll(): Row[] {
    this.outputHistory = [];
    const outputs: Row[] = [];

    for (let i = 0; i < this.inputRows.length; i++) {
      this.index = i;
      const output = this.evaluateRow(this.inputRows[i]);
      this.outputHistory[i] = output;
      if (output) {
        outputs.push(output);
      }
    }

    this.logger.debug('Batch complete', { rows: this.inputRows.length, outputs: outputs.length });
    return outputs;
  }

  // ==========================================================================
  // RowSource
  // ==========================================================================

  currentIndex(): number {
    return this.index;
  }

  totalRows(): number {
    return this.inputRows.length;
  }

  currentRow(): Row | undefined {
    return this.inputRows[this.index];
  }

  historyLength(): number {
    return this.index;
  }

  getInputHistory(name: string, offset: number): Value | undefined {
    const target = this.index - offset;
    if (offset < 0 || target < 0) {
      return undefined;
    }
    return this.inputRows[target]?.get(name);
  }

  getOutputHistory(name: string, offset: number): Value | undefined {
    // The current row's output does not exist yet
    if (offset < 1 || offset > this.index) {
      return undefined;
    }
    return this.outputHistory[this.index - offset]?.get(name);
  }

  getInputSlice(name: string, startOffset: number, endOffset: number): Value {
    const from = this.index - startOffset;
    const to = this.index - endOffset;
    if (from > to) {
      return V.arr([]);
    }
    if (from >= 0) {
      const view = this.columnarStore()?.getColumnSlice(name, from, to + 1);
      if (view) {
        return view;
      }
    }
    return V.arr(collect(from, to, (t) => this.inputRows[t]?.get(name)));
  }

  getOutputSlice(name: string, startOffset: number, endOffset: number): Value {
    if (endOffset === 0) {
      throw RuntimeError.typeError('Cannot read the output of the current row');
    }
    const from = this.index - startOffset;
    const to = this.index - endOffset;
    if (from > to) {
      return V.arr([]);
    }
    return V.arr(collect(from, to, (t) => this.outputHistory[t]?.get(name)));
  }

  /**
   * Built on first slice read when the batch shape warrants it.
   */
  private columnarStore(): ColumnarStorage | null {
    if (this.columnar === undefined) {
      const columns = this.inputRows[0].size;
      this.columnar = ColumnarStorage.shouldUseColumnar(columns, this.inputRows.length)
        ? ColumnarStorage.fromRows(this.inputRows)
        : null;
    }
    return this.columnar;
  }
}

function collect(from: number, to: number, read: (t: number) => Value | undefined): Value[] {
  const values: Value[] = [];
  for (let t = from; t <= to; t++) {
    values.push(t < 0 ? V.NULL : read(t) ?? V.NULL);
  }
  return values;
}
