/**
 * Batch executor tests
 */

import { DataScript, Row } from '../../spec/types';
import { StatementDSL } from '../../spec/schema';
import { parseStatements } from '../../compiler/compile';
import { DataStreamExecutor } from '../dataStream';
import { RuntimeError } from '../errors';
import { ExecutorOptions } from '../executor';
import { dec, num, rowToRecord, sequenceItems } from '../values';

// ============================================================================
// Test Helpers
// ============================================================================

function dataScript(
  input: string[],
  output: string[],
  body: StatementDSL[],
  extra: Partial<DataScript> = {}
): DataScript {
  return {
    kind: 'data',
    imports: [],
    input: input.map((name) => ({ name })),
    output: output.map((name) => ({ name })),
    functions: [],
    body: parseStatements(body),
    ...extra,
  };
}

function closeRows(...closes: number[]): Row[] {
  return closes.map((close) => new Map([['close', num(close)]]));
}

function runBatch(script: DataScript, rows: Row[], options: ExecutorOptions = {}) {
  return new DataStreamExecutor(script, rows, options).executeAll().map(rowToRecord);
}

// ============================================================================
// Tests
// ============================================================================

describe('DataStreamExecutor', () => {
  describe('row evaluation', () => {
    test('computes one output row per input row, in order', () => {
      const script = dataScript(['close'], ['double'], ['double = close * 2', 'return [double]']);
      expect(runBatch(script, closeRows(10, 11, 12))).toEqual([
        { double: 20 },
        { double: 22 },
        { double: 24 },
      ]);
    });

    test('an unrecognised LOG_LEVEL does not stop construction', () => {
      const saved = process.env.LOG_LEVEL;
      process.env.LOG_LEVEL = 'trace';
      try {
        const script = dataScript(['close'], ['same'], ['return [close]']);
        expect(runBatch(script, closeRows(3))).toEqual([{ same: 3 }]);
      } finally {
        if (saved === undefined) {
          delete process.env.LOG_LEVEL;
        } else {
          process.env.LOG_LEVEL = saved;
        }
      }
    });

    test('empty input runs once', () => {
      const script = dataScript([], ['two'], ['return [1 + 1]']);
      expect(runBatch(script, [])).toEqual([{ two: 2 }]);
    });

    test('missing declared inputs bind to null', () => {
      const script = dataScript(['close', 'volume'], ['missing'], ['return [is_null(volume)]']);
      expect(runBatch(script, closeRows(1))).toEqual([{ missing: true }]);
    });

    test('rows without an array result add no output row', () => {
      const script = dataScript(['close'], ['out'], [{ if: 'close > 1', then: ['return [close]'] }]);
      expect(runBatch(script, closeRows(1, 2, 3))).toEqual([{ out: 2 }, { out: 3 }]);
    });

    test('outputs map to OUTPUT names by position', () => {
      const script = dataScript(['close'], ['a', 'b'], ['return [close, close + 1, close + 2]']);
      expect(runBatch(script, closeRows(1))).toEqual([{ a: 1, b: 2 }]);
    });

    test('row metadata', () => {
      const rows: Row[] = [
        new Map([
          ['close', num(1)],
          ['volume', num(100)],
        ]),
        new Map([
          ['close', num(2)],
          ['volume', num(200)],
        ]),
      ];
      const script = dataScript(['close'], ['index', 'total', 'width'], [
        'return [_index, _total, len(_args)]',
      ]);
      expect(runBatch(script, rows)).toEqual([
        { index: 0, total: 2, width: 2 },
        { index: 1, total: 2, width: 2 },
      ]);
    });

    test('precision rounds decimal outputs', () => {
      const script = dataScript(['close'], ['third'], ['return [close / 3]'], { precision: 2 });
      const rows: Row[] = [new Map([['close', dec(10)]])];
      expect(runBatch(script, rows)).toEqual([{ third: '3.33' }]);
    });
  });

  describe('history builtins', () => {
    test('ref falls back to the input when no output exists', () => {
      const script = dataScript(['close'], ['ma2'], [
        'prev = ref("close", 1)',
        'ma2 = prev == null ? close : (close + prev) / 2',
        'return [ma2]',
      ]);
      expect(runBatch(script, closeRows(10, 12, 14))).toEqual([{ ma2: 10 }, { ma2: 11 }, { ma2: 13 }]);
    });

    test('past is oldest to newest and null padded', () => {
      const script = dataScript(['close'], ['p'], ['return [past("close", 3)]']);
      const outputs = runBatch(script, closeRows(10, 11, 12, 13, 14));
      expect(outputs[2]).toEqual({ p: [null, 10, 11] });
      expect(outputs[4]).toEqual({ p: [11, 12, 13] });
    });

    test('window ends with the current input value', () => {
      const script = dataScript(['close'], ['w'], ['return [window("close", 3)]']);
      expect(runBatch(script, closeRows(10, 11, 12))).toEqual([
        { w: [null, null, 10] },
        { w: [null, 10, 11] },
        { w: [10, 11, 12] },
      ]);
    });

    test('ref reads earlier outputs before inputs', () => {
      const script = dataScript(['close'], ['total'], [
        'prev = ref("total", 1)',
        'total = is_null(prev) ? close : prev + close',
        'return [total]',
      ]);
      expect(runBatch(script, closeRows(1, 2, 3))).toEqual([{ total: 1 }, { total: 3 }, { total: 6 }]);
    });

    test('offset 0 reads the current input but never the current output', () => {
      const script = dataScript(['close'], ['noOutput', 'input'], [
        'return [is_null(ref("total", 0)), offset("close", 0)]',
      ]);
      expect(runBatch(script, closeRows(7))).toEqual([{ noOutput: true, input: 7 }]);
    });

    test('output history stays aligned with input rows', () => {
      const script = dataScript(['close'], ['out', 'prev'], [
        'prev = ref("out", 1)',
        { if: 'close != 2', then: ['return [close, prev]'] },
      ]);
      expect(runBatch(script, closeRows(1, 2, 3))).toEqual([
        { out: 1, prev: null },
        { out: 3, prev: null },
      ]);
    });
  });

  describe('history indexing and slicing', () => {
    test('negative index reads the previous row', () => {
      const script = dataScript(['close'], ['prev'], ['return [close[-1]]']);
      expect(runBatch(script, closeRows(5, 6))).toEqual([{ prev: null }, { prev: 5 }]);
    });

    test('input slices are inclusive and null padded', () => {
      const script = dataScript(['close'], ['recent', 'before'], ['return [close[-2:], close[:-1]]']);
      expect(runBatch(script, closeRows(1, 2, 3))).toEqual([
        { recent: [null, null, 1], before: [] },
        { recent: [null, 1, 2], before: [1] },
        { recent: [1, 2, 3], before: [1, 2] },
      ]);
    });

    test('a declared input missing from the rows slices as nulls', () => {
      const script = dataScript(['close', 'volume'], ['recent'], ['return [volume[-1:]]']);
      expect(runBatch(script, closeRows(1, 2))).toEqual([
        { recent: [null, null] },
        { recent: [null, null] },
      ]);
    });

    test('output slices must end before the current row', () => {
      const script = dataScript(['close'], ['total'], ['x = total[-2:]', 'return [1]']);
      expect(() => runBatch(script, closeRows(1))).toThrow('Cannot read the output of the current row');
    });

    test('long narrow batches serve slices from columnar storage', () => {
      const closes = Array.from({ length: 120 }, (_, i) => i);
      const script = dataScript(['close'], ['w'], ['return [close[-2:]]']);
      const outputs = new DataStreamExecutor(script, closeRows(...closes)).executeAll();

      const last = outputs[119].get('w');
      expect(last?.type).toBe('slice');
      expect(last && sequenceItems(last)).toEqual([num(117), num(118), num(119)]);
    });
  });

  describe('error handling', () => {
    const script = dataScript(['close'], ['ratio'], ['return [10 / close]'], {
      errorBlock: parseStatements(['return [__error__]']),
    });

    test('a failing row aborts the run by default', () => {
      const executor = new DataStreamExecutor(script, closeRows(1, 0, 2));
      expect(() => executor.executeAll()).toThrow(RuntimeError);
    });

    test('the error-block policy substitutes the ERROR block result', () => {
      expect(runBatch(script, closeRows(1, 0, 2), { errorPolicy: 'error-block' })).toEqual([
        { ratio: 10 },
        { ratio: 'Division by zero' },
        { ratio: 5 },
      ]);
    });

    test('the error-block policy without an ERROR block still aborts', () => {
      const plain = dataScript(['close'], ['ratio'], ['return [10 / close]']);
      expect(() => runBatch(plain, closeRows(0), { errorPolicy: 'error-block' })).toThrow('Division by zero');
    });
  });
});
