/**
 * Streaming executor and ring buffer tests
 */

import { DataScript, Row } from '../../spec/types';
import { StatementDSL } from '../../spec/schema';
import { parseStatements } from '../../compiler/compile';
import { RingBuffer, StreamingExecutor } from '../streaming';
import { num, rowToRecord } from '../values';

function dataScript(input: string[], output: string[], body: StatementDSL[]): DataScript {
  return {
    kind: 'data',
    imports: [],
    input: input.map((name) => ({ name })),
    output: output.map((name) => ({ name })),
    functions: [],
    body: parseStatements(body),
  };
}

function tick(close: number): Row {
  return new Map([['close', num(close)]]);
}

function feed(executor: StreamingExecutor, ...closes: number[]) {
  return closes.map((close) => {
    const output = executor.pushTick(tick(close));
    return output ? rowToRecord(output) : undefined;
  });
}

describe('RingBuffer', () => {
  test('evicts the oldest entry past capacity', () => {
    const buffer = new RingBuffer<number>(3);
    [1, 2, 3, 4, 5].forEach((n) => buffer.push(n));
    expect(buffer.length).toBe(3);
    expect(buffer.toArray()).toEqual([3, 4, 5]);
    expect(buffer.at(0)).toBe(3);
    expect(buffer.at(3)).toBeUndefined();
  });

  test('clear empties the buffer', () => {
    const buffer = new RingBuffer<string>(2);
    buffer.push('a');
    buffer.clear();
    expect(buffer.length).toBe(0);
    expect(buffer.toArray()).toEqual([]);
  });

  test('capacity must be positive', () => {
    expect(() => new RingBuffer(0)).toThrow(RangeError);
  });
});

describe('StreamingExecutor', () => {
  test('produces one output per tick', () => {
    const executor = new StreamingExecutor(dataScript(['close'], ['double'], ['return [close * 2]']), 10);
    expect(feed(executor, 1, 2, 3)).toEqual([{ double: 2 }, { double: 4 }, { double: 6 }]);
  });

  test('history beyond the window is evicted', () => {
    const script = dataScript(['close'], ['back2', 'back3'], [
      'return [ref("close", 2), ref("close", 3)]',
    ]);
    const executor = new StreamingExecutor(script, 2);
    expect(feed(executor, 10, 11, 12, 13)).toEqual([
      { back2: null, back3: null },
      { back2: null, back3: null },
      { back2: 10, back3: null },
      { back2: 11, back3: null },
    ]);
  });

  test('past and window use the buffered history', () => {
    const script = dataScript(['close'], ['p', 'w'], ['return [past("close", 2), window("close", 2)]']);
    const executor = new StreamingExecutor(script, 5);
    expect(feed(executor, 1, 2, 3)).toEqual([
      { p: [null, null], w: [null, 1] },
      { p: [null, 1], w: [1, 2] },
      { p: [1, 2], w: [2, 3] },
    ]);
  });

  test('history slices include the current tick', () => {
    const executor = new StreamingExecutor(dataScript(['close'], ['recent'], ['return [close[-2:]]']), 5);
    expect(feed(executor, 1, 2, 3)).toEqual([
      { recent: [null, null, 1] },
      { recent: [null, 1, 2] },
      { recent: [1, 2, 3] },
    ]);
  });

  test('a declared input absent from the ticks slices as nulls', () => {
    const script = dataScript(['close', 'volume'], ['recent'], ['return [volume[-1:]]']);
    const executor = new StreamingExecutor(script, 5);
    expect(feed(executor, 1, 2)).toEqual([{ recent: [null, null] }, { recent: [null, null] }]);
  });

  test('cursor metadata counts ticks', () => {
    const script = dataScript(['close'], ['index', 'total'], ['return [_index, _total]']);
    const executor = new StreamingExecutor(script, 3);
    expect(feed(executor, 5, 6)).toEqual([
      { index: 0, total: 1 },
      { index: 1, total: 2 },
    ]);
    expect(executor.currentIndex()).toBe(2);
    expect(executor.totalRows()).toBe(2);
    expect(executor.windowSize()).toBe(3);
  });

  test('output history has a slot for ticks without output', () => {
    const script = dataScript(['close'], ['out', 'prev'], [
      'prev = ref("out", 1)',
      { if: 'close != 2', then: ['return [close, prev]'] },
    ]);
    const executor = new StreamingExecutor(script, 5);
    expect(feed(executor, 1, 2, 3)).toEqual([{ out: 1, prev: null }, undefined, { out: 3, prev: null }]);
  });

  test('a failing tick is not recorded', () => {
    const executor = new StreamingExecutor(
      dataScript(['close'], ['ratio', 'prev'], ['return [10 / close, ref("close", 1)]']),
      5
    );
    expect(feed(executor, 1)).toEqual([{ ratio: 10, prev: null }]);
    expect(() => executor.pushTick(tick(0))).toThrow('Division by zero');
    expect(executor.currentIndex()).toBe(1);
    expect(feed(executor, 2)).toEqual([{ ratio: 5, prev: 1 }]);
  });
});
