/**
 * Core builtin functions (whitelisted)
 * Aggregates, higher-order helpers, row-history lookups and print.
 */
import Decimal from 'decimal.js';
import { HistoryAccess, Value } from '../spec/types';
import { RuntimeError } from './errors';
import { NULL, arr, bool, num, sequenceItems, toNumber, truthy, valueToText } from './values';

// ============================================================================
// Types
// ============================================================================

export interface BuiltinContext {
  /** Active row history; absent outside a row executor */
  history?: HistoryAccess;
  /** Invoke a lambda or function value */
  invoke(fn: Value, args: Value[]): Value;
  print(text: string): void;
}

export type BuiltinFunction = (args: Value[], ctx: BuiltinContext) => Value;

// ============================================================================
// Helpers
// ============================================================================

function expectArgs(fn: string, args: Value[], min: number, max: number = min): void {
  if (args.length < min || args.length > max) {
    const expected = min === max ? `${min}` : `${min}-${max}`;
    throw RuntimeError.argumentMismatch(`${fn} expects ${expected} args, got ${args.length}`);
  }
}

function expectSequence(fn: string, value: Value): Value[] {
  const items = sequenceItems(value);
  if (!items) {
    throw RuntimeError.typeError(`${fn}: first argument must be an array`);
  }
  return items;
}

function expectCallable(fn: string, value: Value): Value {
  if (value.type !== 'lambda' && value.type !== 'function') {
    throw RuntimeError.typeError(`${fn}: second argument must be a lambda`);
  }
  return value;
}

/**
 * Values of an aggregate call: the first argument's elements when it is an array, else all arguments.
 */
function aggregateValues(args: Value[]): Value[] {
  const first = args.length > 0 ? sequenceItems(args[0]) : undefined;
  return first ?? args;
}

function historyName(fn: string, value: Value): string {
  if (value.type !== 'string') {
    throw RuntimeError.typeError(`${fn}: first argument must be a column name string`);
  }
  return value.value;
}

function requireHistory(fn: string, ctx: BuiltinContext): HistoryAccess {
  if (!ctx.history) {
    throw RuntimeError.typeError(`${fn} can only be used inside a row executor`);
  }
  return ctx.history;
}

function count(value: Value): number {
  return Math.max(0, Math.trunc(toNumber(value)));
}

/**
 * Output history first, then input history, else null.
 */
function lookup(history: HistoryAccess, name: string, offset: number): Value {
  return history.getOutputHistory(name, offset) ?? history.getInputHistory(name, offset) ?? NULL;
}

// ============================================================================
// History
// ============================================================================

const ref: BuiltinFunction = (args, ctx) => {
  expectArgs('ref', args, 2);
  const history = requireHistory('ref', ctx);
  return lookup(history, historyName('ref', args[0]), count(args[1]));
};

/**
 * Last n values before the current row, oldest first, null padded.
 */
const past: BuiltinFunction = (args, ctx) => {
  expectArgs('past', args, 2);
  const history = requireHistory('past', ctx);
  const name = historyName('past', args[0]);
  const n = count(args[1]);

  const result: Value[] = [];
  for (let i = n; i >= 1; i--) {
    result.push(lookup(history, name, i));
  }
  return arr(result);
};

/**
 * Last `size` values ending with the current input value.
 */
const window: BuiltinFunction = (args, ctx) => {
  expectArgs('window', args, 2);
  const history = requireHistory('window', ctx);
  const name = historyName('window', args[0]);
  const size = count(args[1]);
  if (size === 0) {
    return arr([]);
  }

  const result: Value[] = [];
  for (let i = size - 1; i >= 1; i--) {
    result.push(lookup(history, name, i));
  }
  // The current output is not computed yet, so the current value comes from input
  result.push(history.getInputHistory(name, 0) ?? NULL);
  return arr(result);
};

// ============================================================================
// Builtin Table
// ============================================================================

export const CORE_BUILTINS: Record<string, BuiltinFunction> = {
  sum: (args) => {
    let total = 0;
    for (const v of aggregateValues(args)) {
      if (v.type !== 'null') total += toNumber(v);
    }
    return num(total);
  },

  max: (args) => {
    if (args.length === 0) throw RuntimeError.argumentMismatch('max expects at least 1 arg');
    return num(aggregateValues(args).map(toNumber).reduce((a, b) => Math.max(a, b), -Infinity));
  },

  min: (args) => {
    if (args.length === 0) throw RuntimeError.argumentMismatch('min expects at least 1 arg');
    return num(aggregateValues(args).map(toNumber).reduce((a, b) => Math.min(a, b), Infinity));
  },

  avg: (args) => {
    const values = aggregateValues(args).filter((v) => v.type !== 'null');
    if (values.length === 0) return NULL;
    return num(values.reduce((acc, v) => acc + toNumber(v), 0) / values.length);
  },

  len: (args) => {
    expectArgs('len', args, 1);
    const [value] = args;
    if (value.type === 'string') return num(value.value.length);
    return num(expectSequence('len', value).length);
  },

  abs: (args) => {
    expectArgs('abs', args, 1);
    const [value] = args;
    if (value.type === 'decimal') return { type: 'decimal', value: value.value.abs() };
    return num(Math.abs(toNumber(value)));
  },

  round: (args) => {
    expectArgs('round', args, 1, 2);
    const [value] = args;
    const decimals = args.length > 1 ? Math.trunc(toNumber(args[1])) : 0;
    if (value.type === 'decimal') {
      return { type: 'decimal', value: value.value.toDecimalPlaces(decimals, Decimal.ROUND_HALF_UP) };
    }
    const mult = Math.pow(10, decimals);
    return num(Math.round(toNumber(value) * mult) / mult);
  },

  clamp: (args) => {
    expectArgs('clamp', args, 3);
    const [value, min, max] = args.map(toNumber);
    return num(Math.max(min, Math.min(max, value)));
  },

  in_range: (args) => {
    expectArgs('in_range', args, 3);
    const [value, min, max] = args.map(toNumber);
    return bool(value >= min && value <= max);
  },

  is_null: (args) => {
    expectArgs('is_null', args, 1);
    return bool(args[0].type === 'null');
  },

  map: (args, ctx) => {
    expectArgs('map', args, 2);
    const items = expectSequence('map', args[0]);
    const fn = expectCallable('map', args[1]);
    return arr(items.map((item) => ctx.invoke(fn, [item])));
  },

  filter: (args, ctx) => {
    expectArgs('filter', args, 2);
    const items = expectSequence('filter', args[0]);
    const fn = expectCallable('filter', args[1]);
    return arr(items.filter((item) => truthy(ctx.invoke(fn, [item]))));
  },

  reduce: (args, ctx) => {
    expectArgs('reduce', args, 2, 3);
    const items = expectSequence('reduce', args[0]);
    const fn = expectCallable('reduce', args[1]);
    if (fn.type === 'lambda' && fn.params.length !== 2) {
      throw RuntimeError.typeError('reduce: lambda must take 2 parameters');
    }

    const hasInit = args.length === 3;
    if (items.length === 0) {
      if (!hasInit) throw RuntimeError.typeError('reduce of empty array needs an initial value');
      return args[2];
    }

    let acc = hasInit ? args[2] : items[0];
    for (const item of items.slice(hasInit ? 0 : 1)) {
      acc = ctx.invoke(fn, [acc, item]);
    }
    return acc;
  },

  ref,
  offset: ref,
  past,
  window,

  print: (args, ctx) => {
    ctx.print(args.map(valueToText).join(' '));
    return NULL;
  },
};
