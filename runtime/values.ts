/**
 * Value Model
 * Constructors, coercions and the arithmetic/comparison/broadcast rules
 * shared by the evaluator and builtins.
 */

import Decimal from 'decimal.js';
import { Parameter, Row, Value } from '../spec/types';
import { RuntimeError } from './errors';

// ============================================================================
// Constructors
// ============================================================================

export const NULL: Value = { type: 'null' };

export function num(value: number): Value {
  return { type: 'number', value };
}

export function dec(value: Decimal.Value): Value {
  return { type: 'decimal', value: new Decimal(value) };
}

export function str(value: string): Value {
  return { type: 'string', value };
}

export function bool(value: boolean): Value {
  return { type: 'bool', value };
}

export function arr(items: Value[]): Value {
  return { type: 'array', items };
}

// ============================================================================
// Inspection
// ============================================================================

export function isSequence(value: Value): boolean {
  return value.type === 'array' || value.type === 'slice';
}

/**
 * Materialize the elements of an array or slice. Returns undefined for scalars.
 */
export function sequenceItems(value: Value): Value[] | undefined {
  if (value.type === 'array') {
    return value.items;
  }
  if (value.type === 'slice') {
    const items: Value[] = [];
    for (let i = 0; i < value.length; i++) {
      items.push(value.column[value.start + i] ?? NULL);
    }
    return items;
  }
  return undefined;
}

export function truthy(value: Value): boolean {
  switch (value.type) {
    case 'bool':
      return value.value;
    case 'null':
      return false;
    case 'number':
      return value.value !== 0;
    case 'decimal':
      return !value.value.isZero();
    case 'string':
      return value.value.length > 0;
    case 'array':
      return value.items.length > 0;
    case 'slice':
      return value.length > 0;
    case 'lambda':
    case 'function':
      return true;
  }
}

// ============================================================================
// Coercions
// ============================================================================

/**
 * Numeric view used by builtins. Null reads as 0; use is_null to tell them apart.
 */
export function toNumber(value: Value): number {
  switch (value.type) {
    case 'number':
      return value.value;
    case 'decimal':
      return value.value.toNumber();
    case 'bool':
      return value.value ? 1 : 0;
    case 'null':
      return 0;
    case 'string': {
      const parsed = Number(value.value.trim());
      if (value.value.trim() === '' || Number.isNaN(parsed)) {
        throw RuntimeError.typeError(`Cannot convert "${value.value}" to number`);
      }
      return parsed;
    }
    default:
      throw RuntimeError.typeError(`Cannot convert ${value.type} to number`);
  }
}

export function toDecimal(value: Value): Decimal {
  switch (value.type) {
    case 'decimal':
      return value.value;
    case 'number':
      if (!Number.isFinite(value.value)) {
        throw RuntimeError.typeError(`Cannot convert ${value.value} to decimal`);
      }
      return new Decimal(value.value);
    case 'bool':
      return new Decimal(value.value ? 1 : 0);
    case 'string':
      try {
        return new Decimal(value.value.trim());
      } catch {
        throw RuntimeError.typeError(`Cannot convert "${value.value}" to decimal`);
      }
    default:
      throw RuntimeError.typeError(`Cannot convert ${value.type} to decimal`);
  }
}

/**
 * Round to `scale` decimal places, banker's rounding.
 */
export function applyPrecision(value: Value, scale: number): Value {
  return {
    type: 'decimal',
    value: toDecimal(value).toDecimalPlaces(scale, Decimal.ROUND_HALF_EVEN),
  };
}

// ============================================================================
// Broadcasting
// ============================================================================

type ScalarOp = (a: Value, b: Value) => Value;

/**
 * Apply `op` element-wise when either side is an array or slice.
 * Array-op-array requires equal length; a scalar is spread across the other side.
 */
function broadcast(a: Value, b: Value, op: ScalarOp, symbol: string): Value {
  const left = sequenceItems(a);
  const right = sequenceItems(b);

  if (left && right) {
    if (left.length !== right.length) {
      throw RuntimeError.typeError(
        `Array length mismatch for '${symbol}': ${left.length} vs ${right.length}`
      );
    }
    return arr(left.map((item, i) => broadcast(item, right[i], op, symbol)));
  }
  if (left) {
    return arr(left.map((item) => broadcast(item, b, op, symbol)));
  }
  if (right) {
    return arr(right.map((item) => broadcast(a, item, op, symbol)));
  }
  return op(a, b);
}

function mismatch(symbol: string, a: Value, b: Value): RuntimeError {
  return RuntimeError.typeError(`Cannot apply '${symbol}' to ${a.type} and ${b.type}`);
}

/**
 * Pair two numeric scalars. A number meeting a decimal is promoted.
 */
function numericPair(
  a: Value,
  b: Value
): { kind: 'number'; a: number; b: number } | { kind: 'decimal'; a: Decimal; b: Decimal } | undefined {
  if (a.type === 'number' && b.type === 'number') {
    return { kind: 'number', a: a.value, b: b.value };
  }
  const aNumeric = a.type === 'number' || a.type === 'decimal';
  const bNumeric = b.type === 'number' || b.type === 'decimal';
  if (aNumeric && bNumeric) {
    return { kind: 'decimal', a: toDecimal(a), b: toDecimal(b) };
  }
  return undefined;
}

function arithmetic(
  symbol: string,
  numberOp: (a: number, b: number) => number,
  decimalOp: (a: Decimal, b: Decimal) => Decimal,
  zeroCheck = false
): ScalarOp {
  return (a, b) => {
    const pair = numericPair(a, b);
    if (!pair) {
      throw mismatch(symbol, a, b);
    }
    if (pair.kind === 'number') {
      if (zeroCheck && pair.b === 0) {
        throw RuntimeError.zeroDivision();
      }
      return num(numberOp(pair.a, pair.b));
    }
    if (zeroCheck && pair.b.isZero()) {
      throw RuntimeError.zeroDivision();
    }
    return { type: 'decimal', value: decimalOp(pair.a, pair.b) };
  };
}

const addScalar = arithmetic('+', (x, y) => x + y, (x, y) => x.plus(y));
const subScalar = arithmetic('-', (x, y) => x - y, (x, y) => x.minus(y));
const mulScalar = arithmetic('*', (x, y) => x * y, (x, y) => x.times(y));
const divScalar = arithmetic('/', (x, y) => x / y, (x, y) => x.dividedBy(y), true);
const modScalar = arithmetic('%', (x, y) => x % y, (x, y) => x.modulo(y), true);
const powScalar = arithmetic('^', (x, y) => Math.pow(x, y), (x, y) => x.pow(y));

// ============================================================================
// Arithmetic
// ============================================================================

export function add(a: Value, b: Value): Value {
  return broadcast(
    a,
    b,
    (x, y) => (x.type === 'string' && y.type === 'string' ? str(x.value + y.value) : addScalar(x, y)),
    '+'
  );
}

export function sub(a: Value, b: Value): Value {
  return broadcast(a, b, subScalar, '-');
}

export function mul(a: Value, b: Value): Value {
  return broadcast(a, b, mulScalar, '*');
}

export function div(a: Value, b: Value): Value {
  return broadcast(a, b, divScalar, '/');
}

export function mod(a: Value, b: Value): Value {
  return broadcast(a, b, modScalar, '%');
}

export function pow(a: Value, b: Value): Value {
  return broadcast(a, b, powScalar, '^');
}

export function neg(value: Value): Value {
  const items = sequenceItems(value);
  if (items) {
    return arr(items.map(neg));
  }
  if (value.type === 'number') {
    return num(-value.value);
  }
  if (value.type === 'decimal') {
    return { type: 'decimal', value: value.value.negated() };
  }
  throw RuntimeError.typeError(`Cannot negate ${value.type}`);
}

// ============================================================================
// Comparison
// ============================================================================

function gtScalar(a: Value, b: Value): Value {
  if (a.type === 'string' && b.type === 'string') {
    return bool(a.value > b.value);
  }
  const pair = numericPair(a, b);
  if (!pair) {
    throw mismatch('>', a, b);
  }
  return bool(pair.kind === 'number' ? pair.a > pair.b : pair.a.greaterThan(pair.b));
}

export function gt(a: Value, b: Value): Value {
  return broadcast(a, b, gtScalar, '>');
}

export function lt(a: Value, b: Value): Value {
  return gt(b, a);
}

export function gte(a: Value, b: Value): Value {
  return broadcast(a, b, (x, y) => bool(truthy(gtScalar(x, y)) || valuesEqual(x, y)), '>=');
}

export function lte(a: Value, b: Value): Value {
  return broadcast(a, b, (x, y) => bool(truthy(gtScalar(y, x)) || valuesEqual(x, y)), '<=');
}

/**
 * Structural equality over whole values; numbers and decimals compare by value.
 */
export function valuesEqual(a: Value, b: Value): boolean {
  const pair = numericPair(a, b);
  if (pair) {
    return pair.kind === 'number' ? pair.a === pair.b : pair.a.equals(pair.b);
  }

  const left = sequenceItems(a);
  const right = sequenceItems(b);
  if (left && right) {
    return left.length === right.length && left.every((item, i) => valuesEqual(item, right[i]));
  }

  switch (a.type) {
    case 'null':
      return b.type === 'null';
    case 'string':
      return b.type === 'string' && a.value === b.value;
    case 'bool':
      return b.type === 'bool' && a.value === b.value;
    case 'lambda':
      return a === b;
    case 'function':
      return b.type === 'function' && a.def === b.def;
    default:
      return false;
  }
}

export function eq(a: Value, b: Value): Value {
  return bool(valuesEqual(a, b));
}

export function neq(a: Value, b: Value): Value {
  return bool(!valuesEqual(a, b));
}

// ============================================================================
// Logic
// ============================================================================

export function and(a: Value, b: Value): Value {
  return broadcast(a, b, (x, y) => bool(truthy(x) && truthy(y)), 'and');
}

export function or(a: Value, b: Value): Value {
  return broadcast(a, b, (x, y) => bool(truthy(x) || truthy(y)), 'or');
}

export function not(value: Value): Value {
  const items = sequenceItems(value);
  if (items) {
    return arr(items.map((item) => bool(!truthy(item))));
  }
  return bool(!truthy(value));
}

// ============================================================================
// Formatting
// ============================================================================

/**
 * Display form: strings are quoted.
 */
export function formatValue(value: Value): string {
  switch (value.type) {
    case 'number':
      return String(value.value);
    case 'decimal':
      return value.value.toFixed();
    case 'string':
      return JSON.stringify(value.value);
    case 'bool':
      return value.value ? 'true' : 'false';
    case 'null':
      return 'null';
    case 'array':
    case 'slice':
      return `[${(sequenceItems(value) ?? []).map(formatValue).join(', ')}]`;
    case 'lambda':
      return `<lambda(${value.params.join(', ')})>`;
    case 'function':
      return `<function ${value.def.name}>`;
  }
}

/**
 * Print form: like formatValue but top-level strings are bare.
 */
export function valueToText(value: Value): string {
  return value.type === 'string' ? value.value : formatValue(value);
}

// ============================================================================
// JS interop
// ============================================================================

export type PlainValue = number | string | boolean | null | PlainValue[];

/**
 * Convert to plain JS. Decimals become strings so no precision is lost.
 */
export function toJS(value: Value): PlainValue {
  switch (value.type) {
    case 'number':
    case 'string':
    case 'bool':
      return value.value;
    case 'decimal':
      return value.value.toFixed();
    case 'null':
      return null;
    case 'array':
    case 'slice':
      return (sequenceItems(value) ?? []).map(toJS);
    case 'lambda':
    case 'function':
      return formatValue(value);
  }
}

export function fromJS(input: unknown): Value {
  if (input === null || input === undefined) {
    return NULL;
  }
  if (typeof input === 'number') {
    return num(input);
  }
  if (typeof input === 'string') {
    return str(input);
  }
  if (typeof input === 'boolean') {
    return bool(input);
  }
  if (Decimal.isDecimal(input)) {
    return { type: 'decimal', value: new Decimal(input) };
  }
  if (Array.isArray(input)) {
    return arr(input.map(fromJS));
  }
  throw RuntimeError.typeError(`Unsupported input value: ${typeof input}`);
}

/**
 * Build a row from a plain record, coercing declared decimal and number columns.
 */
export function rowFromRecord(record: Record<string, unknown>, params: Parameter[] = []): Row {
  const row: Row = new Map();
  for (const [key, raw] of Object.entries(record)) {
    row.set(key, fromJS(raw));
  }
  for (const param of params) {
    const current = row.get(param.name);
    if (!current || current.type === 'null') {
      continue;
    }
    if (param.paramType === 'decimal' && current.type !== 'decimal') {
      row.set(param.name, { type: 'decimal', value: toDecimal(current) });
    } else if (param.paramType === 'number' && current.type !== 'number') {
      row.set(param.name, num(toNumber(current)));
    }
  }
  return row;
}

export function rowToRecord(row: Row): Record<string, PlainValue> {
  const record: Record<string, PlainValue> = {};
  for (const [key, value] of row) {
    record[key] = toJS(value);
  }
  return record;
}
