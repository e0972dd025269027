/**
 * Technical indicator builtins
 *
 * Uses the technicalindicators library for mathematically correct,
 * industry-standard indicator calculations. Each builtin returns the
 * indicator value at the last element of its input series.
 *
 * @see https://github.com/anandanand84/technicalindicators
 */
import {
  EMA as EMALib,
  SMA as SMALib,
  RSI as RSILib,
  MACD as MACDLib,
  BollingerBands as BollingerBandsLib,
  ATR as ATRLib,
  Stochastic as StochasticLib,
} from 'technicalindicators';
import { Value } from '../spec/types';
import { RuntimeError } from '../runtime/errors';
import { NULL, arr, num, sequenceItems, toNumber } from '../runtime/values';
import type { BuiltinFunction } from '../runtime/builtins';

// ============================================================================
// Helper Functions for Data Extraction
// ============================================================================

/**
 * Numeric series from an array or slice argument. Null elements read as 0.
 */
function extractSeries(value: Value, fn: string, position: string): number[] {
  const items = sequenceItems(value);
  if (!items) {
    throw RuntimeError.typeError(`${fn}: ${position} argument must be an array`);
  }
  return items.map(toNumber);
}

function extractPeriod(value: Value, fn: string): number {
  const period = Math.trunc(toNumber(value));
  if (period < 1) {
    throw RuntimeError.typeError(`${fn}: period must be at least 1`);
  }
  return period;
}

function expectArgs(fn: string, args: Value[], count: number): void {
  if (args.length !== count) {
    throw RuntimeError.argumentMismatch(`${fn} expects ${count} args, got ${args.length}`);
  }
}

function orNull(value: number | undefined): Value {
  return value === undefined || !Number.isFinite(value) ? NULL : num(value);
}

const NULL_TRIPLE = (): Value => arr([NULL, NULL, NULL]);

// ============================================================================
// SMA (Simple Moving Average)
// ============================================================================

export function computeSMA(values: number[], period: number): number | undefined {
  if (values.length < period) return undefined;

  const result = SMALib.calculate({ period, values });
  return result[result.length - 1];
}

// ============================================================================
// EMA (Exponential Moving Average)
// ============================================================================

export function computeEMA(values: number[], period: number): number | undefined {
  if (values.length === 0) return undefined;

  if (values.length < period) {
    // Insufficient data: use simple average as fallback
    return values.reduce((a, b) => a + b, 0) / values.length;
  }

  const result = EMALib.calculate({ period, values });
  return result[result.length - 1];
}

// ============================================================================
// RSI (Relative Strength Index)
// ============================================================================

export function computeRSI(values: number[], period: number): number | undefined {
  if (values.length < period + 1) return undefined;

  const result = RSILib.calculate({ period, values });
  return result[result.length - 1];
}

// ============================================================================
// MACD (Moving Average Convergence Divergence)
// ============================================================================

export interface MACDResult {
  macd?: number;
  signal?: number;
  histogram?: number;
}

export function computeMACD(
  values: number[],
  fastPeriod: number,
  slowPeriod: number,
  signalPeriod: number
): MACDResult | undefined {
  if (values.length < slowPeriod) return undefined;

  const result = MACDLib.calculate({
    fastPeriod,
    slowPeriod,
    signalPeriod,
    SimpleMAOscillator: false,
    SimpleMASignal: false,
    values,
  });

  const last = result[result.length - 1];
  if (!last) return undefined;
  return {
    macd: last.MACD,
    signal: last.signal,
    histogram: last.histogram,
  };
}

// ============================================================================
// Bollinger Bands
// ============================================================================

export interface BollingerBandsResult {
  upper: number;
  middle: number;
  lower: number;
}

export function computeBollingerBands(
  values: number[],
  period: number,
  stdDevMultiplier: number
): BollingerBandsResult | undefined {
  if (values.length < period) return undefined;

  const result = BollingerBandsLib.calculate({
    period,
    stdDev: stdDevMultiplier,
    values,
  });

  const last = result[result.length - 1];
  if (!last) return undefined;
  return { upper: last.upper, middle: last.middle, lower: last.lower };
}

// ============================================================================
// ATR (Average True Range)
// ============================================================================

export function computeATR(
  high: number[],
  low: number[],
  close: number[],
  period: number
): number | undefined {
  const length = Math.min(high.length, low.length, close.length);
  if (length < period + 1) return undefined;

  const result = ATRLib.calculate({
    period,
    high: high.slice(-length),
    low: low.slice(-length),
    close: close.slice(-length),
  });
  return result[result.length - 1];
}

// ============================================================================
// KDJ (Stochastic with smoothed K and D)
// ============================================================================

export interface KDJResult {
  k: number;
  d: number;
  j: number;
}

/**
 * Raw %K from the stochastic oscillator, K = SMA(raw, m1), D = SMA(K, m2), J = 3K - 2D.
 * A flat range (high == low) reads as 50.
 */
export function computeKDJ(
  high: number[],
  low: number[],
  close: number[],
  n: number,
  m1: number,
  m2: number
): KDJResult | undefined {
  const length = Math.min(high.length, low.length, close.length);
  if (length < n) return undefined;

  const stochastic = StochasticLib.calculate({
    period: n,
    signalPeriod: 1,
    high: high.slice(-length),
    low: low.slice(-length),
    close: close.slice(-length),
  });
  const rawK = stochastic.map((point) => (Number.isFinite(point.k) ? point.k : 50));

  const kSeries = rawK.length >= m1 ? SMALib.calculate({ period: m1, values: rawK }) : [];
  const dSeries = kSeries.length >= m2 ? SMALib.calculate({ period: m2, values: kSeries }) : [];

  const k = kSeries[kSeries.length - 1];
  const d = dSeries[dSeries.length - 1];
  if (k === undefined || d === undefined) return undefined;
  return { k, d, j: 3 * k - 2 * d };
}

// ============================================================================
// Builtin bindings
// ============================================================================

export const INDICATOR_BUILTINS: Record<string, BuiltinFunction> = {
  SMA: (args) => {
    expectArgs('SMA', args, 2);
    return orNull(computeSMA(extractSeries(args[0], 'SMA', 'first'), extractPeriod(args[1], 'SMA')));
  },

  EMA: (args) => {
    expectArgs('EMA', args, 2);
    return orNull(computeEMA(extractSeries(args[0], 'EMA', 'first'), extractPeriod(args[1], 'EMA')));
  },

  RSI: (args) => {
    expectArgs('RSI', args, 2);
    return orNull(computeRSI(extractSeries(args[0], 'RSI', 'first'), extractPeriod(args[1], 'RSI')));
  },

  MACD: (args) => {
    expectArgs('MACD', args, 4);
    const result = computeMACD(
      extractSeries(args[0], 'MACD', 'first'),
      extractPeriod(args[1], 'MACD'),
      extractPeriod(args[2], 'MACD'),
      extractPeriod(args[3], 'MACD')
    );
    if (!result) return NULL_TRIPLE();
    return arr([orNull(result.macd), orNull(result.signal), orNull(result.histogram)]);
  },

  BOLL: (args) => {
    expectArgs('BOLL', args, 3);
    const result = computeBollingerBands(
      extractSeries(args[0], 'BOLL', 'first'),
      extractPeriod(args[1], 'BOLL'),
      toNumber(args[2])
    );
    if (!result) return NULL_TRIPLE();
    return arr([num(result.upper), num(result.middle), num(result.lower)]);
  },

  ATR: (args) => {
    expectArgs('ATR', args, 4);
    return orNull(
      computeATR(
        extractSeries(args[0], 'ATR', 'first'),
        extractSeries(args[1], 'ATR', 'second'),
        extractSeries(args[2], 'ATR', 'third'),
        extractPeriod(args[3], 'ATR')
      )
    );
  },

  KDJ: (args) => {
    expectArgs('KDJ', args, 6);
    const result = computeKDJ(
      extractSeries(args[0], 'KDJ', 'first'),
      extractSeries(args[1], 'KDJ', 'second'),
      extractSeries(args[2], 'KDJ', 'third'),
      extractPeriod(args[3], 'KDJ'),
      extractPeriod(args[4], 'KDJ'),
      extractPeriod(args[5], 'KDJ')
    );
    if (!result) return NULL_TRIPLE();
    return arr([num(result.k), num(result.d), num(result.j)]);
  },
};
