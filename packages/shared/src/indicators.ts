import { InsufficientDataError } from "./errors";
import type { OhlcBar } from "./types";
import { FIB_RATIOS, type FibLevels, type IndicatorSet } from "./types/signals";

export const INDICATOR_WINDOWS = {
  emaFast: 9,
  emaSlow: 21,
  rsi: 14,
  bollinger: 20,
  bollingerK: 2,
  smaFast: 50,
  smaSlow: 200,
  fibLookback: 25,
} as const;

// The slow SMA is the largest window; two bars are the floor for cross detection
export const MIN_BARS = Math.max(INDICATOR_WINDOWS.smaSlow, 2);

/**
 * Calculate EMA (Exponential Moving Average) for a series of values.
 *
 * @param values - Close prices, oldest first
 * @param n - Period for EMA calculation
 * @returns Array of EMA values (NaN for warmup period)
 *
 * Seeded with the first value and smoothed by 2/(n+1); the first (n-1)
 * entries are NaN even though the recursion runs through them.
 */
export function emaBatch(values: readonly number[], n: number): number[] {
  if (values.length === 0 || n <= 0) return [];

  const result: number[] = new Array(values.length);
  const multiplier = 2 / (n + 1);
  let prev = NaN;

  for (let i = 0; i < values.length; i++) {
    const value = values[i] ?? NaN;
    prev = i === 0 ? value : (value - prev) * multiplier + prev;
    result[i] = i < n - 1 ? NaN : prev;
  }

  return result;
}

/**
 * Calculate Simple Moving Average over a trailing window.
 *
 * @returns Array of SMA values (NaN for warmup period)
 */
export function smaBatch(values: readonly number[], period: number): number[] {
  if (values.length === 0 || period <= 0) return [];

  const result: number[] = new Array(values.length);

  for (let i = 0; i < values.length; i++) {
    if (i < period - 1) {
      result[i] = NaN;
      continue;
    }

    let sum = 0;
    for (let j = i - period + 1; j <= i; j++) {
      sum += values[j] ?? NaN;
    }
    result[i] = sum / period;
  }

  return result;
}

/**
 * Calculate RSI (Relative Strength Index) with Wilder smoothing.
 *
 * @param values - Close prices, oldest first
 * @param n - Smoothing period (default 14)
 * @returns Array of RSI values in [0, 100] (NaN for warmup period)
 *
 * Average gain/loss use alpha = 1/n. The first bar has no predecessor and
 * counts as a zero change. An average loss of zero yields 100.
 */
export function rsiBatch(values: readonly number[], n: number = 14): number[] {
  if (values.length === 0 || n <= 0) return [];

  const result: number[] = new Array(values.length);
  const alpha = 1 / n;
  let avgGain = 0;
  let avgLoss = 0;

  for (let i = 0; i < values.length; i++) {
    const delta = i === 0 ? 0 : (values[i] ?? NaN) - (values[i - 1] ?? NaN);
    const gain = delta > 0 ? delta : 0;
    const loss = delta < 0 ? -delta : 0;

    if (i === 0) {
      avgGain = gain;
      avgLoss = loss;
    } else {
      avgGain += alpha * (gain - avgGain);
      avgLoss += alpha * (loss - avgLoss);
    }

    if (i < n - 1) {
      result[i] = NaN;
    } else {
      result[i] = avgLoss === 0 ? 100 : 100 - 100 / (1 + avgGain / avgLoss);
    }
  }

  return result;
}

export interface BollingerBands {
  mid: number;
  upper: number;
  lower: number;
}

/**
 * Calculate Bollinger Bands for a series of values.
 *
 * @param values - Close prices, oldest first
 * @param period - Period for SMA and standard deviation (default 20)
 * @param stdDev - Number of standard deviations (default 2)
 * @returns Array of Bollinger Band values (NaN for warmup period)
 *
 * Uses the population standard deviation of the window.
 */
export function bollingerBatch(
  values: readonly number[],
  period: number = 20,
  stdDev: number = 2,
): BollingerBands[] {
  if (values.length === 0 || period <= 0) return [];

  const result: BollingerBands[] = new Array(values.length);

  for (let i = 0; i < values.length; i++) {
    if (i < period - 1) {
      result[i] = { mid: NaN, upper: NaN, lower: NaN };
      continue;
    }

    let sum = 0;
    for (let j = i - period + 1; j <= i; j++) {
      sum += values[j] ?? NaN;
    }
    const sma = sum / period;

    let variance = 0;
    for (let j = i - period + 1; j <= i; j++) {
      const diff = (values[j] ?? NaN) - sma;
      variance += diff * diff;
    }
    const sd = Math.sqrt(variance / period);

    result[i] = {
      mid: sma,
      upper: sma + stdDev * sd,
      lower: sma - stdDev * sd,
    };
  }

  return result;
}

/**
 * Retracement levels between a swing high and low.
 * Returns null for a flat (or non-finite) swing.
 */
export function fibFromSwing(swingHigh: number, swingLow: number): FibLevels | null {
  if (!Number.isFinite(swingHigh) || !Number.isFinite(swingLow) || swingHigh === swingLow) {
    return null;
  }

  const diff = swingHigh - swingLow;

  return {
    "23.6%": swingHigh - diff * FIB_RATIOS["23.6%"],
    "38.2%": swingHigh - diff * FIB_RATIOS["38.2%"],
    "50%": swingHigh - diff * FIB_RATIOS["50%"],
    "61.8%": swingHigh - diff * FIB_RATIOS["61.8%"],
    "78.6%": swingHigh - diff * FIB_RATIOS["78.6%"],
  };
}

/**
 * Fibonacci retracement levels for the last swing: highest high and lowest
 * low over the trailing `lookback` bars.
 */
export function fibonacciLevels(
  bars: readonly OhlcBar[],
  lookback: number = INDICATOR_WINDOWS.fibLookback,
): FibLevels | null {
  const window = bars.slice(-lookback);
  if (window.length === 0) return null;

  let swingHigh = -Infinity;
  let swingLow = Infinity;
  for (const bar of window) {
    if (bar.high > swingHigh) swingHigh = bar.high;
    if (bar.low < swingLow) swingLow = bar.low;
  }

  return fibFromSwing(swingHigh, swingLow);
}

function valueAt(series: readonly number[], index: number): number {
  return series[index] ?? NaN;
}

/**
 * Indicator snapshot at the latest bar.
 *
 * @throws InsufficientDataError when fewer than MIN_BARS bars are present
 */
export function computeIndicators(bars: readonly OhlcBar[]): IndicatorSet {
  if (bars.length < MIN_BARS) {
    throw new InsufficientDataError(MIN_BARS, bars.length);
  }

  const closes = bars.map((bar) => bar.close);
  const last = closes.length - 1;

  const smaFast = smaBatch(closes, INDICATOR_WINDOWS.smaFast);
  const smaSlow = smaBatch(closes, INDICATOR_WINDOWS.smaSlow);
  const bands = bollingerBatch(closes, INDICATOR_WINDOWS.bollinger, INDICATOR_WINDOWS.bollingerK);

  return {
    ema9: valueAt(emaBatch(closes, INDICATOR_WINDOWS.emaFast), last),
    ema21: valueAt(emaBatch(closes, INDICATOR_WINDOWS.emaSlow), last),
    rsi: valueAt(rsiBatch(closes, INDICATOR_WINDOWS.rsi), last),
    bbHigh: bands[last]?.upper ?? NaN,
    bbLow: bands[last]?.lower ?? NaN,
    sma50: valueAt(smaFast, last),
    sma200: valueAt(smaSlow, last),
    sma50Prev: valueAt(smaFast, last - 1),
    sma200Prev: valueAt(smaSlow, last - 1),
  };
}
