import type { Timeframe } from "./market";

export type SignalKind = "HOLD" | "PRO_BUY" | "PRO_SELL";

/** Scalar snapshot of every indicator at the latest bar. */
export interface IndicatorSet {
  ema9: number;
  ema21: number;
  rsi: number;
  bbHigh: number;
  bbLow: number;
  sma50: number;
  sma200: number;
  // Previous bar; NaN when the series is exactly one window long
  sma50Prev: number;
  sma200Prev: number;
}

export const FIB_RATIOS = {
  "23.6%": 0.236,
  "38.2%": 0.382,
  "50%": 0.5,
  "61.8%": 0.618,
  "78.6%": 0.786,
} as const;

export type FibLabel = keyof typeof FIB_RATIOS;

export type FibLevels = Record<FibLabel, number>;

export interface TradePlan {
  symbol: string;
  timeframe: Timeframe;
  signal: SignalKind;
  price: number;
  entry: number;
  stopLoss?: number;
  takeProfit?: number;
  confluence: readonly string[];
}

// Display and evaluation order of the retracement levels
export const FIB_LABELS: readonly FibLabel[] = ["23.6%", "38.2%", "50%", "61.8%", "78.6%"];
