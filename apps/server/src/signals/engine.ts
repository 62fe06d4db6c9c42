import type { Timeframe } from "@shared/types/market";
import {
  FIB_LABELS,
  type FibLevels,
  type IndicatorSet,
  type SignalKind,
  type TradePlan,
} from "@shared/types/signals";

export const SIGNAL_RULES = {
  fibTolerance: 0.005,
  rsiOversold: 35,
  rsiOverbought: 65,
  // Multipliers on price: 2% stop, 4% target
  buyStop: 0.98,
  buyTarget: 1.04,
  sellStop: 1.02,
  sellTarget: 0.96,
} as const;

export const CONFLUENCE_TAGS = {
  goldenCross: "Golden Cross (Bullish)",
  deathCross: "Death Cross (Bearish)",
  buy: ["RSI oversold", "Price at Lower BB", "EMA9 > EMA21"],
  sell: ["RSI overbought", "Price at Upper BB", "EMA9 < EMA21"],
} as const;

export function fibTag(label: string): string {
  return `Price at ${label} Fib Level`;
}

export interface SignalInput {
  symbol: string;
  timeframe: Timeframe;
  price: number;
  indicators: IndicatorSet;
  fib: FibLevels | null;
}

/**
 * Apply the confluence ruleset to one indicator snapshot.
 *
 * Order matters: cross tags, then fib proximity, then the directional setup.
 * Returns null when no evidence was collected at all. A HOLD carrying only
 * cross or fib tags is still a plan (informational alert).
 */
export function evaluateSignal(input: SignalInput): TradePlan | null {
  const { symbol, timeframe, price, indicators: ind, fib } = input;
  const confluence: string[] = [];

  if (ind.sma50 > ind.sma200 && ind.sma50Prev < ind.sma200Prev) {
    confluence.push(CONFLUENCE_TAGS.goldenCross);
  } else if (ind.sma50 < ind.sma200 && ind.sma50Prev > ind.sma200Prev) {
    confluence.push(CONFLUENCE_TAGS.deathCross);
  }

  if (fib) {
    for (const label of FIB_LABELS) {
      if (Math.abs(price - fib[label]) / price < SIGNAL_RULES.fibTolerance) {
        confluence.push(fibTag(label));
      }
    }
  }

  let signal: SignalKind = "HOLD";
  let stopLoss: number | undefined;
  let takeProfit: number | undefined;

  if (ind.ema9 > ind.ema21 && ind.rsi < SIGNAL_RULES.rsiOversold && price <= ind.bbLow) {
    signal = "PRO_BUY";
    stopLoss = price * SIGNAL_RULES.buyStop;
    takeProfit = price * SIGNAL_RULES.buyTarget;
    confluence.push(...CONFLUENCE_TAGS.buy);
  } else if (ind.ema9 < ind.ema21 && ind.rsi > SIGNAL_RULES.rsiOverbought && price >= ind.bbHigh) {
    signal = "PRO_SELL";
    stopLoss = price * SIGNAL_RULES.sellStop;
    takeProfit = price * SIGNAL_RULES.sellTarget;
    confluence.push(...CONFLUENCE_TAGS.sell);
  }

  if (confluence.length === 0) return null;

  const plan: TradePlan = {
    symbol,
    timeframe,
    signal,
    price,
    entry: price,
    confluence: Object.freeze(confluence),
  };
  if (stopLoss !== undefined) plan.stopLoss = stopLoss;
  if (takeProfit !== undefined) plan.takeProfit = takeProfit;

  return Object.freeze(plan);
}
