import { DataUnavailableError, InsufficientDataError } from "@shared/errors";
import { computeIndicators, fibonacciLevels } from "@shared/indicators";
import type { Timeframe } from "@shared/types/market";
import type { TradePlan } from "@shared/types/signals";

import type { MarketDataProvider } from "../market/provider";

import { evaluateSignal } from "./engine";

export type NoSignalReason = "no-confluence" | "data-unavailable" | "insufficient-data";

export type AnalysisOutcome =
  | { status: "plan"; plan: TradePlan }
  | { status: "no-signal"; reason: NoSignalReason; detail?: string };

/**
 * Fetch, compute and evaluate one instrument.
 *
 * Missing or short data downgrades to a no-signal outcome; anything else
 * propagates to the caller.
 */
export async function analyzeSymbol(
  provider: MarketDataProvider,
  symbol: string,
  timeframe: Timeframe,
): Promise<AnalysisOutcome> {
  try {
    const series = await provider.fetchSeries(symbol, timeframe);
    const indicators = computeIndicators(series.bars);
    const last = series.bars[series.bars.length - 1];
    if (!last) {
      return { status: "no-signal", reason: "insufficient-data" };
    }

    const plan = evaluateSignal({
      symbol,
      timeframe,
      price: last.close,
      indicators,
      fib: fibonacciLevels(series.bars),
    });

    return plan ? { status: "plan", plan } : { status: "no-signal", reason: "no-confluence" };
  } catch (err) {
    if (err instanceof DataUnavailableError) {
      return { status: "no-signal", reason: "data-unavailable", detail: err.message };
    }
    if (err instanceof InsufficientDataError) {
      return { status: "no-signal", reason: "insufficient-data", detail: err.message };
    }
    throw err;
  }
}
