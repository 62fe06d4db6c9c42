import type { TimeSeries } from "@shared/types";
import type { Timeframe } from "@shared/types/market";

/**
 * Source of price history for the analysis pipeline.
 *
 * Implementations reject with DataUnavailableError when nothing usable comes
 * back (closed market, unknown symbol, transport error, timeout). They do not
 * retry.
 */
export interface MarketDataProvider {
  fetchSeries(symbol: string, timeframe: Timeframe): Promise<TimeSeries>;
}
