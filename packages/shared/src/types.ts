import type { Timeframe } from "./types/market";

export interface OhlcBar {
  timestamp: number; // bar open, epoch ms
  open: number;
  high: number;
  low: number;
  close: number;
  volume: number;
}

/**
 * Ordered bars for one symbol and timeframe.
 * Timestamps are strictly increasing; see `normalizeBars`.
 */
export interface TimeSeries {
  symbol: string;
  timeframe: Timeframe;
  bars: readonly OhlcBar[];
}
