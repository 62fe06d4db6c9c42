// Timeframe vocabulary shared by config, the data provider and the HTTP surface

export const TIMEFRAMES = ["5m", "15m", "30m", "1h", "1d", "1wk"] as const;

export type Timeframe = (typeof TIMEFRAMES)[number];

export const DEFAULT_TIMEFRAME: Timeframe = "1d";

// Lookback range per timeframe, sized so an active market yields at least 200 bars.
// Intraday intervals are capped by the provider at 60 days of history.
export const TIMEFRAME_LOOKBACK = {
  "5m": "60d",
  "15m": "60d",
  "30m": "60d",
  "1h": "60d",
  "1d": "1y",
  "1wk": "5y",
} as const satisfies Record<Timeframe, string>;
