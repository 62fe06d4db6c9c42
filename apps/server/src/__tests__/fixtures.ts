import { DataUnavailableError, NotifierError } from "@shared/errors";
import type { OhlcBar, TimeSeries } from "@shared/types";
import type { Timeframe } from "@shared/types/market";
import type { IndicatorSet } from "@shared/types/signals";

import type { MarketDataProvider } from "../market/provider";
import type { Accent, Notifier } from "../notify/types";

const T0 = 1_700_000_000_000;

/** Bars whose high and low equal the close. */
export function flatBars(closes: readonly number[]): OhlcBar[] {
  return closes.map((close, i) => ({
    timestamp: T0 + i * 3_600_000,
    open: close,
    high: close,
    low: close,
    close,
    volume: 1000,
  }));
}

/** 1, 2, ... count: no cross, no directional setup, no fib hit. */
export function quietRamp(count = 250): OhlcBar[] {
  return flatBars(Array.from({ length: count }, (_, i) => i + 1));
}

/**
 * Same ramp, but the last bar spikes to 257.4 so the 25-bar swing runs
 * 226 -> 257.4 and its 23.6% level (249.9896) sits next to the 250 close.
 */
export function fibRamp(): OhlcBar[] {
  return quietRamp(250).map((bar, i) => (i === 249 ? { ...bar, high: 257.4 } : bar));
}

export const NEUTRAL: IndicatorSet = {
  ema9: 100,
  ema21: 100,
  rsi: 50,
  bbHigh: 110,
  bbLow: 90,
  sma50: 100,
  sma200: 100,
  sma50Prev: 100,
  sma200Prev: 100,
};

type Scripted = readonly OhlcBar[] | Error | (() => Promise<readonly OhlcBar[]>);

export class FakeProvider implements MarketDataProvider {
  readonly calls: string[] = [];

  constructor(private readonly script: Record<string, Scripted>) {}

  async fetchSeries(symbol: string, timeframe: Timeframe): Promise<TimeSeries> {
    this.calls.push(symbol);
    const entry = this.script[symbol];
    if (entry === undefined) throw new DataUnavailableError(symbol, "empty result (market closed?)");
    if (entry instanceof Error) throw entry;
    const bars = typeof entry === "function" ? await entry() : entry;
    return { symbol, timeframe, bars };
  }
}

export interface SentMessage {
  destination: string;
  title: string;
  body: string;
  accent: Accent;
}

export class RecordingNotifier implements Notifier {
  readonly sent: SentMessage[] = [];
  readonly failing = new Set<string>();

  async send(destination: string, title: string, body: string, accent: Accent): Promise<void> {
    if (this.failing.has(destination)) {
      throw new NotifierError(destination, `Channel ${destination} not found`);
    }
    this.sent.push({ destination, title, body, accent });
  }
}
