import { request, type Dispatcher } from "undici";
import { z } from "zod";

import { DataUnavailableError } from "@shared/errors";
import type { OhlcBar, TimeSeries } from "@shared/types";
import { TIMEFRAME_LOOKBACK, type Timeframe } from "@shared/types/market";
import { normalizeBars } from "@shared/utils/bars";

import { logger } from "../logger";

import type { MarketDataProvider } from "./provider";

const log = logger.child({ component: "yahoo" });

const nullableSeries = z.array(z.number().nullable()).optional();

const chartResponseSchema = z.object({
  chart: z.object({
    result: z
      .array(
        z.object({
          timestamp: z.array(z.number()).optional(),
          indicators: z.object({
            quote: z.array(
              z.object({
                open: nullableSeries,
                high: nullableSeries,
                low: nullableSeries,
                close: nullableSeries,
                volume: nullableSeries,
              }),
            ),
          }),
        }),
      )
      .nullable(),
    error: z.object({ code: z.string(), description: z.string() }).nullable().optional(),
  }),
});

type ChartResponse = z.infer<typeof chartResponseSchema>;

export interface YahooChartOptions {
  baseUrl: string;
  timeoutMs: number;
  dispatcher?: Dispatcher;
}

/**
 * Price history from the Yahoo Finance chart endpoint.
 *
 * One request per call with a bounded timeout; every failure mode is
 * reported as DataUnavailableError.
 */
export class YahooChartProvider implements MarketDataProvider {
  private readonly baseUrl: string;
  private readonly timeoutMs: number;
  private readonly dispatcher: Dispatcher | undefined;

  constructor(options: YahooChartOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, "");
    this.timeoutMs = options.timeoutMs;
    this.dispatcher = options.dispatcher;
  }

  async fetchSeries(symbol: string, timeframe: Timeframe): Promise<TimeSeries> {
    const bars = await this.request(symbol, TIMEFRAME_LOOKBACK[timeframe], timeframe);
    return Object.freeze({ symbol, timeframe, bars: Object.freeze(bars) });
  }

  /**
   * Fetch bars for `symbol` over `range` (e.g. "60d") at `interval` (e.g. "1h").
   */
  async request(symbol: string, range: string, interval: string): Promise<OhlcBar[]> {
    const params = new URLSearchParams({ range, interval });
    const url = `${this.baseUrl}/v8/finance/chart/${encodeURIComponent(symbol)}?${params.toString()}`;

    let statusCode: number;
    let raw: string;
    try {
      const response = await request(url, {
        method: "GET",
        headers: {
          accept: "application/json",
          "user-agent": "Mozilla/5.0 (compatible; confluence-alerts)",
        },
        signal: AbortSignal.timeout(this.timeoutMs),
        dispatcher: this.dispatcher,
      });
      statusCode = response.statusCode;
      raw = await response.body.text();
    } catch (err) {
      const reason = err instanceof Error ? err.message : String(err);
      log.warn({ symbol, range, interval, err }, "Chart request failed");
      throw new DataUnavailableError(symbol, `request failed: ${reason}`, { cause: err });
    }

    const payload = parsePayload(raw);

    if (statusCode < 200 || statusCode >= 300) {
      const description = payload?.chart.error?.description ?? raw.slice(0, 200);
      log.warn({ symbol, statusCode, description }, "Chart endpoint returned an error");
      throw new DataUnavailableError(symbol, `status ${statusCode}: ${description}`);
    }

    if (!payload) {
      throw new DataUnavailableError(symbol, "unexpected response shape");
    }

    if (payload.chart.error) {
      throw new DataUnavailableError(symbol, payload.chart.error.description);
    }

    const bars = normalizeBars(toRows(payload));
    if (bars.length === 0) {
      throw new DataUnavailableError(symbol, "empty result (market closed?)");
    }

    log.debug({ symbol, range, interval, count: bars.length }, "Fetched bars");
    return bars;
  }
}

function parsePayload(raw: string): ChartResponse | null {
  let json: unknown;
  try {
    json = JSON.parse(raw);
  } catch {
    return null;
  }
  const result = chartResponseSchema.safeParse(json);
  return result.success ? result.data : null;
}

function toRows(payload: ChartResponse): OhlcBar[] {
  const result = payload.chart.result?.[0];
  const timestamps = result?.timestamp ?? [];
  const quote = result?.indicators.quote[0];
  if (!quote) return [];

  const rows: OhlcBar[] = [];
  for (let i = 0; i < timestamps.length; i++) {
    const ts = timestamps[i];
    const close = quote.close?.[i];
    if (ts === undefined || close === undefined || close === null) continue;

    rows.push({
      timestamp: ts * 1000,
      open: quote.open?.[i] ?? close,
      high: quote.high?.[i] ?? close,
      low: quote.low?.[i] ?? close,
      close,
      volume: quote.volume?.[i] ?? 0,
    });
  }
  return rows;
}
