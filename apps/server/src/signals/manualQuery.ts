import type { Logger } from "pino";

import type { Timeframe } from "@shared/types/market";
import { DEFAULT_TIMEFRAME } from "@shared/types/market";
import type { TradePlan } from "@shared/types/signals";

import { logger as rootLogger } from "../logger";
import type { MarketDataProvider } from "../market/provider";
import type { Notifier } from "../notify/types";

import { failureNotice, formatTradePlan, noSignalNotice, planTitle } from "./format";
import { analyzeSymbol, type NoSignalReason } from "./pipeline";

export interface ManualQueryDeps {
  provider: MarketDataProvider;
  notifier: Notifier;
  logger?: Logger;
}

export type ManualQueryReply =
  | { kind: "plan"; title: string; body: string; plan: TradePlan; delivered: boolean }
  | { kind: "no-signal"; message: string; reason: NoSignalReason }
  | { kind: "error"; message: string };

/**
 * On-demand analysis of a single instrument.
 *
 * Never rejects: failures become a generic notice and the detail stays in
 * the server log. With a destination, a resulting plan is also delivered.
 */
export async function runManualQuery(
  deps: ManualQueryDeps,
  symbol: string,
  timeframe: Timeframe = DEFAULT_TIMEFRAME,
  destination?: string,
): Promise<ManualQueryReply> {
  const log = (deps.logger ?? rootLogger).child({ symbol, timeframe });

  try {
    const outcome = await analyzeSymbol(deps.provider, symbol, timeframe);

    if (outcome.status === "no-signal") {
      log.info({ reason: outcome.reason, detail: outcome.detail }, "No strong signal");
      return {
        kind: "no-signal",
        reason: outcome.reason,
        message: noSignalNotice(symbol, timeframe),
      };
    }

    const title = planTitle(symbol, timeframe);
    const body = formatTradePlan(outcome.plan);

    if (destination) {
      await deps.notifier.send(destination, title, body, "plan");
      log.info({ destination, signal: outcome.plan.signal }, "Trade plan delivered on request");
    }

    return { kind: "plan", title, body, plan: outcome.plan, delivered: Boolean(destination) };
  } catch (err) {
    log.error({ err }, "Manual query failed");
    return { kind: "error", message: failureNotice(symbol) };
  }
}
