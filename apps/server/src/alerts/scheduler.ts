import { nanoid } from "nanoid";
import cron, { type ScheduledTask } from "node-cron";
import type { Logger } from "pino";

import { FatalConfigError } from "@shared/errors";
import type { SymbolConfig } from "@shared/schemas";

import { logger as rootLogger } from "../logger";
import { isMarketOpen } from "../market/marketHours";
import type { MarketDataProvider } from "../market/provider";
import type { Notifier } from "../notify/types";
import { alertTitle, formatTradePlan } from "../signals/format";
import { analyzeSymbol } from "../signals/pipeline";

export const DEFAULT_ALERT_SCHEDULE = "*/5 * * * *";

export interface AlertSchedulerDeps {
  symbols: readonly SymbolConfig[];
  provider: MarketDataProvider;
  notifier: Notifier;
  schedule?: string;
  isOpen?: (symbol: string, now: Date) => boolean;
  now?: () => Date;
  logger?: Logger;
}

export interface TickSummary {
  tickId: string;
  startedAt: string;
  finishedAt: string;
  delivered: string[];
  quiet: string[];
  closed: string[];
  failed: string[];
}

/**
 * Periodic driver: every tick walks the configured instruments in order,
 * gates on market hours, runs the pipeline and forwards plans.
 *
 * One instrument failing never affects its siblings or later ticks. A tick
 * that comes due while the previous one is still running is skipped.
 */
export class AlertScheduler {
  private readonly symbols: readonly SymbolConfig[];
  private readonly provider: MarketDataProvider;
  private readonly notifier: Notifier;
  private readonly schedule: string;
  private readonly isOpen: (symbol: string, now: Date) => boolean;
  private readonly now: () => Date;
  private readonly log: Logger;

  private task: ScheduledTask | null = null;
  private inFlight = false;
  private lastSummary: TickSummary | null = null;

  constructor(deps: AlertSchedulerDeps) {
    this.symbols = deps.symbols;
    this.provider = deps.provider;
    this.notifier = deps.notifier;
    this.schedule = deps.schedule ?? DEFAULT_ALERT_SCHEDULE;
    this.isOpen = deps.isOpen ?? isMarketOpen;
    this.now = deps.now ?? (() => new Date());
    this.log = (deps.logger ?? rootLogger).child({ component: "alerts" });
  }

  get started(): boolean {
    return this.task !== null;
  }

  get lastTick(): TickSummary | null {
    return this.lastSummary;
  }

  /** Schedule ticks and run the first one right away. */
  start(): void {
    if (this.task) return;

    if (!cron.validate(this.schedule)) {
      throw new FatalConfigError(`Invalid alert schedule "${this.schedule}"`);
    }

    this.task = cron.schedule(this.schedule, () => this.fire());
    this.log.info(
      { schedule: this.schedule, symbols: this.symbols.map((s) => s.symbol) },
      "Alert scheduler started",
    );
    this.fire();
  }

  /** Stop scheduling further ticks; a tick already running completes. */
  stop(): void {
    if (!this.task) return;
    this.task.stop();
    this.task = null;
    this.log.info("Alert scheduler stopped");
  }

  private fire(): void {
    this.runTick().catch((err: unknown) => {
      this.log.error({ err }, "Alert tick crashed");
    });
  }

  /**
   * Process every configured instrument once.
   * Resolves to null when skipped because a previous tick is still running.
   */
  async runTick(): Promise<TickSummary | null> {
    if (this.inFlight) {
      this.log.warn("Previous alert tick still running, skipping this one");
      return null;
    }

    this.inFlight = true;
    const tickId = nanoid(8);
    const tickLog = this.log.child({ tickId });
    const summary: TickSummary = {
      tickId,
      startedAt: this.now().toISOString(),
      finishedAt: "",
      delivered: [],
      quiet: [],
      closed: [],
      failed: [],
    };

    try {
      tickLog.debug("Alert tick started");

      for (const entry of this.symbols) {
        await this.processSymbol(entry, summary, tickLog);
      }

      summary.finishedAt = this.now().toISOString();
      this.lastSummary = summary;
      tickLog.info(
        {
          delivered: summary.delivered.length,
          quiet: summary.quiet.length,
          closed: summary.closed.length,
          failed: summary.failed.length,
        },
        "Alert tick complete",
      );
      return summary;
    } finally {
      this.inFlight = false;
    }
  }

  private async processSymbol(entry: SymbolConfig, summary: TickSummary, tickLog: Logger): Promise<void> {
    const { symbol, timeframe, destination } = entry;
    const log = tickLog.child({ symbol, timeframe });

    try {
      if (!this.isOpen(symbol, this.now())) {
        log.info("Market closed, skipping alert");
        summary.closed.push(symbol);
        return;
      }

      const outcome = await analyzeSymbol(this.provider, symbol, timeframe);

      if (outcome.status === "no-signal") {
        log.info({ reason: outcome.reason, detail: outcome.detail }, "No strong signal, skipping alert");
        summary.quiet.push(symbol);
        return;
      }

      await this.notifier.send(destination, alertTitle(symbol), formatTradePlan(outcome.plan), "alert");
      log.info({ destination, signal: outcome.plan.signal }, "Sent trade plan");
      summary.delivered.push(symbol);
    } catch (err) {
      log.error({ err }, "Alert processing failed");
      summary.failed.push(symbol);
    }
  }
}
