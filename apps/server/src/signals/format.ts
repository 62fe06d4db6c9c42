import type { SignalKind, TradePlan } from "@shared/types/signals";

export const SIGNAL_LABELS: Record<SignalKind, string> = {
  HOLD: "🤝 HOLD / WAIT (no confluence yet)",
  PRO_BUY: "✅ PRO-BUY Setup",
  PRO_SELL: "❌ PRO-SELL Setup",
};

function price(value: number | undefined): string {
  return value === undefined ? "—" : value.toFixed(2);
}

export function alertTitle(symbol: string): string {
  return `📈 ${symbol} Trading Alert`;
}

export function planTitle(symbol: string, timeframe: string): string {
  return `📊 ${symbol} Trade Plan (${timeframe})`;
}

export function noSignalNotice(symbol: string, timeframe: string): string {
  return `➖ No strong signal for ${symbol} on ${timeframe} at the moment.`;
}

export function failureNotice(symbol: string): string {
  return `❌ Error analyzing ${symbol}`;
}

/** Render a trade plan as the message body delivered to a channel. */
export function formatTradePlan(plan: TradePlan): string {
  const lines = [
    planTitle(plan.symbol, plan.timeframe),
    `Price: ${plan.price.toFixed(2)}`,
    "",
    `Signal: ${SIGNAL_LABELS[plan.signal]}`,
    `Entry: ${plan.entry.toFixed(2)}`,
    `Stop Loss: ${price(plan.stopLoss)}`,
    `Take Profit: ${price(plan.takeProfit)}`,
    "",
    `Confluence: ${plan.confluence.length > 0 ? plan.confluence.join(", ") : "No strong confluence"}`,
  ];
  return lines.join("\n");
}
