import type { OhlcBar } from "../types";

/**
 * Bring raw provider rows into TimeSeries order.
 *
 * - Rows without a finite close are dropped
 * - Rows are sorted by timestamp
 * - A repeated timestamp keeps the later row (providers re-emit the live bar)
 */
export function normalizeBars(rows: readonly OhlcBar[]): OhlcBar[] {
  const byTimestamp = new Map<number, OhlcBar>();

  for (const row of rows) {
    if (!Number.isFinite(row.close) || !Number.isFinite(row.timestamp)) continue;
    byTimestamp.set(row.timestamp, Object.freeze({ ...row }));
  }

  return [...byTimestamp.values()].sort((a, b) => a.timestamp - b.timestamp);
}

export function isStrictlyIncreasing(bars: readonly OhlcBar[]): boolean {
  for (let i = 1; i < bars.length; i++) {
    const prev = bars[i - 1];
    const curr = bars[i];
    if (!prev || !curr || curr.timestamp <= prev.timestamp) return false;
  }
  return true;
}
