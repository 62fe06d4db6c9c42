import { toZonedTime } from "date-fns-tz";

interface ExchangeSession {
  timeZone: string;
  openSeconds: number;
  closeSeconds: number;
}

// Indian cash market, NSE and BSE
const INDIA_SESSION: ExchangeSession = {
  timeZone: "Asia/Kolkata",
  openSeconds: (9 * 60 + 15) * 60, // 09:15:00
  closeSeconds: (15 * 60 + 30) * 60, // 15:30:00
};

// Symbols carrying a regional-exchange suffix trade in that exchange's session
const SESSIONS_BY_SUFFIX: Record<string, ExchangeSession> = {
  ".NS": INDIA_SESSION,
  ".BO": INDIA_SESSION,
};

function sessionFor(symbol: string): ExchangeSession | null {
  const upper = symbol.toUpperCase();
  for (const [suffix, session] of Object.entries(SESSIONS_BY_SUFFIX)) {
    if (upper.endsWith(suffix)) return session;
  }
  return null;
}

/**
 * Whether the market for `symbol` is open at `now`.
 *
 * Suffixed exchange symbols: Monday-Friday, open to close inclusive on the
 * exchange clock. Everything else (crypto pairs, unsuffixed tickers) is always
 * open. Exchange holidays are not modelled.
 */
export function isMarketOpen(symbol: string, now: Date = new Date()): boolean {
  const session = sessionFor(symbol);
  if (!session) return true;

  const local = toZonedTime(now, session.timeZone);
  const dayOfWeek = local.getDay(); // 0 = Sunday, 6 = Saturday
  if (dayOfWeek === 0 || dayOfWeek === 6) return false;

  const seconds =
    local.getHours() * 3600 + local.getMinutes() * 60 + local.getSeconds() + local.getMilliseconds() / 1000;

  return seconds >= session.openSeconds && seconds <= session.closeSeconds;
}
