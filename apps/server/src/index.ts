import { createServer } from "http";

import { validateEnv, type Env } from "@shared/env";
import type { SymbolConfig } from "@shared/schemas";

import { AlertScheduler } from "./alerts/scheduler";
import { createApp } from "./app";
import { loadSymbolConfig } from "./config/symbols";
import { setServerReady } from "./health";
import { logger } from "./logger";
import { YahooChartProvider } from "./market/yahoo";
import { DiscordNotifier } from "./notify/discord";

// Credentials and the instrument list are checked before anything is scheduled
let env: Env;
let symbols: readonly SymbolConfig[];
try {
  env = validateEnv(process.env);
  symbols = loadSymbolConfig(env.SYMBOLS_FILE);
} catch (err) {
  logger.fatal({ err }, "❌ Startup configuration invalid, exiting");
  process.exit(1);
}

const provider = new YahooChartProvider({
  baseUrl: env.MARKET_DATA_URL,
  timeoutMs: env.FETCH_TIMEOUT_MS,
});

const notifier = new DiscordNotifier({
  token: env.DISCORD_BOT_TOKEN,
  apiUrl: env.DISCORD_API_URL,
  timeoutMs: env.FETCH_TIMEOUT_MS,
});

const scheduler = new AlertScheduler({
  symbols,
  provider,
  notifier,
  schedule: env.ALERT_SCHEDULE,
});

const app = createApp({
  provider,
  notifier,
  health: {
    symbolCount: symbols.length,
    lastTick: () => scheduler.lastTick,
  },
});
const server = createServer(app);

server.listen(env.PORT, "0.0.0.0", () => {
  logger.info({ port: env.PORT, env: env.NODE_ENV, logLevel: env.LOG_LEVEL }, "✅ Server running");
});

try {
  scheduler.start();
} catch (err) {
  logger.fatal({ err }, "❌ Alert scheduler failed to start, exiting");
  process.exit(1);
}
setServerReady(true);

// Global process error handlers for crash visibility
process.on("uncaughtException", (error) => {
  logger.fatal({ err: error }, "[CRITICAL] Uncaught exception");
  setServerReady(false);
  process.exit(1);
});

process.on("unhandledRejection", (reason) => {
  logger.error({ err: reason }, "[CRITICAL] Unhandled rejection");
});

function shutdown(signal: NodeJS.Signals) {
  logger.info(`[Server] ${signal} received, shutting down...`);
  setServerReady(false);
  scheduler.stop();
  server.close(() => {
    logger.info("[Server] Server closed");
    process.exit(0);
  });
}

process.on("SIGTERM", shutdown);
process.on("SIGINT", shutdown);
