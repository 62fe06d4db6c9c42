import type { Request, RequestHandler, Response } from "express";

import type { TickSummary } from "./alerts/scheduler";

let serverReady = false;
const startedAt = Date.now();

export function setServerReady(ready: boolean) {
  serverReady = ready;
}

export const ALIVE_TEXT = "Hello! I'm alive.";

// Root endpoint polled by external uptime monitors
export function keepAlive(_req: Request, res: Response) {
  res.type("text/plain").send(ALIVE_TEXT);
}

export function liveness(_req: Request, res: Response) {
  res.status(200).json({ ok: true, status: "live" });
}

export function readiness(_req: Request, res: Response) {
  const status = serverReady ? 200 : 503;
  res.status(status).json({
    ok: serverReady,
    status: serverReady ? "ready" : "starting",
  });
}

export interface HealthSource {
  symbolCount: number;
  lastTick: () => TickSummary | null;
}

export function healthz(source: HealthSource): RequestHandler {
  return (_req, res) => {
    res.status(200).json({
      ok: true,
      uptime: process.uptime(),
      startedAt: new Date(startedAt).toISOString(),
      symbols: source.symbolCount,
      lastTick: source.lastTick(),
      timestamp: Date.now(),
    });
  };
}
