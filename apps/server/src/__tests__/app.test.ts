import { createServer, type Server } from "http";

import { Agent, request } from "undici";
import { describe, it, expect, beforeEach, afterEach } from "vitest";

import type { TickSummary } from "../alerts/scheduler";
import { createApp } from "../app";
import { setServerReady } from "../health";

import { FakeProvider, RecordingNotifier, fibRamp, quietRamp } from "./fixtures";

const LAST_TICK: TickSummary = {
  tickId: "tick0001",
  startedAt: "2024-01-08T06:00:00.000Z",
  finishedAt: "2024-01-08T06:00:02.000Z",
  delivered: ["SOL-USD"],
  quiet: [],
  closed: ["TCS.NS"],
  failed: [],
};

describe("HTTP surface", () => {
  let server: Server;
  let agent: Agent;
  let origin: string;
  let notifier: RecordingNotifier;

  beforeEach(async () => {
    setServerReady(false);
    notifier = new RecordingNotifier();
    const app = createApp({
      provider: new FakeProvider({
        "SOL-USD": fibRamp(),
        "ETH-USD": quietRamp(),
        "BTC-USD": quietRamp(),
        "BROKEN-USD": new Error("boom"),
      }),
      notifier,
      health: { symbolCount: 2, lastTick: () => LAST_TICK },
    });

    server = createServer(app);
    await new Promise<void>((resolve) => server.listen(0, "127.0.0.1", resolve));
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server did not bind a TCP port");
    origin = `http://127.0.0.1:${address.port}`;
    agent = new Agent();
  });

  afterEach(async () => {
    setServerReady(false);
    await agent.close();
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
  });

  function get(path: string) {
    return request(`${origin}${path}`, { method: "GET", dispatcher: agent });
  }

  function post(path: string, body: string) {
    return request(`${origin}${path}`, {
      method: "POST",
      headers: { "content-type": "application/json" },
      body,
      dispatcher: agent,
    });
  }

  describe("health endpoints", () => {
    it("answers the keep-alive text at the root", async () => {
      const res = await get("/");
      expect(res.statusCode).toBe(200);
      expect(await res.body.text()).toBe("Hello! I'm alive.");
    });

    it("reports live regardless of readiness", async () => {
      const res = await get("/api/livez");
      expect(res.statusCode).toBe(200);
      expect(await res.body.json()).toEqual({ ok: true, status: "live" });
    });

    it("is not ready until the scheduler has started", async () => {
      const before = await get("/api/readyz");
      expect(before.statusCode).toBe(503);
      expect(await before.body.json()).toEqual({ ok: false, status: "starting" });

      setServerReady(true);

      const after = await get("/api/readyz");
      expect(after.statusCode).toBe(200);
      expect(await after.body.json()).toEqual({ ok: true, status: "ready" });
    });

    it("exposes the last tick and the symbol count", async () => {
      const res = await get("/api/healthz");
      expect(res.statusCode).toBe(200);
      expect(await res.body.json()).toMatchObject({ ok: true, symbols: 2, lastTick: LAST_TICK });
    });
  });

  describe("errors", () => {
    it("answers unknown routes with 404", async () => {
      const res = await get("/api/nope");
      expect(res.statusCode).toBe(404);
      expect(await res.body.json()).toEqual({
        ok: false,
        error: { code: "NOT_FOUND", message: "Route not found: GET /api/nope" },
      });
    });

    it("answers a malformed JSON body with 400", async () => {
      const res = await post("/api/plan", "{bad");
      expect(res.statusCode).toBe(400);
      expect(await res.body.json()).toMatchObject({ ok: false, error: { code: "INVALID_REQUEST" } });
    });
  });

  describe("GET /api/plan/:symbol", () => {
    it("answers with the manual query result", async () => {
      const res = await get("/api/plan/ETH-USD");
      expect(res.statusCode).toBe(200);
      expect(await res.body.json()).toEqual({
        ok: true,
        kind: "no-signal",
        reason: "no-confluence",
        message: "➖ No strong signal for ETH-USD on 1d at the moment.",
      });
    });

    it("rejects an unknown timeframe", async () => {
      const res = await get("/api/plan/SOL-USD?timeframe=2h");
      expect(res.statusCode).toBe(400);
      expect(await res.body.json()).toMatchObject({ ok: false, error: { code: "INVALID_REQUEST" } });
    });

    it("maps an analysis failure to 502", async () => {
      const res = await get("/api/plan/BROKEN-USD?timeframe=1h");
      expect(res.statusCode).toBe(502);
      expect(await res.body.json()).toEqual({
        ok: false,
        error: { code: "ANALYSIS_FAILED", message: "❌ Error analyzing BROKEN-USD" },
      });
    });
  });

  describe("POST /api/plan", () => {
    it("delivers the plan to the requested destination", async () => {
      const res = await post(
        "/api/plan",
        JSON.stringify({ symbol: "SOL-USD", timeframe: "1h", destination: "100000000000000002" }),
      );
      expect(res.statusCode).toBe(200);
      expect(await res.body.json()).toMatchObject({ ok: true, kind: "plan", delivered: true });
      expect(notifier.sent.map((m) => m.destination)).toEqual(["100000000000000002"]);
      expect(notifier.sent[0]?.accent).toBe("plan");
    });

    it("rejects a destination that is not a channel id", async () => {
      const res = await post("/api/plan", JSON.stringify({ symbol: "SOL-USD", destination: "#alerts" }));
      expect(res.statusCode).toBe(400);
      await res.body.dump();
      expect(notifier.sent).toEqual([]);
    });
  });

  describe("rate limit", () => {
    it("shares one budget per client across symbols", async () => {
      const symbols = ["ETH-USD", "SOL-USD", "BTC-USD", "ETH-USD", "SOL-USD", "BTC-USD"];
      const statuses: number[] = [];
      let retryAfter: string | string[] | undefined;

      for (const symbol of symbols) {
        const res = await get(`/api/plan/${symbol}`);
        statuses.push(res.statusCode);
        retryAfter = res.headers["retry-after"];
        await res.body.dump();
      }

      expect(statuses).toEqual([200, 200, 200, 200, 200, 429]);
      expect(Number(retryAfter)).toBeGreaterThan(0);
      expect(Number(retryAfter)).toBeLessThanOrEqual(10);
    });

    it("leaves the health endpoints outside the limit", async () => {
      const statuses: number[] = [];
      for (let i = 0; i < 7; i++) {
        const res = await get("/api/livez");
        statuses.push(res.statusCode);
        await res.body.dump();
      }
      expect(statuses.every((status) => status === 200)).toBe(true);
    });
  });
});
