import type { Router as ExpressRouter, Response } from "express";
import { Router } from "express";
import { z } from "zod";

import { symbolConfigSchema } from "@shared/schemas";
import { DEFAULT_TIMEFRAME, TIMEFRAMES } from "@shared/types/market";

import { runManualQuery, type ManualQueryDeps, type ManualQueryReply } from "../signals/manualQuery";

const querySchema = z.object({
  symbol: symbolConfigSchema.shape.symbol,
  timeframe: z.enum(TIMEFRAMES).default(DEFAULT_TIMEFRAME),
});

const deliverSchema = querySchema.extend({
  destination: symbolConfigSchema.shape.destination.optional(),
});

function reply(res: Response, result: ManualQueryReply) {
  if (result.kind === "error") {
    res.status(502).json({ ok: false, error: { code: "ANALYSIS_FAILED", message: result.message } });
    return;
  }
  res.status(200).json({ ok: true, ...result });
}

function badRequest(res: Response, error: z.ZodError) {
  res.status(400).json({
    ok: false,
    error: { code: "INVALID_REQUEST", message: "Invalid request", details: error.issues },
  });
}

/** Manual trade-plan command: same pipeline as the scheduler, one symbol on demand. */
export function createPlanRouter(deps: ManualQueryDeps): ExpressRouter {
  const router: ExpressRouter = Router();

  // GET /api/plan/:symbol?timeframe=1d
  router.get("/:symbol", async (req, res) => {
    const parsed = querySchema.safeParse({ symbol: req.params.symbol, timeframe: req.query.timeframe });
    if (!parsed.success) {
      badRequest(res, parsed.error);
      return;
    }

    const { symbol, timeframe } = parsed.data;
    reply(res, await runManualQuery(deps, symbol, timeframe));
  });

  // POST /api/plan { symbol, timeframe?, destination? }
  router.post("/", async (req, res) => {
    const parsed = deliverSchema.safeParse(req.body);
    if (!parsed.success) {
      badRequest(res, parsed.error);
      return;
    }

    const { symbol, timeframe, destination } = parsed.data;
    reply(res, await runManualQuery(deps, symbol, timeframe, destination));
  });

  return router;
}
