import express, { type Express } from "express";

import { healthz, keepAlive, liveness, readiness, type HealthSource } from "./health";
import { createHttpLogger } from "./logger";
import { errorHandler, notFound } from "./middleware/error";
import { rateLimit } from "./middleware/rateLimit";
import { createPlanRouter } from "./routes/plan";
import type { ManualQueryDeps } from "./signals/manualQuery";

export interface AppDeps extends ManualQueryDeps {
  health: HealthSource;
}

export function createApp(deps: AppDeps): Express {
  const app = express();

  app.disable("x-powered-by");
  app.use(express.json());
  app.use(createHttpLogger());

  // Health and readiness endpoints
  app.get("/", keepAlive);
  app.get("/api/livez", liveness);
  app.get("/api/readyz", readiness);
  app.get("/api/healthz", healthz(deps.health));

  app.use(
    "/api/plan",
    rateLimit({ windowMs: 10000, maxRequests: 5 }),
    createPlanRouter({ provider: deps.provider, notifier: deps.notifier, logger: deps.logger }),
  );

  // Error middleware - must be last
  app.use(notFound);
  app.use(errorHandler);

  return app;
}
