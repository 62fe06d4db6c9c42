import type { NextFunction, Request, Response } from "express";
import pino from "pino";

import { logEnvSchema } from "@shared/env";

// Bad values fall back here; validateEnv reports them fatally at startup
const parsed = logEnvSchema.safeParse(process.env);
const env = parsed.success ? parsed.data : { NODE_ENV: "development", LOG_LEVEL: "info" };

// Create base logger with LOG_LEVEL from env
export const logger = pino({
  level: env.LOG_LEVEL,
  ...(env.NODE_ENV === "development"
    ? {
        transport: {
          target: "pino-pretty",
          options: {
            colorize: true,
            translateTime: "HH:MM:ss.l",
            ignore: "pid,hostname",
          },
        },
      }
    : {}),
});

export function createHttpLogger() {
  return (req: Request, res: Response, next: NextFunction) => {
    const start = Date.now();
    res.on("finish", () => {
      const log = {
        method: req.method,
        url: req.originalUrl,
        status: res.statusCode,
        duration: Date.now() - start,
        userAgent: req.headers["user-agent"],
      };

      if (res.statusCode >= 500) {
        logger.error(log, "HTTP request error");
      } else if (res.statusCode >= 400) {
        logger.warn(log, "HTTP request warning");
      } else {
        logger.debug(log, "HTTP request");
      }
    });
    next();
  };
}
