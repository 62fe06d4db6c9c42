import type { NextFunction, Request, Response } from "express";

import { AppError } from "@shared/errors";

import { logger } from "../logger";

// Client errors raised by express itself (body-parser) carry status or statusCode
function clientStatus(err: unknown): number | null {
  if (typeof err !== "object" || err === null) return null;
  const candidate =
    "status" in err && typeof err.status === "number"
      ? err.status
      : "statusCode" in err && typeof err.statusCode === "number"
        ? err.statusCode
        : null;
  return candidate !== null && candidate >= 400 && candidate < 500 ? candidate : null;
}

export function errorHandler(err: unknown, req: Request, res: Response, _next: NextFunction) {
  let status = 500;
  let code = "INTERNAL_ERROR";

  if (err instanceof AppError) {
    status = err.status;
    code = err.code;
  } else {
    const fromClient = clientStatus(err);
    if (fromClient !== null) {
      status = fromClient;
      code = "INVALID_REQUEST";
    }
  }

  if (status >= 500) {
    logger.error({ err, status, code, path: req.path, method: req.method }, "[API Error]");
  } else {
    logger.warn({ err, status, code, path: req.path, method: req.method }, "[API Error]");
  }

  // Internal detail stays in the log
  res.status(status).json({
    ok: false,
    error: {
      code,
      message: status >= 500 ? "Unexpected server error" : err instanceof Error ? err.message : String(err),
    },
  });
}

export function notFound(req: Request, res: Response) {
  res.status(404).json({
    ok: false,
    error: {
      code: "NOT_FOUND",
      message: `Route not found: ${req.method} ${req.path}`,
    },
  });
}
