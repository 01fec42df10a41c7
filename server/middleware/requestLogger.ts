import type { Request, Response, NextFunction } from "express";
import { randomUUID } from "crypto";
import { runWithContext, type CorrelationContext } from "./correlationContext";
import { createLogger } from "../utils/logger";

const logger = createLogger("http");

const TRACE_HEADER = "x-request-id";

function incomingTraceId(req: Request): string | undefined {
  const value = req.header(TRACE_HEADER);
  return value && value.length <= 128 ? value : undefined;
}

export function requestLoggerMiddleware(req: Request, res: Response, next: NextFunction): void {
  const traceId = incomingTraceId(req) ?? randomUUID();
  const startTime = Date.now();

  res.setHeader(TRACE_HEADER, traceId);

  const context: CorrelationContext = { traceId, startTime };

  runWithContext(context, () => {
    const requestLogger = logger.child({ traceId });

    requestLogger.debug("Request started", {
      method: req.method,
      path: req.path,
      userAgent: req.get("user-agent"),
    });

    res.on("finish", () => {
      const durationMs = Date.now() - startTime;
      const logMethod = res.statusCode >= 400 ? "warn" : "info";
      requestLogger[logMethod]("Request completed", {
        method: req.method,
        path: req.path,
        statusCode: res.statusCode,
        durationMs,
      });
    });

    res.on("error", (error: Error) => {
      requestLogger.error("Request error", {
        method: req.method,
        path: req.path,
        error: error.message,
        durationMs: Date.now() - startTime,
      });
    });

    next();
  });
}
