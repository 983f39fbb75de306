/// <reference path="../types/express.d.ts" />
import { NextFunction, Request, Response } from "express";
import { logApiCallStart, logApiCallComplete } from "../lib/logger";

/**
 * Logs API call start and completion using request-scoped context.
 * Should be placed after requestContext middleware.
 */
export function apiLogging(service: string) {
  return (req: Request, res: Response, next: NextFunction) => {
    const spanId = req.ctx?.spanId || "unknown";
    const routeLabel = req.ctx?.routeLabel || req.path;

    logApiCallStart(spanId, service, routeLabel, {
      url: req.originalUrl,
      method: req.method,
      headers: req.headers,
      body: req.body,
      userAgent: req.headers["user-agent"],
      ip: req.ip,
    });

    res.on("finish", () => {
      const duration = req.ctx?.elapsedMs ? req.ctx.elapsedMs() : 0;
      logApiCallComplete(spanId, service, routeLabel, { status: res.statusCode }, duration);
    });

    next();
  };
}
