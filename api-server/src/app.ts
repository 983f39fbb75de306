/// <reference path="./types/express.d.ts" />
import cors, { CorsOptions } from "cors";
import express, { Application, NextFunction, Request, Response } from "express";
import { logApiCallError, logger } from "./lib/logger";
import { bearerAuth } from "./middleware/auth";
import { mountApplicationRoutes } from "./routes";
import { Services } from "./services";

export interface AppOptions {
  requireConfirmedUser: boolean;
  /** Reject plain-HTTP requests (behind a TLS-terminating proxy) */
  requireHttps: boolean;
}

const isMalformedJsonError = (err: unknown): boolean =>
  err instanceof SyntaxError && "status" in err && err.status === 400 && "body" in err;

export function createApp(services: Services, options: AppOptions): Application {
  const app: Application = express();

  // Credentials travel in headers, never cookies, so any origin may call.
  const corsOptions: CorsOptions = {
    origin: true,
    methods: ["GET", "POST", "DELETE", "OPTIONS"],
    allowedHeaders: ["Content-Type", "Authorization", "x-api-key"],
  };
  app.use(cors(corsOptions));

  app.use(express.json());

  if (options.requireHttps) {
    app.use((req: Request, res: Response, next: NextFunction) => {
      if (req.headers["x-forwarded-proto"] !== "https") {
        logger.warn(
          `Rejected non-HTTPS request from ${req.ip}: ${req.method} ${req.originalUrl}`,
        );
        res.status(426).json({
          error: "HTTPS Required",
          message: "This server only accepts HTTPS connections in production",
        });
        return;
      }
      next();
    });
  }

  mountApplicationRoutes(app, services, bearerAuth(services, options));

  // If incoming request is a malformed JSON, return a 400 Bad Request.
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (isMalformedJsonError(err)) {
      logger.warn("Malformed JSON received", { url: req.originalUrl });
      res.status(400).json({
        error: "Bad Request",
        message: "Invalid JSON in request body. Please check your JSON syntax and try again.",
      });
      return;
    }
    next(err);
  });

  // Global error handler
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    logApiCallError(
      req.ctx?.spanId || "unknown",
      "api",
      req.ctx?.routeLabel || `${req.method} ${req.path}`,
      err,
      req.ctx?.elapsedMs() ?? 0,
    );
    if (res.headersSent) {
      next(err);
      return;
    }
    res.status(500).json({ error: "Internal Server Error", message: "Internal server error" });
  });

  return app;
}
