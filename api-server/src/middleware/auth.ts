/// <reference path="../types/express.d.ts" />
import { NextFunction, Request, Response } from "express";
import { isAuthenticationFailure } from "keyward-core";
import { sendUnauthorized } from "../lib/responders";
import { Services } from "../services";
import { authenticateCredential } from "../modules/strategies";

/**
 * Pulls the presented secret from `Authorization: Bearer <secret>`, falling
 * back to the `x-api-key` header.
 */
export function extractBearer(req: Request): string | null {
  const authHeader = req.headers.authorization;
  if (authHeader) {
    const match = /^Bearer\s+(\S+)\s*$/i.exec(authHeader);
    return match ? match[1] : null;
  }

  const apiKeyHeader = req.headers["x-api-key"];
  if (typeof apiKeyHeader === "string" && apiKeyHeader.trim() !== "") {
    return apiKeyHeader.trim();
  }
  return null;
}

/**
 * Authenticates the request with the bearer strategies (API key, then
 * session token) and moves the request gate to authenticated.
 */
export function bearerAuth(services: Services, options: { requireConfirmedUser: boolean }) {
  return async (req: Request, res: Response, next: NextFunction): Promise<void> => {
    const presented = extractBearer(req);
    if (!presented) {
      sendUnauthorized(
        req,
        res,
        "Missing or invalid Authorization header. Use: 'Authorization: Bearer <token>'",
      );
      return;
    }

    const outcome = await authenticateCredential(services.bearerStrategies, {
      kind: "bearer",
      value: presented,
    });
    if (isAuthenticationFailure(outcome)) {
      sendUnauthorized(req, res, `${outcome.kind}: ${outcome.message}`);
      return;
    }

    const user = await services.accounts.findUser(outcome.userId);
    if (!user) {
      sendUnauthorized(req, res, `User ${outcome.userId} no longer exists`);
      return;
    }

    if (options.requireConfirmedUser && !user.confirmed_at) {
      sendUnauthorized(req, res, "User has not confirmed their email");
      return;
    }

    req.user = user;
    req.credential = { strategy: outcome.strategy, value: presented };
    req.gate?.authenticate({ id: user.id });
    req.ctx?.logger.debug("Request authenticated", {
      type: "auth_success",
      strategy: outcome.strategy,
      user_id: user.id,
    });

    next();
  };
}
