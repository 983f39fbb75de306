/// <reference path="../types/express.d.ts" />
import { Request, Response } from "express";
import { KeywardError } from "keyward-core";

// The only message an unauthenticated caller ever sees
const GENERIC_UNAUTHORIZED_MESSAGE = "Invalid credentials";

/**
 * Logs the real reason, answers with the generic one.
 */
export function sendUnauthorized(req: Request, res: Response, reason: string): void {
  req.ctx?.logger.warn("Unauthorized", {
    type: "auth_failure",
    reason,
    duration_ms: req.ctx?.elapsedMs(),
  });
  res.status(401).json({ error: "Unauthorized", message: GENERIC_UNAUTHORIZED_MESSAGE });
}

export function sendForbidden(req: Request, res: Response, reason: string): void {
  req.ctx?.logger.warn("Forbidden", {
    type: "policy_denied",
    reason,
    duration_ms: req.ctx?.elapsedMs(),
  });
  res.status(403).json({ error: "Forbidden", message: reason });
}

export function sendNotFound(req: Request, res: Response, message: string): void {
  req.ctx?.logger.warn("Not found", {
    type: "not_found",
    reason: message,
    duration_ms: req.ctx?.elapsedMs(),
  });
  res.status(404).json({ error: "Not found", message });
}

export function sendBadRequest(req: Request, res: Response, message: string): void {
  req.ctx?.logger.warn("Bad request", {
    type: "bad_request",
    message,
    duration_ms: req.ctx?.elapsedMs(),
  });
  res.status(400).json({ error: "Bad Request", message });
}

export function sendConflict(req: Request, res: Response, message: string): void {
  req.ctx?.logger.warn("Conflict", {
    type: "conflict",
    message,
    duration_ms: req.ctx?.elapsedMs(),
  });
  res.status(409).json({ error: "Conflict", message });
}

/** Maps any error value to its HTTP response. */
export function sendKeywardError(req: Request, res: Response, error: KeywardError): void {
  switch (error.kind) {
    case "validation-error":
      return sendBadRequest(req, res, error.message);
    case "unauthenticated":
    case "expired":
    case "revoked":
    case "invalid-signature":
      return sendUnauthorized(req, res, `${error.kind}: ${error.message}`);
    case "denied":
      return sendForbidden(req, res, error.reason);
    case "conflict":
      return sendConflict(req, res, error.message);
    case "not-found":
      return sendNotFound(req, res, error.message);
  }
}
