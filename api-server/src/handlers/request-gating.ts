/// <reference path="../types/express.d.ts" />
import { Request, Response as ExpressResponse } from "express";
import { Interaction, isAllowed, PolicySet } from "keyward-core";
import { sendForbidden, sendUnauthorized } from "#lib/responders";
import { User } from "../models/users-model";

// More or less a type guard: the auth middleware always sets the user before
// the handler runs, but TS cannot follow that control flow.
export function sendUnauthorized_unlessUser(
  req: Request,
  res: ExpressResponse,
): User | undefined {
  const currentUser = req.user;
  if (!currentUser) {
    sendUnauthorized(req, res, "Missing authenticated user context");
    return undefined;
  }
  return currentUser;
}

/**
 * Runs the request's gate against a policy set. Sends the 403 itself and
 * returns false when the gate denies.
 */
export function sendForbidden_unlessAuthorized<R>(
  req: Request,
  res: ExpressResponse,
  set: PolicySet<R>,
  action: string,
  resource: R,
  interaction?: Interaction,
): boolean {
  if (!req.gate) {
    sendForbidden(req, res, "request gate missing");
    return false;
  }

  const decision = req.gate.authorize(set, action, resource, interaction);
  if (!isAllowed(decision)) {
    sendForbidden(req, res, decision.reason);
    return false;
  }

  req.ctx?.logger.debug("Request authorized", {
    type: "policy_allowed",
    resource: set.resource,
    action,
    by: decision.by,
  });
  return true;
}
