/// <reference path="../../types/express.d.ts" />
import { Request, RequestHandler, Response as ExpressResponse, Router } from "express";
import { notFound } from "keyward-core";
import { sendKeywardError } from "#lib/responders";
import {
  sendForbidden_unlessAuthorized,
  sendUnauthorized_unlessUser,
} from "../request-gating";
import { apiLogging } from "../../middleware/api-logging";
import { requestContext } from "../../middleware/request-context";
import { toPublicUser } from "../../models/users-model";
import { userPolicies } from "../../modules/policies";
import { Services } from "../../services";

const SERVICE = "users-handler";

export function createUsersRouter(services: Services, authenticate: RequestHandler): Router {
  const router = Router();
  const { accounts } = services;

  router.get(
    "/me",
    requestContext("GET /me"),
    apiLogging(SERVICE),
    authenticate,
    async (req: Request, res: ExpressResponse) => {
      const currentUser = sendUnauthorized_unlessUser(req, res);
      if (!currentUser) return;

      const allowed = sendForbidden_unlessAuthorized(req, res, userPolicies, "read", currentUser);
      if (!allowed) return;

      res.json({ user: toPublicUser(currentUser) });
    },
  );

  // Deletes the user along with its API keys and tokens.
  router.delete(
    "/users/:id",
    requestContext("DELETE /users/:id"),
    apiLogging(SERVICE),
    authenticate,
    async (req: Request, res: ExpressResponse) => {
      const currentUser = sendUnauthorized_unlessUser(req, res);
      if (!currentUser) return;

      const id = String(req.params.id);
      const allowed = sendForbidden_unlessAuthorized(req, res, userPolicies, "destroy", { id });
      if (!allowed) return;

      const destroyed = await accounts.destroyUser(id);
      if (!destroyed) return sendKeywardError(req, res, notFound(`User with id ${id} not found`));

      res.status(204).end();
    },
  );

  return router;
}
