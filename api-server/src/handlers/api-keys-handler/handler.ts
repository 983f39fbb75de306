/// <reference path="../../types/express.d.ts" />
import { Request, RequestHandler, Response as ExpressResponse, Router } from "express";
import { isKeywardError, isValidationError, notFound } from "keyward-core";
import { z } from "zod";
import { sendKeywardError } from "#lib/responders";
import { parseBody } from "#lib/zod-utils";
import {
  sendForbidden_unlessAuthorized,
  sendUnauthorized_unlessUser,
} from "../request-gating";
import { apiLogging } from "../../middleware/api-logging";
import { requestContext } from "../../middleware/request-context";
import { apiKeyPolicies } from "../../modules/policies";
import { Services } from "../../services";

const SERVICE = "api-keys-handler";

// Whole-number and positivity checks belong to the key manager.
const createApiKeyBodySchema = z.object({ ttlSeconds: z.number() });

// Ids are uuids; anything else cannot name a key.
const apiKeyIdSchema = z.string().uuid();

export function createApiKeysRouter(services: Services, authenticate: RequestHandler): Router {
  const router = Router();
  const { apiKeys } = services;

  router.post(
    "/",
    requestContext("POST /api-keys"),
    apiLogging(SERVICE),
    authenticate,
    async (req: Request, res: ExpressResponse) => {
      const currentUser = sendUnauthorized_unlessUser(req, res);
      if (!currentUser) return;

      const body = parseBody(createApiKeyBodySchema, req.body);
      if (isValidationError(body)) return sendKeywardError(req, res, body);

      const allowed = sendForbidden_unlessAuthorized(req, res, apiKeyPolicies, "create", {
        user_id: currentUser.id,
      });
      if (!allowed) return;

      const issued = await apiKeys.issue(currentUser.id, body.ttlSeconds);
      if (isKeywardError(issued)) return sendKeywardError(req, res, issued);

      res.status(201).json({ key: issued.plaintextKey, apiKey: issued.record });
    },
  );

  router.get(
    "/",
    requestContext("GET /api-keys"),
    apiLogging(SERVICE),
    authenticate,
    async (req: Request, res: ExpressResponse) => {
      const currentUser = sendUnauthorized_unlessUser(req, res);
      if (!currentUser) return;

      const allowed = sendForbidden_unlessAuthorized(req, res, apiKeyPolicies, "read", {
        user_id: currentUser.id,
      });
      if (!allowed) return;

      res.json({ apiKeys: await apiKeys.list(currentUser.id) });
    },
  );

  router.delete(
    "/:id",
    requestContext("DELETE /api-keys/:id"),
    apiLogging(SERVICE),
    authenticate,
    async (req: Request, res: ExpressResponse) => {
      const currentUser = sendUnauthorized_unlessUser(req, res);
      if (!currentUser) return;

      const id = String(req.params.id);
      const apiKey = apiKeyIdSchema.safeParse(id).success ? await apiKeys.find(id) : null;
      if (!apiKey) return sendKeywardError(req, res, notFound(`API key with id ${id} not found`));

      const allowed = sendForbidden_unlessAuthorized(req, res, apiKeyPolicies, "destroy", apiKey);
      if (!allowed) return;

      await apiKeys.destroy(apiKey.id);
      res.status(204).end();
    },
  );

  return router;
}
