/// <reference path="../../types/express.d.ts" />
import { Request, Response as ExpressResponse, Router } from "express";
import { isAuthenticationFailure, isKeywardError, isValidationError } from "keyward-core";
import { sendKeywardError, sendUnauthorized } from "#lib/responders";
import { parseBody } from "#lib/zod-utils";
import { apiLogging } from "../../middleware/api-logging";
import { extractBearer } from "../../middleware/auth";
import { requestContext } from "../../middleware/request-context";
import { toPublicUser } from "../../models/users-model";
import { authenticateCredential } from "../../modules/strategies";
import { Services } from "../../services";
import {
  credentialsBodySchema,
  emailBodySchema,
  passwordResetBodySchema,
  tokenBodySchema,
} from "./auth-request-schemas";

const SERVICE = "auth-handler";

export function createAuthRouter(services: Services): Router {
  const router = Router();
  const { accounts, tokens } = services;

  router.post(
    "/register",
    requestContext("POST /auth/register"),
    apiLogging(SERVICE),
    async (req: Request, res: ExpressResponse) => {
      const body = parseBody(credentialsBodySchema, req.body);
      if (isValidationError(body)) return sendKeywardError(req, res, body);

      const user = await accounts.register(body.email, body.password);
      if (isKeywardError(user)) return sendKeywardError(req, res, user);

      res.status(201).json({ user: toPublicUser(user) });
    },
  );

  router.post(
    "/sign-in",
    requestContext("POST /auth/sign-in"),
    apiLogging(SERVICE),
    async (req: Request, res: ExpressResponse) => {
      const body = parseBody(credentialsBodySchema, req.body);
      if (isValidationError(body)) return sendKeywardError(req, res, body);

      const outcome = await authenticateCredential([services.passwordStrategy], {
        kind: "password",
        email: body.email,
        password: body.password,
      });
      if (isAuthenticationFailure(outcome)) return sendKeywardError(req, res, outcome);

      const user = await accounts.findUser(outcome.userId);
      if (!user) return sendUnauthorized(req, res, `User ${outcome.userId} no longer exists`);

      const signedIn = await accounts.signIn(user);
      if (isKeywardError(signedIn)) return sendKeywardError(req, res, signedIn);

      res.json({ user: toPublicUser(signedIn.user), token: signedIn.token });
    },
  );

  // Not behind the bearer middleware: an expired or already signed-out token
  // can still be signed out.
  router.post(
    "/sign-out",
    requestContext("POST /auth/sign-out"),
    apiLogging(SERVICE),
    async (req: Request, res: ExpressResponse) => {
      const presented = extractBearer(req);
      if (!presented) {
        return sendUnauthorized(req, res, "Missing session token to sign out");
      }

      const result = await tokens.signOut(presented);
      if (result.kind !== "signed-out") return sendKeywardError(req, res, result);

      res.status(204).end();
    },
  );

  const confirm = async (req: Request, res: ExpressResponse, input: unknown) => {
    const body = parseBody(tokenBodySchema, input);
    if (isValidationError(body)) return sendKeywardError(req, res, body);

    const user = await accounts.confirm(body.token);
    if (isKeywardError(user)) return sendKeywardError(req, res, user);

    res.json({ user: toPublicUser(user) });
  };

  router.post(
    "/confirm",
    requestContext("POST /auth/confirm"),
    apiLogging(SERVICE),
    (req: Request, res: ExpressResponse) => confirm(req, res, req.body),
  );

  // Target of the emailed confirmation link
  router.get(
    "/confirm",
    requestContext("GET /auth/confirm"),
    apiLogging(SERVICE),
    (req: Request, res: ExpressResponse) => confirm(req, res, req.query),
  );

  router.post(
    "/password-reset/request",
    requestContext("POST /auth/password-reset/request"),
    apiLogging(SERVICE),
    async (req: Request, res: ExpressResponse) => {
      const body = parseBody(emailBodySchema, req.body);
      if (isValidationError(body)) return sendKeywardError(req, res, body);

      await accounts.requestPasswordReset(body.email);
      res.status(202).end();
    },
  );

  // Target of the emailed reset link: checks the token without using it up,
  // so a client can show the form before posting the new password.
  router.get(
    "/password-reset",
    requestContext("GET /auth/password-reset"),
    apiLogging(SERVICE),
    async (req: Request, res: ExpressResponse) => {
      const query = parseBody(tokenBodySchema, req.query);
      if (isValidationError(query)) return sendKeywardError(req, res, query);

      const user = await accounts.checkPasswordResetToken(query.token);
      if (isKeywardError(user)) return sendKeywardError(req, res, user);

      res.json({ user: toPublicUser(user) });
    },
  );

  router.post(
    "/password-reset",
    requestContext("POST /auth/password-reset"),
    apiLogging(SERVICE),
    async (req: Request, res: ExpressResponse) => {
      const body = parseBody(passwordResetBodySchema, req.body);
      if (isValidationError(body)) return sendKeywardError(req, res, body);

      const user = await accounts.resetPassword(body.token, body.password);
      if (isKeywardError(user)) return sendKeywardError(req, res, user);

      res.json({ user: toPublicUser(user) });
    },
  );

  router.post(
    "/magic-link/request",
    requestContext("POST /auth/magic-link/request"),
    apiLogging(SERVICE),
    async (req: Request, res: ExpressResponse) => {
      const body = parseBody(emailBodySchema, req.body);
      if (isValidationError(body)) return sendKeywardError(req, res, body);

      await accounts.requestMagicLink(body.email);
      res.status(202).end();
    },
  );

  const magicLinkSignIn = async (req: Request, res: ExpressResponse, input: unknown) => {
    const body = parseBody(tokenBodySchema, input);
    if (isValidationError(body)) return sendKeywardError(req, res, body);

    const signedIn = await accounts.signInWithMagicLink(body.token);
    if (isKeywardError(signedIn)) return sendKeywardError(req, res, signedIn);

    res.json({ user: toPublicUser(signedIn.user), token: signedIn.token });
  };

  router.post(
    "/magic-link/sign-in",
    requestContext("POST /auth/magic-link/sign-in"),
    apiLogging(SERVICE),
    (req: Request, res: ExpressResponse) => magicLinkSignIn(req, res, req.body),
  );

  // Target of the emailed magic link
  router.get(
    "/magic-link/sign-in",
    requestContext("GET /auth/magic-link/sign-in"),
    apiLogging(SERVICE),
    (req: Request, res: ExpressResponse) => magicLinkSignIn(req, res, req.query),
  );

  return router;
}
