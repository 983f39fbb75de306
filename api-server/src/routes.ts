import { Application, Request, RequestHandler, Response } from "express";
import { createApiKeysRouter } from "#handlers/api-keys-handler/handler";
import { createAuthRouter } from "./handlers/auth-handler/handler";
import { createUsersRouter } from "./handlers/users-handler/handler";
import { Services } from "./services";

export function mountApplicationRoutes(
  app: Application,
  services: Services,
  authenticate: RequestHandler,
) {
  app.get("/", (req: Request, res: Response) => {
    res.status(404).json({
      error: "Not Found",
      message: "This endpoint does not serve content. See /auth, /me and /api-keys.",
    });
  });

  app.use("/auth", createAuthRouter(services));
  app.use("/api-keys", createApiKeysRouter(services, authenticate));
  app.use("/", createUsersRouter(services, authenticate));
}
