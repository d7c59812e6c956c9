import { Router } from "express";
import { z } from "zod";
import type { AuthSession } from "../auth/authenticator.js";
import { asyncRoute, parseInput, type AppDeps } from "./http.js";

const credentials = z.object({
  email: z.string().trim().email(),
  password: z.string().min(6),
});

function sessionJson(result: AuthSession) {
  return {
    ok: true,
    user: result.user,
    session: result.session
      ? { access_token: result.session.accessToken, expires_at: result.session.expiresAt }
      : null,
  };
}

export function createAuthRouter(deps: AppDeps): Router {
  const router = Router();

  router.post(
    "/sign-up",
    asyncRoute(async (req, res) => {
      const { email, password } = parseInput(credentials, req.body);
      res.status(201).json(sessionJson(await deps.auth.signUp(email, password)));
    })
  );

  router.post(
    "/sign-in",
    asyncRoute(async (req, res) => {
      const { email, password } = parseInput(credentials, req.body);
      res.json(sessionJson(await deps.auth.signIn(email, password)));
    })
  );

  return router;
}
