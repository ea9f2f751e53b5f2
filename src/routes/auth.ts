import { Router } from "express";
import type { AppDeps } from "../app";
import { handle } from "../middleware/errors";
import { signSession } from "../middleware/auth";
import { verifyCredentials } from "../services/users";

export const createAuthRouter = (deps: AppDeps) => {
  const router = Router();

  // --- TOKEN LOGIN ---
  router.post(
    "/token/login",
    handle(async (req, res) => {
      const user = await verifyCredentials(deps, req.body);
      const token = signSession(user, deps.config.jwtSecret, deps.config.jwtExpiresInSeconds);
      res.json({ auth_token: token });
    })
  );

  return router;
};
