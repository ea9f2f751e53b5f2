import { Router } from "express";
import type { AppDeps } from "../app";
import { handle } from "../middleware/errors";
import { resolveShortLink } from "../services/recipes";

export const createShortLinksRouter = (deps: AppDeps) => {
  const router = Router();

  router.get(
    "/:hash",
    handle(async (req, res) => {
      const recipeId = await resolveShortLink(deps, req.params.hash);
      res.redirect(302, `/recipes/${recipeId}`);
    })
  );

  return router;
};
