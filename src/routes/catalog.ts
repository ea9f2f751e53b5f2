import { Router } from "express";
import type { AppDeps } from "../app";
import { AppError } from "../lib/errors";
import { queryString } from "../lib/pagination";
import { toIngredientView, toTagView } from "../lib/presenters";
import { handle } from "../middleware/errors";

/** Tags and ingredients: read-only reference data, never paginated. */
export const createCatalogRouter = ({ store }: AppDeps) => {
  const router = Router();

  router.get(
    "/tags",
    handle(async (_req, res) => {
      res.json((await store.tags.list()).map(toTagView));
    })
  );

  router.get(
    "/tags/:id",
    handle(async (req, res) => {
      const tag = await store.tags.findById(req.params.id);
      if (!tag) throw new AppError("NotFound", "Tag not found.");
      res.json(toTagView(tag));
    })
  );

  router.get(
    "/ingredients",
    handle(async (req, res) => {
      const prefix = queryString(req.query.name)?.trim();
      res.json((await store.ingredients.search(prefix || undefined)).map(toIngredientView));
    })
  );

  router.get(
    "/ingredients/:id",
    handle(async (req, res) => {
      const ingredient = await store.ingredients.findById(req.params.id);
      if (!ingredient) throw new AppError("NotFound", "Ingredient not found.");
      res.json(toIngredientView(ingredient));
    })
  );

  return router;
};
