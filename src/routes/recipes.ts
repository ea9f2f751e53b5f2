import { Router, type Request } from "express";
import type { AppDeps } from "../app";
import { AppError } from "../lib/errors";
import { paginate, parsePageRequest, queryList, queryString } from "../lib/pagination";
import { handle } from "../middleware/errors";
import { addToCollection, removeFromCollection } from "../services/memberships";
import {
  createRecipe,
  deleteRecipe,
  getRecipe,
  getShortLink,
  listRecipes,
  updateRecipe,
} from "../services/recipes";
import { downloadShoppingList } from "../services/shoppingList";
import { MEMBERSHIP_KINDS, type RecipeFilters } from "../types";

const FLAGS = new Map<string, boolean>([
  ["1", true],
  ["true", true],
  ["0", false],
  ["false", false],
]);

const flag = (req: Request, name: string) => {
  const raw = queryString(req.query[name]);
  if (raw === undefined) return undefined;
  const value = FLAGS.get(raw.toLowerCase());
  if (value === undefined) throw new AppError("InvalidField", `${name}: expected 1, 0, true or false.`, name);
  return value;
};

// Membership flags only apply to a signed-in viewer.
const recipeFilters = (req: Request): RecipeFilters => {
  const filters: RecipeFilters = {};
  const author = queryString(req.query.author);
  if (author) filters.authorId = author;
  const tags = queryList(req.query.tags);
  if (tags.length > 0) filters.tagSlugs = tags;
  const favorited = flag(req, "is_favorited");
  const inShoppingCart = flag(req, "is_in_shopping_cart");
  if (req.user && favorited !== undefined) filters.favorited = { userId: req.user.id, include: favorited };
  if (req.user && inShoppingCart !== undefined) {
    filters.inShoppingCart = { userId: req.user.id, include: inShoppingCart };
  }
  return filters;
};

export const createRecipesRouter = (deps: AppDeps) => {
  const router = Router();
  const actor = (req: Request) => req.user ?? null;

  router.get(
    "/",
    handle(async (req, res) => {
      const page = parsePageRequest(req.query, deps.config);
      const { items, total } = await listRecipes(deps, actor(req), recipeFilters(req), page);
      res.json(paginate(req, page, total, items));
    })
  );

  router.post(
    "/",
    handle(async (req, res) => {
      res.status(201).json(await createRecipe(deps, actor(req), req.body));
    })
  );

  router.get(
    "/download_shopping_cart",
    handle(async (req, res) => {
      const { filename, body } = await downloadShoppingList(deps, actor(req), {
        fontPath: deps.config.pdfFontPath,
      });
      res.setHeader("Content-Type", "application/pdf");
      res.setHeader("Content-Disposition", `attachment; filename="${filename}"`);
      res.send(body);
    })
  );

  router.get(
    "/:id",
    handle(async (req, res) => {
      res.json(await getRecipe(deps, actor(req), req.params.id));
    })
  );

  router.patch(
    "/:id",
    handle(async (req, res) => {
      res.json(await updateRecipe(deps, actor(req), req.params.id, req.body));
    })
  );

  router.delete(
    "/:id",
    handle(async (req, res) => {
      await deleteRecipe(deps, actor(req), req.params.id);
      res.status(204).end();
    })
  );

  router.get(
    "/:id/get-link",
    handle(async (req, res) => {
      res.json(await getShortLink(deps, req.params.id, deps.config.shortLinkBaseUrl));
    })
  );

  for (const kind of MEMBERSHIP_KINDS) {
    router.post(
      `/:id/${kind}`,
      handle(async (req, res) => {
        res.status(201).json(await addToCollection(deps, actor(req), kind, req.params.id));
      })
    );
    router.delete(
      `/:id/${kind}`,
      handle(async (req, res) => {
        await removeFromCollection(deps, actor(req), kind, req.params.id);
        res.status(204).end();
      })
    );
  }

  return router;
};
