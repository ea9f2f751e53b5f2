import { Router, type Request } from "express";
import type { AppDeps } from "../app";
import { AppError } from "../lib/errors";
import { paginate, parsePageRequest, queryString } from "../lib/pagination";
import { handle } from "../middleware/errors";
import { requireAuth } from "../middleware/auth";
import { listSubscriptions, subscribe, unsubscribe } from "../services/memberships";
import {
  getMe,
  getUser,
  listUsers,
  registerUser,
  removeAvatar,
  setAvatar,
  setPassword,
} from "../services/users";

const recipesLimit = (req: Request) => {
  const raw = queryString(req.query.recipes_limit);
  if (raw === undefined) return undefined;
  const limit = /^\d+$/.test(raw) ? Number(raw) : NaN;
  if (!Number.isSafeInteger(limit)) {
    throw new AppError("InvalidField", "recipes_limit: must be a non-negative integer.", "recipes_limit");
  }
  return limit;
};

export const createUsersRouter = (deps: AppDeps) => {
  const router = Router();
  const actor = (req: Request) => req.user ?? null;

  router.post(
    "/",
    handle(async (req, res) => {
      res.status(201).json(await registerUser(deps, req.body));
    })
  );

  router.get(
    "/",
    handle(async (req, res) => {
      const page = parsePageRequest(req.query, deps.config);
      const { items, total } = await listUsers(deps, actor(req), page);
      res.json(paginate(req, page, total, items));
    })
  );

  router.get(
    "/me",
    requireAuth,
    handle(async (req, res) => {
      res.json(await getMe(deps, actor(req)));
    })
  );

  router.post(
    "/set_password",
    requireAuth,
    handle(async (req, res) => {
      await setPassword(deps, actor(req), req.body);
      res.status(204).end();
    })
  );

  router.put(
    "/me/avatar",
    requireAuth,
    handle(async (req, res) => {
      res.json(await setAvatar(deps, actor(req), req.body));
    })
  );

  router.delete(
    "/me/avatar",
    requireAuth,
    handle(async (req, res) => {
      await removeAvatar(deps, actor(req));
      res.status(204).end();
    })
  );

  router.get(
    "/subscriptions",
    requireAuth,
    handle(async (req, res) => {
      const page = parsePageRequest(req.query, deps.config);
      const { items, total } = await listSubscriptions(deps, actor(req), page, recipesLimit(req));
      res.json(paginate(req, page, total, items));
    })
  );

  router.get(
    "/:id",
    handle(async (req, res) => {
      res.json(await getUser(deps, actor(req), req.params.id));
    })
  );

  router.post(
    "/:id/subscribe",
    handle(async (req, res) => {
      res.status(201).json(await subscribe(deps, actor(req), req.params.id, recipesLimit(req)));
    })
  );

  router.delete(
    "/:id/subscribe",
    handle(async (req, res) => {
      await unsubscribe(deps, actor(req), req.params.id);
      res.status(204).end();
    })
  );

  return router;
};
