import express from "express";
import cors from "cors";
import type { AppConfig } from "./config";
import { authenticate } from "./middleware/auth";
import { errorHandler, notFound } from "./middleware/errors";
import { createAuthRouter } from "./routes/auth";
import { createCatalogRouter } from "./routes/catalog";
import { createRecipesRouter } from "./routes/recipes";
import { createShortLinksRouter } from "./routes/shortLinks";
import { createUsersRouter } from "./routes/users";
import type { ServiceContext } from "./services/recipes";

export type AppDeps = ServiceContext & { config: AppConfig };

export const createApp = (deps: AppDeps) => {
  const app = express();
  app.use(cors());
  app.use(express.json({ limit: deps.config.jsonLimit }));
  app.use(deps.config.mediaUrl, express.static(deps.config.mediaRoot));
  app.use(authenticate(deps.config.jwtSecret));

  app.get("/api/health", (_req, res) => res.json({ ok: true }));

  app.use("/api/auth", createAuthRouter(deps));
  app.use("/api/users", createUsersRouter(deps));
  app.use("/api/recipes", createRecipesRouter(deps));
  app.use("/api", createCatalogRouter(deps));
  app.use("/s", createShortLinksRouter(deps));

  app.use(notFound);
  app.use(errorHandler);
  return app;
};
