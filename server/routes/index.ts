/**
 * API route registration for Express.
 * Mounts all routes under the configured API prefix via a dedicated router.
 */

import express, { type Express } from "express";
import type { AppContext } from "../../src/context.js";
import * as score from "./score.js";

export function registerApiRoutes(app: Express, ctx: AppContext): void {
  const api = express.Router();

  api.post("/score", score.scorePost(ctx));
  api.get("/scores", score.scoresGet(ctx));

  app.use(ctx.config.apiPrefix, api);
}
