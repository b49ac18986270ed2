/**
 * Express app: JSON API under the configured prefix plus the HTML dashboard at /.
 */

import express, { type Express, type NextFunction, type Request, type Response } from "express";
import cors from "cors";
import type { AppContext } from "../src/context.js";
import { sendError } from "./errors.js";
import { registerApiRoutes } from "./routes/index.js";
import { dashboardGet } from "./routes/dashboard.js";

function isBodyParseError(err: unknown): boolean {
  return (
    err instanceof Error && "type" in err && err.type === "entity.parse.failed"
  );
}

export function createApp(ctx: AppContext): Express {
  const app = express();

  app.use(cors());
  app.use(express.json({ limit: "1mb" }));

  // API routes - mount first so the prefix is never handled by the dashboard
  registerApiRoutes(app, ctx);

  app.get("/", dashboardGet(ctx));

  app.use(ctx.config.apiPrefix, (req: Request, res: Response) => {
    sendError(res, 404, "NOT_FOUND", `No route for ${req.method} ${req.originalUrl}`);
  });

  // Four-argument signature marks this as the error handler.
  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParseError(err)) {
      sendError(res, 400, "INVALID_JSON", "Request body is not valid JSON");
      return;
    }
    console.error("[server] unhandled error:", err);
    sendError(res, 500, "INTERNAL_ERROR", err instanceof Error ? err.message : String(err));
  });

  return app;
}
