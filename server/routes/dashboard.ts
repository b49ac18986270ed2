import { readFile } from "fs/promises";
import { join } from "path";
import type { Request, Response } from "express";
import type { AppContext } from "../../src/context.js";

const FALLBACK_HTML = `<!DOCTYPE html>
<html><head><meta charset="utf-8"><title>{{APP_NAME}}</title></head>
<body style="font-family:system-ui;max-width:600px;margin:40px auto;padding:20px">
  <h1>{{APP_NAME}} Analyst Console</h1>
  <p>Dashboard template not found. The API is running at <code>{{API_PREFIX}}</code>.</p>
</body></html>`;

function escapeHtml(s: string): string {
  return s
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;")
    .replace(/'/g, "&#39;");
}

export function renderDashboard(template: string, ctx: AppContext): string {
  return template
    .replace(/\{\{APP_NAME\}\}/g, escapeHtml(ctx.config.appName))
    .replace(/\{\{API_PREFIX\}\}/g, escapeHtml(ctx.config.apiPrefix))
    .replace(/\{\{DEFAULT_THRESHOLD\}\}/g, String(ctx.config.dashboardDefaultThreshold));
}

export function dashboardGet(ctx: AppContext) {
  return async (_req: Request, res: Response): Promise<void> => {
    let template: string;
    try {
      template = await readFile(join(ctx.config.templatesDir, "index.html"), "utf-8");
    } catch (e) {
      console.warn("[dashboard] template unavailable:", e instanceof Error ? e.message : e);
      template = FALLBACK_HTML;
    }
    res.type("html").send(renderDashboard(template, ctx));
  };
}
