/**
 * Express server entry: config, context, store init, listen, graceful shutdown.
 */

import { loadConfig } from "../src/config.js";
import { closeAppContext, createAppContext } from "../src/context.js";
import { createApp } from "./app.js";

async function start() {
  const config = loadConfig();
  const ctx = createAppContext(config);
  await ctx.store.init?.();

  const app = createApp(ctx);
  const server = app.listen(config.port, "0.0.0.0", () => {
    console.log(
      `[Server] ${config.appName} (${config.appEnv}) running at http://0.0.0.0:${config.port} ` +
        `[llm=${config.llmProvider}, persistence=${config.persistenceDriver}]`
    );
  });

  const shutdown = (signal: string) => {
    console.log(`[Server] ${signal} received, shutting down`);
    server.close(() => {
      closeAppContext(ctx)
        .then(() => process.exit(0))
        .catch((e) => {
          console.error("[Server] shutdown failed:", e instanceof Error ? e.message : e);
          process.exit(1);
        });
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));
}

start().catch((e) => {
  console.error("Server failed to start:", e);
  process.exit(1);
});
