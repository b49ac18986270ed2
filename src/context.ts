/**
 * AppContext: config plus the long-lived collaborators built from it.
 * Built once at startup (or per test) and handed to the route factories.
 */

import type { AppConfig } from "./config.js";
import { createGateway } from "./gateway/index.js";
import type { LlmGateway } from "./gateway/types.js";
import { ScoringService } from "./scoring/scoringService.js";
import { createScoreStore } from "./scoring/store/index.js";
import type { ScoreStore } from "./scoring/store/types.js";

export interface AppContext {
  config: AppConfig;
  scoringService: ScoringService;
  store: ScoreStore;
}

export interface AppContextOverrides {
  gateway?: LlmGateway;
  store?: ScoreStore;
}

export function createAppContext(config: AppConfig, overrides: AppContextOverrides = {}): AppContext {
  const gateway = overrides.gateway ?? createGateway(config);
  return {
    config,
    scoringService: new ScoringService(gateway, config.defaultLlmModel, { debug: config.debugScoring }),
    store: overrides.store ?? createScoreStore(config),
  };
}

export async function closeAppContext(ctx: AppContext): Promise<void> {
  await ctx.store.close?.();
}
