import type { AppConfig } from "../../config.js";
import { createDatabaseHandle } from "../../lib/db/index.js";
import { DbScoreStore } from "./dbScoreStore.js";
import { FileScoreStore } from "./fileScoreStore.js";
import { InMemoryScoreStore } from "./inMemoryScoreStore.js";
import type { ScoreStore } from "./types.js";

export function createScoreStore(config: AppConfig): ScoreStore {
  switch (config.persistenceDriver) {
    case "db":
      return new DbScoreStore(createDatabaseHandle(config.databaseUrl));
    case "memory":
      return new InMemoryScoreStore();
    case "file":
      return new FileScoreStore(config.dataDir);
  }
}
