/**
 * DB-backed ScoreStore. Used when PERSISTENCE_DRIVER=db.
 */

import { and, desc, eq, lte, type SQL } from "drizzle-orm";
import type { DatabaseHandle } from "../../lib/db/index.js";
import { runMigrations } from "../../lib/db/migrate.js";
import { translationScores, type TranslationScoreRow } from "../../lib/db/schema.js";
import type { NewTranslationScore, TranslationScoreRecord } from "../types.js";
import { MonotonicClock } from "./clock.js";
import { PersistenceError, type ListScoresOptions, type ScoreStore } from "./types.js";

function toRecord(row: TranslationScoreRow): TranslationScoreRecord {
  return {
    id: row.id,
    appId: row.appId,
    sourceLang: row.sourceLang,
    targetLang: row.targetLang,
    sourceText: row.sourceText,
    targetText: row.targetText,
    scoringMethod: row.scoringMethod,
    llmModel: row.llmModel,
    score: row.score,
    adequacyScore: row.adequacyScore,
    fluencyScore: row.fluencyScore,
    rationale: row.rationale,
    rawLlmResponse: row.rawLlmResponse,
    createdAtISO: row.createdAt.toISOString(),
  };
}

function wrap(action: string, e: unknown): PersistenceError {
  return new PersistenceError(`Failed to ${action}: ${e instanceof Error ? e.message : String(e)}`, { cause: e });
}

export class DbScoreStore implements ScoreStore {
  constructor(
    private readonly handle: DatabaseHandle,
    private readonly migrationsDir?: string,
    private readonly clock: MonotonicClock = new MonotonicClock()
  ) {}

  async init(): Promise<void> {
    try {
      await runMigrations(this.handle.getPool(), this.migrationsDir);
    } catch (e) {
      throw wrap("run migrations", e);
    }
  }

  async append(record: NewTranslationScore): Promise<TranslationScoreRecord> {
    try {
      const rows = await this.handle
        .getDb()
        .insert(translationScores)
        .values({ ...record, createdAt: new Date(this.clock.nextMillis()) })
        .returning();
      if (rows.length === 0) throw new Error("insert returned no row");
      return toRecord(rows[0]);
    } catch (e) {
      throw wrap("append score", e);
    }
  }

  async list(options: ListScoresOptions): Promise<TranslationScoreRecord[]> {
    const conditions: SQL[] = [];
    if (options.threshold !== undefined) conditions.push(lte(translationScores.score, options.threshold));
    if (options.appId !== undefined) conditions.push(eq(translationScores.appId, options.appId));
    try {
      const rows = await this.handle
        .getDb()
        .select()
        .from(translationScores)
        .where(conditions.length > 0 ? and(...conditions) : undefined)
        .orderBy(desc(translationScores.createdAt))
        .limit(options.limit);
      return rows.map(toRecord);
    } catch (e) {
      throw wrap("list scores", e);
    }
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}
