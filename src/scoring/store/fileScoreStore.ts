/**
 * JSONL file store. One record per line, appended; the whole file is read on list().
 * Default driver (PERSISTENCE_DRIVER unset or "file").
 */

import { randomUUID } from "crypto";
import { join } from "path";
import { appendJsonl, readJsonl, type JsonlLine } from "../../logger.js";
import { TranslationScoreRecordSchema } from "../schemas.js";
import type { NewTranslationScore, TranslationScoreRecord } from "../types.js";
import { MonotonicClock } from "./clock.js";
import { PersistenceError, selectNewest, type ListScoresOptions, type ScoreStore } from "./types.js";

export const SCORES_FILENAME = "translation-scores.jsonl";

export class FileScoreStore implements ScoreStore {
  readonly path: string;
  /** Serializes appends so lines never interleave. */
  private writeChain: Promise<void> = Promise.resolve();

  constructor(dataDir: string, private readonly clock: MonotonicClock = new MonotonicClock()) {
    this.path = join(dataDir, SCORES_FILENAME);
  }

  async append(record: NewTranslationScore): Promise<TranslationScoreRecord> {
    const stored: TranslationScoreRecord = { ...record, id: randomUUID(), createdAtISO: this.clock.nextISO() };
    const write = this.writeChain.then(() => appendJsonl(this.path, stored));
    this.writeChain = write.catch(() => undefined);
    try {
      await write;
    } catch (e) {
      throw new PersistenceError(`Failed to append score: ${e instanceof Error ? e.message : String(e)}`, {
        cause: e,
      });
    }
    return stored;
  }

  async list(options: ListScoresOptions): Promise<TranslationScoreRecord[]> {
    return selectNewest(await this.readAll(), options);
  }

  private async readAll(): Promise<TranslationScoreRecord[]> {
    let lines: JsonlLine[];
    try {
      lines = await readJsonl(this.path, (n) =>
        console.warn(`[scoreStore] skipping malformed line ${n} in ${this.path}`)
      );
    } catch (e) {
      throw new PersistenceError(`Failed to read scores: ${e instanceof Error ? e.message : String(e)}`, {
        cause: e,
      });
    }
    const records: TranslationScoreRecord[] = [];
    for (const { lineNumber, value } of lines) {
      const parsed = TranslationScoreRecordSchema.safeParse(value);
      if (parsed.success) {
        records.push(parsed.data);
      } else {
        console.warn(`[scoreStore] skipping invalid record on line ${lineNumber} in ${this.path}`);
      }
    }
    return records;
  }
}
