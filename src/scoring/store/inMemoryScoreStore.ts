import { randomUUID } from "crypto";
import type { NewTranslationScore, TranslationScoreRecord } from "../types.js";
import { MonotonicClock } from "./clock.js";
import { selectNewest, type ListScoresOptions, type ScoreStore } from "./types.js";

/** Process-local store. Used by tests and PERSISTENCE_DRIVER=memory. */
export class InMemoryScoreStore implements ScoreStore {
  private readonly records: TranslationScoreRecord[] = [];

  constructor(private readonly clock: MonotonicClock = new MonotonicClock()) {}

  async append(record: NewTranslationScore): Promise<TranslationScoreRecord> {
    const stored: TranslationScoreRecord = { ...record, id: randomUUID(), createdAtISO: this.clock.nextISO() };
    this.records.push(stored);
    return { ...stored };
  }

  async list(options: ListScoresOptions): Promise<TranslationScoreRecord[]> {
    return selectNewest(this.records, options).map((r) => ({ ...r }));
  }

  get size(): number {
    return this.records.length;
  }
}
