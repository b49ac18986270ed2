/**
 * ScoreStore: append-only record of scoring results, listed newest first.
 */

import type { NewTranslationScore, TranslationScoreRecord } from "../types.js";

export interface ListScoresOptions {
  /** Maximum rows returned (1-200). */
  limit: number;
  /** Keep only records with score <= threshold. */
  threshold?: number;
  appId?: string;
}

export interface ScoreStore {
  /** Assigns id and createdAtISO; returns the stored record. */
  append(record: NewTranslationScore): Promise<TranslationScoreRecord>;
  /** Newest first; ties keep reverse insertion order. */
  list(options: ListScoresOptions): Promise<TranslationScoreRecord[]>;
  init?(): Promise<void>;
  close?(): Promise<void>;
}

export class PersistenceError extends Error {
  readonly code = "PERSISTENCE_ERROR";

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "PersistenceError";
  }
}

export function matchesFilters(record: TranslationScoreRecord, options: ListScoresOptions): boolean {
  if (options.threshold !== undefined && record.score > options.threshold) return false;
  if (options.appId !== undefined && record.appId !== options.appId) return false;
  return true;
}

/**
 * Records in insertion order -> filtered, newest first, truncated.
 * Array.prototype.sort is stable, so equal timestamps keep reverse insertion order.
 */
export function selectNewest(
  records: readonly TranslationScoreRecord[],
  options: ListScoresOptions
): TranslationScoreRecord[] {
  return records
    .filter((r) => matchesFilters(r, options))
    .reverse()
    .sort((a, b) => (a.createdAtISO < b.createdAtISO ? 1 : a.createdAtISO > b.createdAtISO ? -1 : 0))
    .slice(0, options.limit);
}
