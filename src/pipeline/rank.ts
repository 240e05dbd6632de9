import type { PaperRecord } from '../types/index.js';
import { scoreTitle, yearToInt } from './scoring.js';

/**
 * A record with the values it was ranked by.
 */
export interface ScoredRecord {
    record: PaperRecord;
    score: number;
    yearValue: number;
}

/**
 * Score every record and sort by (score desc, year desc).
 *
 * Array.prototype.sort is stable, so records with equal keys keep the
 * iteration order of `records` (insertion order for a Map).
 */
export function scoreRecords(
    records: Iterable<PaperRecord>,
    query: string
): ScoredRecord[] {
    const scored = Array.from(records, (record) => ({
        record,
        score: scoreTitle(record.title, query),
        yearValue: yearToInt(record.year),
    }));

    return scored.sort((a, b) => b.score - a.score || b.yearValue - a.yearValue);
}

/**
 * Top `topN` records of a merged set, best first.
 * `topN <= 0` yields an empty list.
 */
export function rankRecords(
    merged: ReadonlyMap<string, PaperRecord>,
    query: string,
    topN: number
): PaperRecord[] {
    if (topN <= 0) return [];

    return scoreRecords(merged.values(), query)
        .slice(0, topN)
        .map((entry) => entry.record);
}
