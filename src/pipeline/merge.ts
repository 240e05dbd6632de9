import { NO_DOI, type PaperRecord } from '../types/index.js';
import { getLogger } from '../utils/logger.js';

/** Separator between provider names in a merged `source` */
export const SOURCE_SEPARATOR = '+';

/**
 * Identity of a record across providers.
 *
 * The lowercased DOI when there is one; otherwise "<lowercased title>_<year>",
 * which only catches exact title matches (no punctuation or fuzzy folding).
 */
export function dedupKey(record: Pick<PaperRecord, 'doi' | 'title' | 'year'>): string {
    const doi = record.doi.trim();
    if (doi && doi !== NO_DOI) {
        return doi.toLowerCase();
    }
    return `${record.title.toLowerCase()}_${record.year}`;
}

/**
 * Order-preserving union of two tag lists, or null when both are empty.
 */
export function unionTags(
    existing: readonly string[] | null | undefined,
    incoming: readonly string[] | null | undefined
): string[] | null {
    const merged = [...new Set([...(existing ?? []), ...(incoming ?? [])])];
    return merged.length > 0 ? merged : null;
}

/**
 * Add a provider to a (possibly already merged) source string.
 * "Crossref" + "PubMed" → "Crossref+PubMed"; adding a provider already present is a no-op.
 */
export function addSource(source: string, provider: string): string {
    const parts = source.split(SOURCE_SEPARATOR);
    if (parts.includes(provider)) return source;
    return `${source}${SOURCE_SEPARATOR}${provider}`;
}

/**
 * Fold a duplicate into the record first seen under the same key.
 * The first record's fields win except where noted:
 *   source               union of providers
 *   provider_id          first non-empty
 *   abstract             first non-empty
 *   classification_tags  order-preserving union
 */
function mergeInto(existing: PaperRecord, duplicate: PaperRecord): PaperRecord {
    return {
        ...existing,
        source: duplicate.source
            .split(SOURCE_SEPARATOR)
            .reduce((source, provider) => addSource(source, provider), existing.source),
        provider_id: existing.provider_id || duplicate.provider_id || null,
        abstract: existing.abstract || duplicate.abstract || null,
        classification_tags: unionTags(existing.classification_tags, duplicate.classification_tags),
    };
}

/**
 * Deduplicate two providers' records into one map keyed by dedupKey().
 *
 * Records from `recordsA` are visited first, then `recordsB`, each in input
 * order; the map's insertion order follows that encounter order, which keeps
 * downstream ranking ties reproducible. Inputs are not mutated.
 */
export function mergeRecords(
    recordsA: readonly PaperRecord[],
    recordsB: readonly PaperRecord[]
): Map<string, PaperRecord> {
    const merged = new Map<string, PaperRecord>();

    for (const record of [...recordsA, ...recordsB]) {
        const key = dedupKey(record);
        const existing = merged.get(key);
        merged.set(key, existing ? mergeInto(existing, record) : { ...record });
    }

    getLogger().debug(
        { inputA: recordsA.length, inputB: recordsB.length, unique: merged.size },
        'Records merged'
    );

    return merged;
}
