import { PUBMED, type EnrichmentEntry, type PaperRecord, type ProviderName } from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { SOURCE_SEPARATOR, unionTags } from './merge.js';

/**
 * Looks up abstracts and publication types by provider_id.
 */
export type EnrichmentFetcher = (ids: string[]) => Promise<Map<string, EnrichmentEntry>>;

/**
 * Distinct provider ids (sorted) of records that came from `provider`.
 */
export function collectProviderIds(records: readonly PaperRecord[], provider: ProviderName = PUBMED): string[] {
    const ids = new Set<string>();
    for (const record of records) {
        if (record.provider_id && record.source.split(SOURCE_SEPARATOR).includes(provider)) {
            ids.add(record.provider_id);
        }
    }
    return [...ids].sort();
}

/**
 * Fill ranked records with data fetched from the enrichment provider.
 *
 * One fetch for the whole list, so external calls stay bounded by top-N.
 * Fetched abstracts replace existing ones (the provider's own text is
 * authoritative) but an empty fetched abstract never erases one; tags are
 * unioned after the record's own. Records are copied, never mutated.
 *
 * Best-effort: when the fetch fails or yields nothing, the input array is
 * returned as-is.
 */
export async function enrichRecords(
    ranked: readonly PaperRecord[],
    fetchEnrichment: EnrichmentFetcher,
    provider: ProviderName = PUBMED
): Promise<readonly PaperRecord[]> {
    const logger = getLogger();
    const ids = collectProviderIds(ranked, provider);

    if (ids.length === 0) {
        logger.info({ provider }, 'No enrichable records in ranked list, skipping enrichment');
        return ranked;
    }

    let entries: Map<string, EnrichmentEntry>;
    try {
        entries = await fetchEnrichment(ids);
    } catch (error) {
        logger.warn({ provider, ids: ids.length, error }, 'Enrichment fetch failed, keeping records as ranked');
        return ranked;
    }

    if (entries.size === 0) {
        logger.info({ provider, ids: ids.length }, 'Enrichment returned no data');
        return ranked;
    }

    return ranked.map((record) => {
        const entry = record.provider_id ? entries.get(record.provider_id) : undefined;
        if (!entry) return record;

        return {
            ...record,
            abstract: entry.abstract?.trim() ? entry.abstract : record.abstract,
            classification_tags: unionTags(record.classification_tags, entry.classification_tags),
        };
    });
}
