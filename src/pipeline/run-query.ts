import type {
    EnrichmentSource,
    PaperRecord,
    ProviderName,
    ProviderNotice,
    SourceAdapter,
    Translator,
} from '../types/index.js';
import { getLogger } from '../utils/logger.js';
import { enrichRecords } from './enrich.js';
import { mergeRecords } from './merge.js';
import { rankRecords } from './rank.js';
import { translateAbstracts } from './translate.js';

/**
 * ok: at least one record survived ranking
 * empty: nothing found, and every provider answered normally
 * failed: nothing found, and at least one provider could not be queried
 */
export type QueryStatus = 'ok' | 'empty' | 'failed';

/**
 * Everything the digest needs for one query.
 */
export interface QueryDigest {
    query: string;
    records: readonly PaperRecord[];
    notices: ProviderNotice[];
    status: QueryStatus;
    /** Unique records before ranking */
    candidates: number;
}

export interface QueryPipeline {
    /** Searched in order; the first source's records win merge conflicts */
    sources: readonly [SourceAdapter, SourceAdapter];
    enrichment?: EnrichmentSource;
    translator?: Translator;
}

export interface QueryOptions {
    topN: number;
    /** Per-provider result limits; providers not listed get DEFAULT_LIMIT */
    limits?: Partial<Record<ProviderName, number>>;
}

const DEFAULT_LIMIT = 20;

/**
 * Search, merge, rank, enrich and translate for a single query.
 *
 * Provider failures become notices rather than errors, so one provider
 * being down never hides the other's results.
 */
export async function runQuery(
    query: string,
    pipeline: QueryPipeline,
    options: QueryOptions
): Promise<QueryDigest> {
    const logger = getLogger();
    const [sourceA, sourceB] = pipeline.sources;

    const [resultA, resultB] = await Promise.all([
        sourceA.search(query, options.limits?.[sourceA.name] ?? DEFAULT_LIMIT),
        sourceB.search(query, options.limits?.[sourceB.name] ?? DEFAULT_LIMIT),
    ]);

    const notices = [resultA.notice, resultB.notice].filter(
        (notice): notice is ProviderNotice => notice !== null
    );

    logger.info(
        {
            query,
            [sourceA.name]: resultA.records.length,
            [sourceB.name]: resultB.records.length,
            notices: notices.map((n) => `${n.provider}: ${n.message}`),
        },
        'Fetch finished'
    );

    const merged = mergeRecords(resultA.records, resultB.records);
    if (merged.size === 0) {
        logger.warn({ query }, 'No records to merge');
    }

    let records: readonly PaperRecord[] = rankRecords(merged, query, options.topN);
    logger.info({ query, unique: merged.size, ranked: records.length }, 'Ranking done');

    if (pipeline.enrichment && records.length > 0) {
        const source = pipeline.enrichment;
        records = await enrichRecords(records, (ids) => source.fetchEnrichment(ids), source.name);
    }

    if (pipeline.translator && records.length > 0) {
        records = await translateAbstracts(records, pipeline.translator);
    }

    return {
        query,
        records,
        notices,
        status: queryStatus(records, notices),
        candidates: merged.size,
    };
}

function queryStatus(records: readonly PaperRecord[], notices: readonly ProviderNotice[]): QueryStatus {
    if (records.length > 0) return 'ok';
    return notices.some((n) => n.kind !== 'empty') ? 'failed' : 'empty';
}
