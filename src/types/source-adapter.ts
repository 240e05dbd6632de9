import type { EnrichmentEntry, PaperRecord, ProviderName } from './record.js';

/**
 * Why a provider contributed no (or fewer) records.
 *
 *   transport: the request failed (network error, HTTP error, timeout)
 *   parse: a response arrived but its body was unusable
 *   empty: the provider answered but had nothing for the query
 */
export type NoticeKind = 'transport' | 'parse' | 'empty';

/**
 * Advisory message from a provider. Never fatal to the run.
 */
export interface ProviderNotice {
    provider: ProviderName;
    kind: NoticeKind;
    message: string;
}

/**
 * Outcome of one provider search: normalized records plus an optional notice.
 */
export interface SourceResult {
    records: PaperRecord[];
    notice: ProviderNotice | null;
}

/**
 * Interface for bibliographic source adapters (Crossref, PubMed).
 * Each adapter normalizes its provider's payload into PaperRecord.
 */
export interface SourceAdapter {
    /** Provider name written into PaperRecord.source */
    readonly name: ProviderName;

    /**
     * Search the provider for a keyword.
     * Failures are reported through `notice`; this never rejects.
     */
    search(query: string, limit: number): Promise<SourceResult>;
}

/**
 * A source that can supply abstracts and publication types for records it owns.
 */
export interface EnrichmentSource {
    readonly name: ProviderName;

    /**
     * Fetch enrichment data keyed by provider_id.
     * Missing ids are simply absent from the result.
     */
    fetchEnrichment(ids: string[]): Promise<Map<string, EnrichmentEntry>>;
}

/**
 * Options for source adapter initialization.
 */
export interface SourceAdapterOptions {
    /** API key (from environment variable) */
    apiKey?: string;

    /** Contact email sent to providers that ask for one */
    email?: string;

    /** Only return works published in or after this year */
    yearFrom?: number;
}
